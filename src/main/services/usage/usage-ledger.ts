/**
 * Persistent request counter gated by a fixed quota.
 *
 * Every read and every read-modify-write runs under the exclusive file lock
 * (see {@link withFileLock}), so processes sharing the usage file never
 * lose an increment. There is no automatic rollover; {@link UsageLedger.reset}
 * is the only way the count goes down.
 */

import { join } from 'path'
import { existsSync } from 'fs'
import { UsageRecordSchema, type UsageRecord } from '@shared/schemas/usage.schema'
import { LogRing } from '../diagnostics/log-ring'
import { AssetJobError } from '../errors/asset-job-error'
import { ensurePrivateDir } from '../platform/app-paths'
import { atomicReadFile, withFileLock, writeFileAtomic } from '../platform/atomic-fs'

const USAGE_FILE_NAME = 'usage.json'

export const DEFAULT_QUOTA_LIMIT = 600

export interface LedgerSnapshot {
  count: number
  limit: number
  remaining: number
  /** Share of the quota used, 0–100, one decimal. */
  percentUsed: number
}

export type AdmissionDecision =
  | { allowed: true; snapshot: LedgerSnapshot }
  | { allowed: false; error: AssetJobError; snapshot: LedgerSnapshot }

export interface UsageLedgerOptions {
  directory: string
  limit?: number
}

export class UsageLedger {
  private readonly logger = LogRing.getInstance()
  private readonly directory: string
  private readonly filePath: string
  private readonly limit: number

  /**
   * @throws {AssetJobError} `Configuration` if the limit is not a positive integer.
   */
  constructor(options: UsageLedgerOptions) {
    const limit = options.limit ?? DEFAULT_QUOTA_LIMIT
    if (!Number.isInteger(limit) || limit < 1) {
      throw AssetJobError.configuration(`Usage quota limit must be a positive integer, got ${limit}`)
    }

    this.directory = options.directory
    this.filePath = join(options.directory, USAGE_FILE_NAME)
    this.limit = limit
  }

  /**
   * Decides whether one more generation may start. Never mutates state.
   */
  async checkAdmission(): Promise<AdmissionDecision> {
    const snapshot = await this.locked(async () => this.toSnapshot(await this.read()))

    if (snapshot.count >= snapshot.limit) {
      this.logger.warn('Admission refused: quota exhausted', { count: snapshot.count, limit: snapshot.limit })
      return { allowed: false, error: AssetJobError.quotaExceeded(snapshot.count, snapshot.limit), snapshot }
    }

    return { allowed: true, snapshot }
  }

  /**
   * Records one successful generation.
   *
   * @throws {AssetJobError} `QuotaExceeded` if the count already reached the
   *   limit (a concurrent job took the last unit), `LedgerCorrupt` if the file is invalid.
   */
  async commit(): Promise<LedgerSnapshot> {
    const snapshot = await this.locked(async () => {
      const record = await this.read()
      if (record.count >= this.limit) {
        throw AssetJobError.quotaExceeded(record.count, this.limit)
      }

      const next: UsageRecord = {
        ...record,
        count: record.count + 1,
        limit: this.limit,
        updatedAt: new Date().toISOString()
      }
      await this.write(next)
      return this.toSnapshot(next)
    })

    this.logger.info('Usage committed', { count: snapshot.count, limit: snapshot.limit })
    return snapshot
  }

  /** Read-only usage report. */
  async snapshot(): Promise<LedgerSnapshot> {
    return this.locked(async () => this.toSnapshot(await this.read()))
  }

  /**
   * Sets the count back to zero and stamps `lastResetAt`. Explicit operator
   * action only.
   */
  async reset(): Promise<LedgerSnapshot> {
    const snapshot = await this.locked(async () => {
      const now = new Date().toISOString()
      const next: UsageRecord = { version: 1, count: 0, limit: this.limit, lastResetAt: now, updatedAt: now }
      await this.write(next)
      return this.toSnapshot(next)
    })

    this.logger.info('Usage ledger reset', { limit: snapshot.limit })
    return snapshot
  }

  getFilePath(): string {
    return this.filePath
  }

  private locked<T>(fn: () => Promise<T>): Promise<T> {
    ensurePrivateDir(this.directory)
    return withFileLock(this.filePath, fn)
  }

  /**
   * Reads and validates the usage record; a missing file is a fresh ledger.
   * Must be called with the lock held.
   */
  private async read(): Promise<UsageRecord> {
    if (!existsSync(this.filePath)) {
      return {
        version: 1,
        count: 0,
        limit: this.limit,
        lastResetAt: null,
        updatedAt: new Date().toISOString()
      }
    }

    const raw = await atomicReadFile(this.filePath)

    let parsed: unknown
    try {
      parsed = JSON.parse(raw)
    } catch {
      throw AssetJobError.ledgerCorrupt(this.filePath, 'not valid JSON')
    }

    const result = UsageRecordSchema.safeParse(parsed)
    if (!result.success) {
      const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`)
      throw AssetJobError.ledgerCorrupt(this.filePath, issues.join(', '))
    }
    return result.data
  }

  private async write(record: UsageRecord): Promise<void> {
    await writeFileAtomic(this.filePath, JSON.stringify(record, null, 2))
  }

  private toSnapshot(record: UsageRecord): LedgerSnapshot {
    const remaining = Math.max(0, this.limit - record.count)
    return {
      count: record.count,
      limit: this.limit,
      remaining,
      percentUsed: Math.round((record.count / this.limit) * 1000) / 10
    }
  }
}
