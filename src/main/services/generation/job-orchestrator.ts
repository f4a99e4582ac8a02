import { randomUUID } from 'crypto'
import {
  GenerationParametersSchema,
  type InferenceStatus,
  type SubmittedInference
} from '@shared/schemas/inference.schema'
import { LogRing } from '../diagnostics/log-ring'
import { AssetJobError, AssetJobErrorCode, toAssetJobError } from '../errors/asset-job-error'
import { systemClock, type Clock } from '../resilience/clock'
import type { RetryExecutor } from '../resilience/retry-executor'
import type { TransportGateway } from '../transport/transport-gateway'
import type { UsageLedger } from '../usage/usage-ledger'
import {
  JOB_TRANSITIONS,
  type ActiveJobInfo,
  type GeneratedFile,
  type GenerationJob,
  type JobState,
  type TerminalResult,
  type UnsuccessfulResult,
  type UsageOutcome
} from './types'

const logger = LogRing.getInstance()

export const DEFAULT_POLL_INTERVAL_MS = 5_000
export const DEFAULT_MAX_WAIT_MS = 300_000

/** Poll failures that leave the job alive while the wait budget lasts. */
const TRANSIENT_POLL_CODES = new Set<AssetJobErrorCode>([
  AssetJobErrorCode.RetriesExhausted,
  AssetJobErrorCode.CircuitOpen,
  AssetJobErrorCode.Unavailable,
  AssetJobErrorCode.RateLimited
])

export interface JobOrchestratorOptions {
  transport: TransportGateway
  executor: RetryExecutor
  ledger: UsageLedger
  pollIntervalMs?: number
  maxWaitMs?: number
  clock?: Clock
}

export interface RunOptions {
  /** Cancels the job, including a request or backoff in flight. */
  signal?: AbortSignal
}

/** Per-job abort signal that fires on caller cancellation or when the wait budget runs out. */
interface JobDeadline {
  signal: AbortSignal
  expired(): boolean
  dispose(): void
}

type PollOutcome =
  | { kind: 'terminal'; result: TerminalResult }
  | { kind: 'pending' }

/**
 * Drives one generation request through admission, submission and polling
 * to a terminal state.
 *
 * Usage is committed exactly once, and only after the remote service
 * reported completion with a well-formed result. Every other terminal state
 * leaves the ledger untouched. {@link JobOrchestrator.run} reports failures
 * in its result instead of throwing.
 *
 * @example
 * ```ts
 * const result = await orchestrator.run({ prompt: 'a moss-covered treasure chest' })
 * if (result.state === 'succeeded') {
 *   console.log(result.files.map((f) => f.url))
 * }
 * ```
 */
export class JobOrchestrator {
  private readonly transport: TransportGateway
  private readonly executor: RetryExecutor
  private readonly ledger: UsageLedger
  private readonly pollIntervalMs: number
  private readonly maxWaitMs: number
  private readonly clock: Clock
  private readonly activeJobs = new Map<string, GenerationJob>()

  constructor(options: JobOrchestratorOptions) {
    this.transport = options.transport
    this.executor = options.executor
    this.ledger = options.ledger
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS
    this.maxWaitMs = options.maxWaitMs ?? DEFAULT_MAX_WAIT_MS
    this.clock = options.clock ?? systemClock
  }

  async run(parameters: Record<string, unknown>, options: RunOptions = {}): Promise<TerminalResult> {
    const { signal } = options
    const job: GenerationJob = {
      id: randomUUID(),
      remoteId: null,
      parameters,
      state: 'created',
      attempts: 0,
      createdAt: this.clock.now(),
      lastPolledAt: null
    }
    this.activeJobs.set(job.id, job)
    const deadline = this.startDeadline(job, signal)

    try {
      const result = await this.drive(job, deadline, signal)
      logger.info('Generation finished', {
        jobId: job.id,
        remoteId: job.remoteId,
        state: result.state,
        elapsedMs: result.elapsedMs,
        attempts: result.attempts
      })
      return result
    } catch (err) {
      const error = toAssetJobError(err)
      logger.error('Generation aborted by unexpected error', { jobId: job.id, state: job.state, error: error.message })
      // The state table may be what threw, so bypass it.
      job.state = 'failed'
      return this.unsuccessful(job, 'failed', error)
    } finally {
      deadline.dispose()
      this.activeJobs.delete(job.id)
    }
  }

  /** Snapshot of jobs currently in flight. */
  getActiveJobs(): ActiveJobInfo[] {
    return [...this.activeJobs.values()].map(({ parameters: _parameters, ...info }) => ({ ...info }))
  }

  private async drive(job: GenerationJob, deadline: JobDeadline, signal?: AbortSignal): Promise<TerminalResult> {
    const parsed = GenerationParametersSchema.safeParse(job.parameters)
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      return this.fail(job, 'failed', AssetJobError.malformed(`Invalid generation parameters: ${issues.join(', ')}`))
    }

    if (signal?.aborted) {
      return this.fail(job, 'cancelled', AssetJobError.cancelled())
    }

    const admission = await this.ledger.checkAdmission()
    if (!admission.allowed) {
      return this.fail(job, 'quota_blocked', admission.error)
    }
    this.transition(job, 'admitted')

    if (signal?.aborted) {
      return this.fail(job, 'cancelled', AssetJobError.cancelled())
    }

    let submitted: SubmittedInference
    try {
      const { value } = await this.executor.execute(
        (attemptSignal) => {
          job.attempts++
          return this.transport.call('createInference', { parameters: parsed.data }, { signal: attemptSignal })
        },
        { operation: 'createInference', idempotent: false, signal: deadline.signal }
      )
      submitted = value
    } catch (err) {
      const error = toAssetJobError(err)
      if (error.code === AssetJobErrorCode.Cancelled) {
        if (deadline.expired() && !signal?.aborted) {
          return this.fail(job, 'timed_out', AssetJobError.timedOut(this.maxWaitMs))
        }
        return this.fail(job, 'cancelled', error)
      }
      logger.error('Submission failed', { jobId: job.id, code: error.code, error: error.message })
      return this.fail(job, 'failed', error)
    }

    job.remoteId = submitted.id
    this.transition(job, 'submitted')
    logger.info('Generation submitted', { jobId: job.id, remoteId: submitted.id, status: submitted.status })
    this.transition(job, 'polling')

    if (submitted.status === 'FAILED' || submitted.status === 'CANCELLED') {
      const outcome = await this.interpret(job, { id: submitted.id, status: submitted.status, files: null })
      if (outcome.kind === 'terminal') {
        return outcome.result
      }
    }

    return this.pollUntilTerminal(job, submitted.id, deadline, signal)
  }

  /**
   * Polls until the remote job settles. The deadline signal cuts short an
   * in-flight poll and its backoff when the wait budget runs out.
   */
  private async pollUntilTerminal(
    job: GenerationJob,
    remoteId: string,
    deadline: JobDeadline,
    signal?: AbortSignal
  ): Promise<TerminalResult> {
    let lastTransient: AssetJobError | undefined

    for (;;) {
      if (signal?.aborted) {
        return this.fail(job, 'cancelled', AssetJobError.cancelled())
      }
      if (this.budgetExhausted(job)) {
        return this.fail(job, 'timed_out', AssetJobError.timedOut(this.maxWaitMs, lastTransient))
      }

      await this.clock.sleep(Math.min(this.pollIntervalMs, this.remainingBudget(job)), deadline.signal)

      if (signal?.aborted) {
        return this.fail(job, 'cancelled', AssetJobError.cancelled())
      }
      if (this.budgetExhausted(job)) {
        return this.fail(job, 'timed_out', AssetJobError.timedOut(this.maxWaitMs, lastTransient))
      }

      let status: InferenceStatus
      try {
        const { value } = await this.executor.execute(
          (attemptSignal) => {
            job.attempts++
            return this.transport.call('getInference', { inferenceId: remoteId }, { signal: attemptSignal })
          },
          { operation: 'getInference', idempotent: true, signal: deadline.signal }
        )
        job.lastPolledAt = this.clock.now()
        status = value
      } catch (err) {
        const error = toAssetJobError(err)

        if (error.code === AssetJobErrorCode.Cancelled) {
          if (deadline.expired() && !signal?.aborted) {
            return this.fail(job, 'timed_out', AssetJobError.timedOut(this.maxWaitMs, lastTransient))
          }
          return this.fail(job, 'cancelled', error)
        }
        if (TRANSIENT_POLL_CODES.has(error.code)) {
          lastTransient = error
          logger.warn('Status poll failed, will retry at next interval', {
            jobId: job.id,
            remoteId,
            code: error.code,
            error: error.message
          })
          continue
        }

        logger.error('Status poll failed permanently', { jobId: job.id, remoteId, code: error.code })
        return this.fail(job, 'failed', error)
      }

      logger.debug('Polled generation status', { jobId: job.id, remoteId, status: status.status })
      const outcome = await this.interpret(job, status)
      if (outcome.kind === 'terminal') {
        return outcome.result
      }
    }
  }

  private async interpret(job: GenerationJob, status: InferenceStatus): Promise<PollOutcome> {
    switch (status.status) {
      case 'PENDING':
      case 'IN_PROGRESS':
        return { kind: 'pending' }

      case 'FAILED':
        return { kind: 'terminal', result: this.fail(job, 'failed', AssetJobError.generationFailed(status.id, status.status)) }

      case 'CANCELLED':
        return {
          kind: 'terminal',
          result: this.fail(job, 'cancelled', AssetJobError.cancelled(`Remote generation ${status.id} was cancelled`))
        }

      case 'COMPLETE': {
        const files = this.extractFiles(status)
        if (!files) {
          return {
            kind: 'terminal',
            result: this.fail(
              job,
              'failed',
              AssetJobError.malformed(`Generation ${status.id} reported completion without usable result files`)
            )
          }
        }
        return { kind: 'terminal', result: await this.succeed(job, status.id, files) }
      }
    }
  }

  /**
   * Completion is only trusted with at least one file and a URL on every file.
   */
  private extractFiles(status: InferenceStatus): GeneratedFile[] | null {
    const files = status.files ?? []
    if (files.length === 0) {
      return null
    }

    const result: GeneratedFile[] = []
    for (const file of files) {
      if (!file.url) {
        return null
      }
      result.push({ id: file.id, url: file.url, name: file.name ?? null })
    }
    return result
  }

  private async succeed(job: GenerationJob, remoteId: string, files: GeneratedFile[]): Promise<TerminalResult> {
    let usage: UsageOutcome
    try {
      usage = { committed: true, snapshot: await this.ledger.commit() }
    } catch (err) {
      const error = toAssetJobError(err)
      logger.error('Generation succeeded but usage could not be committed', {
        jobId: job.id,
        remoteId,
        code: error.code,
        error: error.message
      })
      usage = { committed: false, error }
    }

    this.transition(job, 'succeeded')
    return {
      state: 'succeeded',
      jobId: job.id,
      remoteId,
      files,
      elapsedMs: this.clock.now() - job.createdAt,
      attempts: job.attempts,
      usage
    }
  }

  private fail(job: GenerationJob, state: UnsuccessfulResult['state'], error: AssetJobError): UnsuccessfulResult {
    this.transition(job, state)
    return this.unsuccessful(job, state, error)
  }

  private unsuccessful(job: GenerationJob, state: UnsuccessfulResult['state'], error: AssetJobError): UnsuccessfulResult {
    return {
      state,
      jobId: job.id,
      remoteId: job.remoteId,
      error,
      elapsedMs: this.clock.now() - job.createdAt,
      attempts: job.attempts
    }
  }

  private budgetExhausted(job: GenerationJob): boolean {
    return this.remainingBudget(job) === 0
  }

  private remainingBudget(job: GenerationJob): number {
    return Math.max(0, this.maxWaitMs - (this.clock.now() - job.createdAt))
  }

  private startDeadline(job: GenerationJob, callerSignal?: AbortSignal): JobDeadline {
    const controller = new AbortController()
    let expired = false
    const cancelTimer = this.clock.setTimer(this.remainingBudget(job), () => {
      expired = true
      controller.abort()
    })
    const onCallerAbort = (): void => controller.abort()

    if (callerSignal?.aborted) {
      controller.abort()
    } else {
      callerSignal?.addEventListener('abort', onCallerAbort, { once: true })
    }

    return {
      signal: controller.signal,
      expired: () => expired,
      dispose: () => {
        cancelTimer()
        callerSignal?.removeEventListener('abort', onCallerAbort)
      }
    }
  }

  /**
   * @throws If the move is not in {@link JOB_TRANSITIONS}.
   */
  private transition(job: GenerationJob, next: JobState): void {
    if (!JOB_TRANSITIONS[job.state].includes(next)) {
      throw new Error(`Illegal job transition ${job.state} -> ${next} for job ${job.id}`)
    }
    logger.debug('Job state changed', { jobId: job.id, from: job.state, to: next })
    job.state = next
  }
}
