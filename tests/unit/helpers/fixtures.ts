import { AssetJobError } from '../../../src/main/services/errors/asset-job-error'
import type { Clock } from '../../../src/main/services/resilience/clock'
import type { Credential } from '../../../src/shared/schemas/credential.schema'

export const TEST_TOKEN = `pat_${'a'.repeat(60)}`
export const TEST_WORKSPACE_ID = '00000000-0000-4000-8000-000000000001'

export function testCredential(overrides: Partial<Credential> = {}): Credential {
  return { token: TEST_TOKEN, workspaceId: TEST_WORKSPACE_ID, ...overrides }
}

/** Awaits a promise that must reject with an AssetJobError and returns it. */
export async function captureError(promise: Promise<unknown>): Promise<AssetJobError> {
  try {
    await promise
  } catch (err) {
    if (err instanceof AssetJobError) {
      return err
    }
    throw new Error(`Expected AssetJobError, got ${err instanceof Error ? err.message : String(err)}`)
  }
  throw new Error('Expected promise to reject')
}

/**
 * Clock whose sleeps advance virtual time instantly. Every requested delay
 * is recorded in `sleeps`; timers fire as virtual time passes them.
 */
export class FakeClock implements Clock {
  readonly sleeps: number[] = []
  private timers: { at: number; callback: () => void }[] = []

  constructor(private current = 0) {}

  now(): number {
    return this.current
  }

  advance(ms: number): void {
    this.current += ms
    const due = this.timers.filter((t) => t.at <= this.current)
    this.timers = this.timers.filter((t) => t.at > this.current)
    for (const timer of due) {
      timer.callback()
    }
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    this.sleeps.push(ms)
    if (signal?.aborted) {
      return
    }
    this.advance(ms)
  }

  setTimer(ms: number, callback: () => void): () => void {
    const timer = { at: this.current + ms, callback }
    this.timers.push(timer)
    return () => {
      this.timers = this.timers.filter((t) => t !== timer)
    }
  }
}
