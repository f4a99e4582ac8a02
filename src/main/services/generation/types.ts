/**
 * Generation job lifecycle types.
 */

import type { AssetJobError } from '../errors/asset-job-error'
import type { LedgerSnapshot } from '../usage/usage-ledger'

/** Lifecycle state of a generation job. */
export type JobState =
  | 'created'
  | 'admitted'
  | 'submitted'
  | 'polling'
  | 'succeeded'
  | 'failed'
  | 'timed_out'
  | 'quota_blocked'
  | 'cancelled'

export type TerminalState = Extract<JobState, 'succeeded' | 'failed' | 'timed_out' | 'quota_blocked' | 'cancelled'>

/** Allowed moves; terminal states have none. */
export const JOB_TRANSITIONS: Readonly<Record<JobState, readonly JobState[]>> = {
  created: ['admitted', 'quota_blocked', 'failed', 'cancelled'],
  admitted: ['submitted', 'failed', 'timed_out', 'cancelled'],
  submitted: ['polling', 'failed', 'cancelled'],
  polling: ['succeeded', 'failed', 'timed_out', 'cancelled'],
  succeeded: [],
  failed: [],
  timed_out: [],
  quota_blocked: [],
  cancelled: []
}

export function isTerminalState(state: JobState): state is TerminalState {
  return JOB_TRANSITIONS[state].length === 0
}

/** In-memory record of one generation request; never persisted. */
export interface GenerationJob {
  id: string
  /** Identifier assigned by the remote service once submission succeeds. */
  remoteId: string | null
  parameters: Record<string, unknown>
  state: JobState
  /** Transport attempts made so far (submission and polls). */
  attempts: number
  createdAt: number
  lastPolledAt: number | null
}

/** Read-only view of an in-flight job. */
export type ActiveJobInfo = Omit<GenerationJob, 'parameters'>

/** A result file whose URL has been verified to be present. */
export interface GeneratedFile {
  id: string
  url: string
  name: string | null
}

export type UsageOutcome =
  | { committed: true; snapshot: LedgerSnapshot }
  | { committed: false; error: AssetJobError }

interface TerminalBase {
  jobId: string
  elapsedMs: number
  attempts: number
}

export interface SucceededResult extends TerminalBase {
  state: 'succeeded'
  remoteId: string
  files: GeneratedFile[]
  usage: UsageOutcome
}

export interface UnsuccessfulResult extends TerminalBase {
  state: Exclude<TerminalState, 'succeeded'>
  remoteId: string | null
  error: AssetJobError
}

export type TerminalResult = SucceededResult | UnsuccessfulResult
