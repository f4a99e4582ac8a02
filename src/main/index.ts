import type { Credential } from '@shared/schemas/credential.schema'
import { loadConfig, type CoreConfig } from './services/config/config'
import { LogRing } from './services/diagnostics/log-ring'
import { JobOrchestrator } from './services/generation/job-orchestrator'
import { getLogsPath, getUsagePath, getVaultPath } from './services/platform/app-paths'
import { CircuitBreaker, type CircuitBreakerConfig } from './services/resilience/circuit-breaker'
import { systemClock, type Clock } from './services/resilience/clock'
import { RetryExecutor, type RetryConfig } from './services/resilience/retry-executor'
import { TransportGateway } from './services/transport/transport-gateway'
import { UsageLedger } from './services/usage/usage-ledger'
import { CredentialVault } from './services/vault/credential-vault'
import { resolveCredential, type ResolvedCredential } from './services/vault/credential-source'

const logger = LogRing.getInstance()

export interface AssetJobCoreOptions {
  /** Environment to read configuration from. Defaults to `process.env`. */
  env?: NodeJS.ProcessEnv
  circuitBreaker?: Partial<CircuitBreakerConfig>
  /** Backoff overrides; `maxAttempts` defaults to ASSET_CORE_MAX_ATTEMPTS. */
  retry?: Partial<RetryConfig>
  clock?: Clock
  random?: () => number
  fetchImpl?: typeof fetch
}

export interface AssetJobCore {
  readonly config: Readonly<CoreConfig>
  readonly vault: CredentialVault
  readonly ledger: UsageLedger
  readonly breaker: CircuitBreaker
  /** Vault first (with a passphrase), then LAYER_API_TOKEN / LAYER_WORKSPACE_ID. */
  resolveCredential(passphrase?: string): Promise<ResolvedCredential>
  /** Orchestrator authenticated with `credential`, sharing the ledger and breaker. */
  createOrchestrator(credential: Credential): JobOrchestrator
}

/**
 * Wires configuration, logging, the vault, the usage ledger and the shared
 * circuit breaker together.
 *
 * @throws {AssetJobError} `Configuration` when the environment is invalid.
 *
 * @example
 * ```ts
 * const core = createAssetJobCore()
 * const { credential } = await core.resolveCredential(passphrase)
 * const result = await core.createOrchestrator(credential).run({ prompt: 'stone golem, isometric' })
 * ```
 */
export function createAssetJobCore(options: AssetJobCoreOptions = {}): AssetJobCore {
  const config = loadConfig(options.env)
  const clock = options.clock ?? systemClock

  logger.configure({ mirrorLevel: config.logLevel, logsDir: getLogsPath(config.dataDir) })

  const vault = new CredentialVault({ directory: getVaultPath(config.dataDir) })
  const ledger = new UsageLedger({ directory: getUsagePath(config.dataDir), limit: config.quotaLimit })
  const breaker = new CircuitBreaker(options.circuitBreaker, clock)

  logger.info('Asset job core initialized', {
    dataDir: config.dataDir,
    apiUrl: config.apiUrl,
    quotaLimit: config.quotaLimit
  })

  return {
    config,
    vault,
    ledger,
    breaker,

    resolveCredential: (passphrase) =>
      resolveCredential({ vault, passphrase, envCredential: config.envCredential }),

    createOrchestrator: (credential) => {
      const transport = new TransportGateway({
        endpoint: config.apiUrl,
        credential,
        requestTimeoutMs: config.requestTimeoutMs,
        fetchImpl: options.fetchImpl
      })
      const executor = new RetryExecutor({
        breaker,
        config: { maxAttempts: config.maxAttempts, ...options.retry },
        clock,
        random: options.random
      })
      return new JobOrchestrator({
        transport,
        executor,
        ledger,
        clock,
        pollIntervalMs: config.pollIntervalMs,
        maxWaitMs: config.maxWaitMs
      })
    }
  }
}

export { loadConfig, type CoreConfig } from './services/config/config'
export { LogRing, type LogEntry, type LogLevel, type LogThreshold } from './services/diagnostics/log-ring'
export { redactSecret } from './services/diagnostics/redact'
export {
  AssetJobError,
  AssetJobErrorCode,
  isAssetJobError,
  type AssetJobErrorCategory,
  type AssetJobErrorDetails
} from './services/errors/asset-job-error'
export { JobOrchestrator, type RunOptions } from './services/generation/job-orchestrator'
export type {
  ActiveJobInfo,
  GeneratedFile,
  JobState,
  SucceededResult,
  TerminalResult,
  UnsuccessfulResult,
  UsageOutcome
} from './services/generation/types'
export { CircuitBreaker, CircuitMode, type CircuitBreakerConfig } from './services/resilience/circuit-breaker'
export { systemClock, type Clock } from './services/resilience/clock'
export { RetryExecutor, type RetryConfig } from './services/resilience/retry-executor'
export { TransportGateway } from './services/transport/transport-gateway'
export { UsageLedger, type LedgerSnapshot } from './services/usage/usage-ledger'
export { CredentialVault } from './services/vault/credential-vault'
export type { ResolvedCredential } from './services/vault/credential-source'
export type { Credential } from '@shared/schemas/credential.schema'
