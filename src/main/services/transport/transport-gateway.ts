/**
 * Authenticated GraphQL client for the remote generation service.
 *
 * One {@link TransportGateway.call} issues exactly one HTTPS request and
 * either returns a schema-validated result or throws a typed
 * {@link AssetJobError}: `AuthRejected`, `Malformed`, `Unavailable` or
 * `RateLimited`. Nothing above this layer reads a remote field that has not
 * passed a zod schema.
 */

import type { z } from 'zod'
import type { Credential } from '@shared/schemas/credential.schema'
import {
  CreateInferenceDataSchema,
  GetInferencesDataSchema,
  GraphQLEnvelopeSchema,
  type GenerationParameters,
  type InferenceStatus,
  type SubmittedInference
} from '@shared/schemas/inference.schema'
import { LogRing } from '../diagnostics/log-ring'
import { AssetJobError } from '../errors/asset-job-error'
import { CREATE_INFERENCE_MUTATION, GET_INFERENCE_STATUS_QUERY } from './documents'

const logger = LogRing.getInstance()

export const DEFAULT_REQUEST_TIMEOUT_MS = 60_000

/** Connection errors raised before a request could have been sent. */
const UNDELIVERED_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'UND_ERR_CONNECT_TIMEOUT'
])

const AUTH_GRAPHQL_CODES = new Set(['UNAUTHENTICATED', 'FORBIDDEN'])

/** Operations the gateway knows, with their payload and result types. */
export interface GatewayOperations {
  createInference: { payload: { parameters: GenerationParameters }; result: SubmittedInference }
  getInference: { payload: { inferenceId: string }; result: InferenceStatus }
}

export type GatewayOperation = keyof GatewayOperations

interface OperationDescriptor<O extends GatewayOperation> {
  document: string
  variables(payload: GatewayOperations[O]['payload'], workspaceId: string): Record<string, unknown>
  parse(data: unknown, payload: GatewayOperations[O]['payload']): GatewayOperations[O]['result']
}

function parseData<S extends z.ZodTypeAny>(schema: S, data: unknown, operation: string): z.infer<S> {
  const result = schema.safeParse(data)
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
    throw AssetJobError.malformed(`Unexpected ${operation} response shape: ${issues.join(', ')}`)
  }
  return result.data
}

const OPERATIONS: { [O in GatewayOperation]: OperationDescriptor<O> } = {
  createInference: {
    document: CREATE_INFERENCE_MUTATION,
    variables: (payload, workspaceId) => ({
      input: { workspaceId, parameters: payload.parameters }
    }),
    parse: (data) => {
      const { createInference } = parseData(CreateInferenceDataSchema, data, 'createInference')
      if ('message' in createInference) {
        throw AssetJobError.malformed(`Remote service refused the generation: ${createInference.message}`)
      }
      return createInference
    }
  },
  getInference: {
    document: GET_INFERENCE_STATUS_QUERY,
    variables: (payload) => ({
      input: { inferenceIds: [payload.inferenceId] }
    }),
    parse: (data, payload) => {
      const { getInferencesById } = parseData(GetInferencesDataSchema, data, 'getInference')
      if ('message' in getInferencesById) {
        throw AssetJobError.malformed(`Remote service refused the status query: ${getInferencesById.message}`)
      }
      const inference = getInferencesById.inferences.find((i) => i.id === payload.inferenceId)
      if (!inference) {
        throw AssetJobError.malformed(`Inference ${payload.inferenceId} missing from status response`)
      }
      return inference
    }
  }
}

export interface TransportGatewayOptions {
  endpoint: string
  credential: Credential
  requestTimeoutMs?: number
  /** Replaceable for tests; defaults to the global fetch. */
  fetchImpl?: typeof fetch
}

export interface CallOptions {
  signal?: AbortSignal
}

export class TransportGateway {
  private readonly endpoint: URL
  private readonly credential: Credential
  private readonly requestTimeoutMs: number
  private readonly fetchImpl: typeof fetch

  /**
   * @throws {AssetJobError} `Configuration` for a non-HTTPS endpoint (plain
   *   HTTP is only accepted for loopback hosts).
   */
  constructor(options: TransportGatewayOptions) {
    let endpoint: URL
    try {
      endpoint = new URL(options.endpoint)
    } catch {
      throw AssetJobError.configuration(`Invalid API endpoint: ${options.endpoint}`)
    }

    const loopback = ['localhost', '127.0.0.1', '[::1]'].includes(endpoint.hostname)
    if (endpoint.protocol !== 'https:' && !(endpoint.protocol === 'http:' && loopback)) {
      throw AssetJobError.configuration(`API endpoint must use HTTPS: ${endpoint.origin}`)
    }

    this.endpoint = endpoint
    this.credential = options.credential
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS
    this.fetchImpl = options.fetchImpl ?? fetch
  }

  /**
   * Issues one authenticated request for `operation`.
   *
   * @throws {AssetJobError} Transport-category errors, or `Cancelled` when
   *   `options.signal` aborts the request.
   */
  async call<O extends GatewayOperation>(
    operation: O,
    payload: GatewayOperations[O]['payload'],
    options: CallOptions = {}
  ): Promise<GatewayOperations[O]['result']> {
    const descriptor: OperationDescriptor<O> = OPERATIONS[operation]
    const body = JSON.stringify({
      query: descriptor.document,
      variables: descriptor.variables(payload, this.credential.workspaceId)
    })

    const response = await this.send(operation, body, options.signal)
    const data = await this.readData(operation, response)
    return descriptor.parse(data, payload)
  }

  private async send(operation: string, body: string, signal?: AbortSignal): Promise<Response> {
    if (signal?.aborted) {
      throw AssetJobError.cancelled()
    }

    const controller = new AbortController()
    let timedOut = false
    const timer = setTimeout(() => {
      timedOut = true
      controller.abort()
    }, this.requestTimeoutMs)
    const onCallerAbort = (): void => controller.abort()
    signal?.addEventListener('abort', onCallerAbort, { once: true })

    try {
      return await this.fetchImpl(this.endpoint, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.credential.token}`,
          'Content-Type': 'application/json',
          Accept: 'application/json'
        },
        body,
        signal: controller.signal
      })
    } catch (err) {
      if (timedOut) {
        logger.warn('Request timed out', { operation, timeoutMs: this.requestTimeoutMs })
        throw AssetJobError.unavailable(`${operation} timed out after ${this.requestTimeoutMs}ms`, {
          delivered: true,
          cause: err instanceof Error ? err : undefined
        })
      }
      if (signal?.aborted) {
        throw AssetJobError.cancelled()
      }

      const code = networkErrorCode(err)
      const delivered = code === undefined || !UNDELIVERED_ERROR_CODES.has(code)
      logger.warn('Request failed before a response', { operation, code, delivered })
      throw AssetJobError.unavailable(`${operation} could not reach the remote service${code ? ` (${code})` : ''}`, {
        delivered,
        cause: err instanceof Error ? err : undefined
      })
    } finally {
      clearTimeout(timer)
      signal?.removeEventListener('abort', onCallerAbort)
    }
  }

  private async readData(operation: string, response: Response): Promise<unknown> {
    const { status } = response

    if (status === 401 || status === 403) {
      throw AssetJobError.authRejected(status)
    }
    if (status === 429) {
      throw AssetJobError.rateLimited(parseRetryAfter(response.headers.get('retry-after')))
    }
    if (status === 408 || status >= 500) {
      throw AssetJobError.unavailable(`${operation} failed with HTTP ${status}`, { statusCode: status, delivered: true })
    }
    if (status < 200 || status >= 300) {
      throw AssetJobError.malformed(`${operation} failed with HTTP ${status}`, status)
    }

    let json: unknown
    try {
      json = JSON.parse(await response.text())
    } catch {
      throw AssetJobError.malformed(`${operation} response is not valid JSON`, status)
    }

    const envelope = GraphQLEnvelopeSchema.safeParse(json)
    if (!envelope.success) {
      throw AssetJobError.malformed(`${operation} response is not a GraphQL result`, status)
    }

    const errors = envelope.data.errors ?? []
    if (errors.length > 0) {
      if (errors.some((e) => AUTH_GRAPHQL_CODES.has(e.extensions?.code ?? ''))) {
        throw AssetJobError.authRejected(status)
      }
      throw AssetJobError.malformed(`GraphQL error: ${errors[0].message}`, status)
    }

    if (envelope.data.data === undefined || envelope.data.data === null) {
      throw AssetJobError.malformed(`${operation} response has no data`, status)
    }
    return envelope.data.data
  }
}

function networkErrorCode(err: unknown): string | undefined {
  const candidates: unknown[] = [err, err instanceof Error ? err.cause : undefined]
  for (const candidate of candidates) {
    if (candidate instanceof Error && 'code' in candidate && typeof candidate.code === 'string') {
      return candidate.code
    }
  }
  return undefined
}

/**
 * Parses a `Retry-After` header given in seconds or as an HTTP date.
 *
 * @returns Delay in milliseconds, or `undefined` when absent or unparsable.
 */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | undefined {
  if (header === null || header.trim() === '') {
    return undefined
  }

  const seconds = Number(header)
  if (Number.isFinite(seconds) && seconds >= 0) {
    return Math.round(seconds * 1000)
  }

  const date = Date.parse(header)
  if (Number.isNaN(date)) {
    return undefined
  }
  return Math.max(0, date - now)
}
