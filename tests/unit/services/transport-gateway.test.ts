import { describe, it, expect, vi } from 'vitest'

vi.mock('../../../src/main/services/diagnostics/log-ring', () => ({
  LogRing: {
    getInstance: () => ({
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      debug: vi.fn()
    })
  }
}))

import { TransportGateway, parseRetryAfter } from '../../../src/main/services/transport/transport-gateway'
import { AssetJobErrorCode } from '../../../src/main/services/errors/asset-job-error'
import { captureError, testCredential, TEST_TOKEN, TEST_WORKSPACE_ID } from '../helpers/fixtures'

const ENDPOINT = 'https://api.example.test/graphql'

type FetchInput = string | URL | Request

function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), { status: 200, ...init })
}

function stubFetch(...replies: Array<Response | Error>) {
  return vi.fn(async (_input: FetchInput, _init?: RequestInit): Promise<Response> => {
    const next = replies.shift()
    if (next === undefined) {
      throw new Error('unexpected fetch')
    }
    if (next instanceof Error) {
      throw next
    }
    return next
  })
}

function gatewayWith(fetchImpl: typeof fetch, requestTimeoutMs?: number): TransportGateway {
  return new TransportGateway({ endpoint: ENDPOINT, credential: testCredential(), fetchImpl, requestTimeoutMs })
}

function networkError(code: string): Error {
  const cause: NodeJS.ErrnoException = new Error(`connect ${code}`)
  cause.code = code
  return new TypeError('fetch failed', { cause })
}

const submitted = { id: 'inf-1', status: 'IN_PROGRESS', createdAt: '2026-10-19T10:00:00Z' }

describe('TransportGateway', () => {
  describe('construction', () => {
    it('should refuse a plain-HTTP remote endpoint', () => {
      expect(
        () => new TransportGateway({ endpoint: 'http://api.example.test/graphql', credential: testCredential() })
      ).toThrow('API endpoint must use HTTPS: http://api.example.test')
    })

    it('should accept plain HTTP on loopback', () => {
      expect(
        () => new TransportGateway({ endpoint: 'http://127.0.0.1:4000/graphql', credential: testCredential() })
      ).not.toThrow()
    })

    it('should refuse an unparsable endpoint', () => {
      expect(() => new TransportGateway({ endpoint: 'not a url', credential: testCredential() })).toThrow(
        'Invalid API endpoint: not a url'
      )
    })
  })

  describe('createInference', () => {
    it('should POST the mutation with bearer auth and the workspace', async () => {
      const fetchImpl = stubFetch(jsonResponse({ data: { createInference: submitted } }))
      const gateway = gatewayWith(fetchImpl)

      const result = await gateway.call('createInference', { parameters: { prompt: 'lantern', seed: 7 } })

      expect(result).toEqual(submitted)
      expect(fetchImpl).toHaveBeenCalledTimes(1)
      const [url, init] = fetchImpl.mock.calls[0]
      expect(String(url)).toBe(ENDPOINT)
      expect(init?.method).toBe('POST')
      expect(init?.headers).toMatchObject({ Authorization: `Bearer ${TEST_TOKEN}` })
      const body = JSON.parse(String(init?.body))
      expect(body.query).toContain('mutation CreateInference')
      expect(body.variables).toEqual({
        input: { workspaceId: TEST_WORKSPACE_ID, parameters: { prompt: 'lantern', seed: 7 } }
      })
    })

    it('should map an error member of the result union to Malformed', async () => {
      const gateway = gatewayWith(stubFetch(jsonResponse({ data: { createInference: { message: 'Insufficient credits' } } })))

      const error = await captureError(gateway.call('createInference', { parameters: { prompt: 'lantern' } }))

      expect(error.code).toBe(AssetJobErrorCode.Malformed)
      expect(error.message).toBe('Remote service refused the generation: Insufficient credits')
    })
  })

  describe('getInference', () => {
    it('should return the requested inference with its files', async () => {
      const gateway = gatewayWith(
        stubFetch(
          jsonResponse({
            data: {
              getInferencesById: {
                inferences: [
                  {
                    id: 'inf-1',
                    status: 'COMPLETE',
                    files: [{ id: 'f-1', url: 'https://cdn.example.test/f-1.png', name: 'f-1.png' }]
                  }
                ]
              }
            }
          })
        )
      )

      const result = await gateway.call('getInference', { inferenceId: 'inf-1' })

      expect(result).toEqual({
        id: 'inf-1',
        status: 'COMPLETE',
        files: [{ id: 'f-1', url: 'https://cdn.example.test/f-1.png', name: 'f-1.png' }]
      })
    })

    it('should report an inference missing from the response', async () => {
      const gateway = gatewayWith(stubFetch(jsonResponse({ data: { getInferencesById: { inferences: [] } } })))

      const error = await captureError(gateway.call('getInference', { inferenceId: 'inf-9' }))

      expect(error.code).toBe(AssetJobErrorCode.Malformed)
      expect(error.message).toBe('Inference inf-9 missing from status response')
    })

    it('should reject an unknown status value', async () => {
      const gateway = gatewayWith(
        stubFetch(jsonResponse({ data: { getInferencesById: { inferences: [{ id: 'inf-1', status: 'EXPLODED' }] } } }))
      )

      const error = await captureError(gateway.call('getInference', { inferenceId: 'inf-1' }))

      expect(error.code).toBe(AssetJobErrorCode.Malformed)
      expect(error.message.startsWith('Unexpected getInference response shape:')).toBe(true)
    })
  })

  describe('HTTP status mapping', () => {
    it.each([401, 403])('should map %i to AuthRejected', async (status) => {
      const gateway = gatewayWith(stubFetch(jsonResponse({}, { status })))

      const error = await captureError(gateway.call('getInference', { inferenceId: 'inf-1' }))

      expect(error.code).toBe(AssetJobErrorCode.AuthRejected)
      expect(error.details.statusCode).toBe(status)
    })

    it('should map 429 to RateLimited with the Retry-After delay', async () => {
      const gateway = gatewayWith(stubFetch(jsonResponse({}, { status: 429, headers: { 'Retry-After': '7' } })))

      const error = await captureError(gateway.call('getInference', { inferenceId: 'inf-1' }))

      expect(error.code).toBe(AssetJobErrorCode.RateLimited)
      expect(error.details.retryAfterMs).toBe(7_000)
      expect(error.isRetryable()).toBe(true)
    })

    it.each([408, 500, 502, 503])('should map %i to a delivered Unavailable', async (status) => {
      const gateway = gatewayWith(stubFetch(jsonResponse({}, { status })))

      const error = await captureError(gateway.call('createInference', { parameters: { prompt: 'lantern' } }))

      expect(error.code).toBe(AssetJobErrorCode.Unavailable)
      expect(error.details).toMatchObject({ statusCode: status, delivered: true })
    })

    it('should map other client errors to Malformed', async () => {
      const gateway = gatewayWith(stubFetch(jsonResponse({}, { status: 400 })))

      const error = await captureError(gateway.call('getInference', { inferenceId: 'inf-1' }))

      expect(error.code).toBe(AssetJobErrorCode.Malformed)
      expect(error.message).toBe('getInference failed with HTTP 400')
      expect(error.isRetryable()).toBe(false)
    })
  })

  describe('response body mapping', () => {
    it('should map a non-JSON body to Malformed', async () => {
      const gateway = gatewayWith(stubFetch(new Response('<html>gateway</html>', { status: 200 })))

      const error = await captureError(gateway.call('getInference', { inferenceId: 'inf-1' }))

      expect(error.message).toBe('getInference response is not valid JSON')
    })

    it('should map authentication GraphQL errors to AuthRejected', async () => {
      const gateway = gatewayWith(
        stubFetch(jsonResponse({ errors: [{ message: 'Token expired', extensions: { code: 'UNAUTHENTICATED' } }] }))
      )

      const error = await captureError(gateway.call('getInference', { inferenceId: 'inf-1' }))

      expect(error.code).toBe(AssetJobErrorCode.AuthRejected)
    })

    it('should map other GraphQL errors to Malformed', async () => {
      const gateway = gatewayWith(stubFetch(jsonResponse({ errors: [{ message: 'Unknown field "files"' }] })))

      const error = await captureError(gateway.call('getInference', { inferenceId: 'inf-1' }))

      expect(error.code).toBe(AssetJobErrorCode.Malformed)
      expect(error.message).toBe('GraphQL error: Unknown field "files"')
    })

    it('should map a result without data to Malformed', async () => {
      const gateway = gatewayWith(stubFetch(jsonResponse({ data: null })))

      const error = await captureError(gateway.call('getInference', { inferenceId: 'inf-1' }))

      expect(error.message).toBe('getInference response has no data')
    })
  })

  describe('connection failures', () => {
    it('should mark a refused connection as not delivered', async () => {
      const gateway = gatewayWith(stubFetch(networkError('ECONNREFUSED')))

      const error = await captureError(gateway.call('createInference', { parameters: { prompt: 'lantern' } }))

      expect(error.code).toBe(AssetJobErrorCode.Unavailable)
      expect(error.message).toBe('createInference could not reach the remote service (ECONNREFUSED)')
      expect(error.details.delivered).toBe(false)
    })

    it('should mark a reset connection as possibly delivered', async () => {
      const gateway = gatewayWith(stubFetch(networkError('ECONNRESET')))

      const error = await captureError(gateway.call('createInference', { parameters: { prompt: 'lantern' } }))

      expect(error.details.delivered).toBe(true)
    })

    it('should turn a request timeout into a delivered Unavailable', async () => {
      const hanging = vi.fn(
        (_input: FetchInput, init?: RequestInit) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')))
          })
      )
      const gateway = gatewayWith(hanging, 10)

      const error = await captureError(gateway.call('getInference', { inferenceId: 'inf-1' }))

      expect(error.code).toBe(AssetJobErrorCode.Unavailable)
      expect(error.message).toBe('getInference timed out after 10ms')
      expect(error.details.delivered).toBe(true)
    })

    it('should report a caller abort as Cancelled without sending', async () => {
      const fetchImpl = stubFetch(jsonResponse({ data: { createInference: submitted } }))
      const controller = new AbortController()
      controller.abort()

      const error = await captureError(
        gatewayWith(fetchImpl).call('createInference', { parameters: { prompt: 'lantern' } }, { signal: controller.signal })
      )

      expect(error.code).toBe(AssetJobErrorCode.Cancelled)
      expect(fetchImpl).not.toHaveBeenCalled()
    })

    it('should report an abort during the request as Cancelled', async () => {
      const controller = new AbortController()
      const hanging = vi.fn(
        (_input: FetchInput, init?: RequestInit) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')))
            controller.abort()
          })
      )

      const error = await captureError(
        gatewayWith(hanging).call('getInference', { inferenceId: 'inf-1' }, { signal: controller.signal })
      )

      expect(error.code).toBe(AssetJobErrorCode.Cancelled)
    })
  })
})

describe('parseRetryAfter', () => {
  it('should read delta seconds', () => {
    expect(parseRetryAfter('120')).toBe(120_000)
  })

  it('should read an HTTP date relative to now', () => {
    const now = Date.parse('Mon, 19 Oct 2026 10:00:00 GMT')
    expect(parseRetryAfter('Mon, 19 Oct 2026 10:00:30 GMT', now)).toBe(30_000)
  })

  it('should clamp a date in the past to zero', () => {
    const now = Date.parse('Mon, 19 Oct 2026 10:00:00 GMT')
    expect(parseRetryAfter('Mon, 19 Oct 2026 09:00:00 GMT', now)).toBe(0)
  })

  it('should ignore absent or unparsable values', () => {
    expect(parseRetryAfter(null)).toBeUndefined()
    expect(parseRetryAfter('')).toBeUndefined()
    expect(parseRetryAfter('soon')).toBeUndefined()
  })
})
