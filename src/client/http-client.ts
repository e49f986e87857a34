/**
 * Fetch based transport for the transactional HTTP endpoint
 * This is an internal module used by the client and transactions
 */

import type { AuthToken } from '../types'
import { authorizationHeader } from '../auth'
import { NetworkError, TimeoutError } from './errors'
import type { Transport, TransportRequest, TransportResponse } from './types'

/**
 * Network error codes from Node.js
 */
const NETWORK_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ENOTFOUND',
  'ETIMEDOUT',
  'ECONNRESET',
  'ENETUNREACH',
  'EHOSTUNREACH',
  'EPIPE',
  'ECONNABORTED',
])

function errorCode(error: Error): string | undefined {
  const code: unknown = Reflect.get(error, 'code')
  return typeof code === 'string' ? code : undefined
}

/**
 * Check if an error is a network-related error
 */
function isNetworkError(error: Error): boolean {
  // AbortError is used for timeouts
  if (error.name === 'AbortError') {
    return false
  }

  if (error instanceof DOMException && error.name === 'NetworkError') {
    return true
  }

  const code = errorCode(error)
  if (code && NETWORK_ERROR_CODES.has(code)) {
    return true
  }

  // All TypeErrors from fetch are network errors; engines word them differently
  return error.name === 'TypeError'
}

/**
 * Fetch transport configuration
 */
export interface FetchTransportConfig {
  auth?: AuthToken
  fetch?: typeof fetch
  timeout?: number
  headers?: Record<string, string>
}

/**
 * Transport that performs requests with the Fetch API
 */
export class FetchTransport implements Transport {
  private readonly auth?: AuthToken
  private readonly fetchFn: typeof fetch
  private readonly timeout: number
  private readonly customHeaders: Record<string, string>

  constructor(config: FetchTransportConfig = {}) {
    this.auth = config.auth
    this.fetchFn = config.fetch ?? globalThis.fetch
    this.timeout = config.timeout ?? 30000
    this.customHeaders = config.headers ?? {}

    if (!this.fetchFn) {
      throw new Error(
        'No fetch implementation available. ' +
        'Please provide a custom fetch function in the config.'
      )
    }
  }

  /**
   * Perform one request. Resolves with the status and decoded body for every
   * HTTP answer; rejects only with NetworkError or TimeoutError.
   */
  async send(request: TransportRequest): Promise<TransportResponse> {
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), this.timeout)

    try {
      const response = await this.fetchFn(request.url, {
        method: request.method,
        headers: this.buildHeaders(),
        body: request.body !== undefined ? JSON.stringify(request.body) : undefined,
        signal: controller.signal,
      })

      return {
        status: response.status,
        body: await readJsonBody(response),
        location: response.headers.get('location') ?? undefined,
      }
    } catch (error) {
      if (error instanceof Error) {
        if (error.name === 'AbortError') {
          throw new TimeoutError(this.timeout, `${request.method} ${request.url}`)
        }
        if (isNetworkError(error)) {
          throw new NetworkError(`Failed to fetch ${request.url}`, error)
        }
      }
      throw error
    } finally {
      clearTimeout(timeoutId)
    }
  }

  /**
   * Build headers for a request
   */
  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'Accept': 'application/json',
      ...this.customHeaders,
    }

    if (this.auth) {
      headers['Authorization'] = authorizationHeader(this.auth)
    }

    return headers
  }
}

/**
 * Decode a JSON body. An empty body decodes to `undefined`; a body that is not
 * JSON is returned as text, so the codec can reject it.
 */
async function readJsonBody(response: Response): Promise<unknown> {
  const text = await response.text()
  if (!text) {
    return undefined
  }

  const contentType = response.headers.get('content-type')
  if (contentType && !contentType.includes('json')) {
    return text
  }

  try {
    const body: unknown = JSON.parse(text)
    return body
  } catch {
    // Truncated or not JSON at all
    return text
  }
}
