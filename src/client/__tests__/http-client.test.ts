/**
 * FetchTransport tests
 *
 * Network failures are classified by error name and code, never by message,
 * since every engine words fetch failures differently.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import type { Mock } from 'vitest'
import { FetchTransport } from '../http-client'
import { NetworkError, TimeoutError } from '../errors'
import { auth } from '../../auth'

function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json', ...headers },
  })
}

describe('FetchTransport', () => {
  let mockFetch: Mock<typeof fetch>

  beforeEach(() => {
    mockFetch = vi.fn<typeof fetch>()
  })

  afterEach(() => {
    vi.useRealTimers()
    vi.restoreAllMocks()
  })

  describe('requests', () => {
    it('should send the method, JSON body and headers', async () => {
      mockFetch.mockResolvedValue(jsonResponse({ results: [], errors: [] }))
      const transport = new FetchTransport({ fetch: mockFetch, headers: { 'X-Trace': 'abc' } })

      await transport.send({
        method: 'POST',
        url: 'http://localhost:7474/db/neo4j/tx/commit',
        body: { statements: [{ statement: 'RETURN 1', parameters: {} }] },
      })

      expect(mockFetch).toHaveBeenCalledTimes(1)
      const [url, init] = mockFetch.mock.calls[0]
      expect(url).toBe('http://localhost:7474/db/neo4j/tx/commit')
      expect(init?.method).toBe('POST')
      expect(init?.body).toBe('{"statements":[{"statement":"RETURN 1","parameters":{}}]}')
      expect(init?.headers).toEqual({
        'Content-Type': 'application/json',
        'Accept': 'application/json',
        'X-Trace': 'abc',
      })
    })

    it('should send no body when the request has none', async () => {
      mockFetch.mockResolvedValue(jsonResponse({ results: [], errors: [] }))
      const transport = new FetchTransport({ fetch: mockFetch })

      await transport.send({ method: 'DELETE', url: 'http://localhost:7474/db/neo4j/tx/3' })

      expect(mockFetch.mock.calls[0][1]?.body).toBeUndefined()
    })

    it('should add a basic Authorization header', async () => {
      mockFetch.mockResolvedValue(jsonResponse({}))
      const transport = new FetchTransport({
        fetch: mockFetch,
        auth: auth.basic('neo4j', 'test-secret'),
      })

      await transport.send({ method: 'GET', url: 'http://localhost:7474/db/data' })

      const headers = mockFetch.mock.calls[0][1]?.headers
      expect(headers).toMatchObject({
        Authorization: `Basic ${Buffer.from('neo4j:test-secret').toString('base64')}`,
      })
    })

    it('should add a bearer Authorization header', async () => {
      mockFetch.mockResolvedValue(jsonResponse({}))
      const transport = new FetchTransport({ fetch: mockFetch, auth: auth.bearer('test-token') })

      await transport.send({ method: 'GET', url: 'http://localhost:7474/db/data' })

      expect(mockFetch.mock.calls[0][1]?.headers).toMatchObject({ Authorization: 'Bearer test-token' })
    })
  })

  describe('responses', () => {
    it('should return status, decoded body and location', async () => {
      mockFetch.mockResolvedValue(
        jsonResponse({ commit: 'http://localhost:7474/db/neo4j/tx/9/commit' }, 201, {
          location: 'http://localhost:7474/db/neo4j/tx/9',
        })
      )
      const transport = new FetchTransport({ fetch: mockFetch })

      const response = await transport.send({ method: 'POST', url: 'http://localhost:7474/db/neo4j/tx' })

      expect(response).toEqual({
        status: 201,
        body: { commit: 'http://localhost:7474/db/neo4j/tx/9/commit' },
        location: 'http://localhost:7474/db/neo4j/tx/9',
      })
    })

    it('should return error statuses instead of rejecting', async () => {
      mockFetch.mockResolvedValue(jsonResponse({ errors: [] }, 500))
      const transport = new FetchTransport({ fetch: mockFetch })

      const response = await transport.send({ method: 'GET', url: 'http://localhost:7474/db/data' })

      expect(response.status).toBe(500)
      expect(response.location).toBeUndefined()
    })

    it('should decode an empty body as undefined', async () => {
      mockFetch.mockResolvedValue(new Response('', { status: 404 }))
      const transport = new FetchTransport({ fetch: mockFetch })

      const response = await transport.send({ method: 'DELETE', url: 'http://localhost:7474/db/neo4j/tx/1' })

      expect(response.status).toBe(404)
      expect(response.body).toBeUndefined()
    })

    it('should return a non-JSON body as text', async () => {
      mockFetch.mockResolvedValue(
        new Response('<html>Bad Gateway</html>', { status: 502, headers: { 'content-type': 'text/html' } })
      )
      const transport = new FetchTransport({ fetch: mockFetch })

      const response = await transport.send({ method: 'GET', url: 'http://localhost:7474/db/data' })

      expect(response).toEqual({ status: 502, body: '<html>Bad Gateway</html>', location: undefined })
    })

    it('should return a truncated JSON body as text', async () => {
      mockFetch.mockResolvedValue(
        new Response('{"results": [', { status: 200, headers: { 'content-type': 'application/json' } })
      )
      const transport = new FetchTransport({ fetch: mockFetch })

      const response = await transport.send({ method: 'GET', url: 'http://localhost:7474/db/data' })

      expect(response.body).toBe('{"results": [')
    })
  })

  describe('network errors', () => {
    const messages = [
      'fetch failed',
      'Failed to fetch',
      'NetworkError when attempting to fetch resource',
      'Load failed',
      'Connection refused',
    ]

    it.each(messages)('should detect TypeError "%s" as NetworkError', async (message) => {
      mockFetch.mockRejectedValue(new TypeError(message))
      const transport = new FetchTransport({ fetch: mockFetch })

      await expect(
        transport.send({ method: 'GET', url: 'http://localhost:7474/db/data' })
      ).rejects.toThrow(NetworkError)
    })

    it('should detect Node error codes as NetworkError', async () => {
      const error = Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:7474'), { code: 'ECONNREFUSED' })
      mockFetch.mockRejectedValue(error)
      const transport = new FetchTransport({ fetch: mockFetch })

      await expect(
        transport.send({ method: 'GET', url: 'http://localhost:7474/db/data' })
      ).rejects.toThrow('Failed to fetch http://localhost:7474/db/data')
    })

    it('should keep the original error as cause', async () => {
      const original = new TypeError('fetch failed')
      mockFetch.mockRejectedValue(original)
      const transport = new FetchTransport({ fetch: mockFetch })

      const error = await transport
        .send({ method: 'GET', url: 'http://localhost:7474/db/data' })
        .catch((e: unknown) => e)

      expect(error).toBeInstanceOf(NetworkError)
      if (error instanceof NetworkError) {
        expect(error.cause).toBe(original)
        expect(error.code).toBe('NETWORK_ERROR')
      }
    })

    it('should rethrow errors that are not network errors', async () => {
      const original = new Error('Some other error')
      mockFetch.mockRejectedValue(original)
      const transport = new FetchTransport({ fetch: mockFetch })

      await expect(
        transport.send({ method: 'GET', url: 'http://localhost:7474/db/data' })
      ).rejects.toBe(original)
    })
  })

  describe('timeouts', () => {
    it('should map an AbortError to TimeoutError', async () => {
      mockFetch.mockRejectedValue(new DOMException('The operation was aborted', 'AbortError'))
      const transport = new FetchTransport({ fetch: mockFetch, timeout: 5000 })

      await expect(
        transport.send({ method: 'POST', url: 'http://localhost:7474/db/neo4j/tx' })
      ).rejects.toThrow('POST http://localhost:7474/db/neo4j/tx timed out after 5000ms')
    })

    it('should abort the request when the timeout elapses', async () => {
      vi.useFakeTimers()
      mockFetch.mockImplementation((_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => {
            reject(new DOMException('The operation was aborted', 'AbortError'))
          })
        })
      )
      const transport = new FetchTransport({ fetch: mockFetch, timeout: 100 })

      const pending = transport.send({ method: 'GET', url: 'http://localhost:7474/db/data' })
      const assertion = expect(pending).rejects.toThrow(TimeoutError)
      await vi.advanceTimersByTimeAsync(100)
      await assertion
    })
  })
})
