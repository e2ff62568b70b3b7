import { describe, it, expect } from 'vitest'
import { AxiosError, AxiosHeaders } from 'axios'
import { describeChatError } from './chat-errors'

function httpError(status: number, data: unknown): AxiosError {
  return new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', undefined, {}, {
    status,
    statusText: '',
    data,
    headers: {},
    config: { headers: new AxiosHeaders() }
  })
}

describe('describeChatError', () => {
  describe('backend unreachable', () => {
    it('reports a network error', () => {
      expect(describeChatError(new AxiosError('Network Error', 'ERR_NETWORK'))).toBe(
        'Cannot connect to backend server. Please make sure the backend is running on http://localhost:3000'
      )
    })

    it('reports a refused connection', () => {
      expect(describeChatError(new AxiosError('connect ECONNREFUSED 127.0.0.1:3000', 'ECONNREFUSED'))).toBe(
        'Cannot connect to backend server. Please make sure the backend is running on http://localhost:3000'
      )
    })
  })

  describe('HTTP errors', () => {
    it('uses the message of a NestJS error body', () => {
      const error = httpError(400, { statusCode: 400, message: 'Message must not be empty', error: 'Bad Request' })
      expect(describeChatError(error)).toBe('Message must not be empty')
    })

    it('prefers detail over message', () => {
      const error = httpError(502, { detail: 'LLM request failed: timeout', message: 'Bad Gateway' })
      expect(describeChatError(error)).toBe('LLM request failed: timeout')
    })

    it('joins a list of messages', () => {
      const error = httpError(400, { message: ['message is required', 'history must be an array'] })
      expect(describeChatError(error)).toBe('message is required; history must be an array')
    })

    it('falls back to the status code for a body without text', () => {
      expect(describeChatError(httpError(500, {}))).toBe('Server error: 500')
      expect(describeChatError(httpError(502, ''))).toBe('Server error: 502')
    })
  })

  it('reports a request that got no response', () => {
    const error = new AxiosError('timeout of 60000ms exceeded', 'ECONNABORTED', undefined, {})
    expect(describeChatError(error)).toBe('No response from server. The backend may be down or unreachable.')
  })

  it('uses the message of any other error', () => {
    expect(describeChatError(new Error('boom'))).toBe('boom')
  })

  it('falls back to a generic message', () => {
    expect(describeChatError('boom')).toBe('An unexpected error occurred.')
    expect(describeChatError(new Error(''))).toBe('An unexpected error occurred.')
  })
})
