import { describe, it, expect, vi, beforeEach } from 'vitest'
import { act, renderHook } from '@testing-library/react'
import { AxiosError } from 'axios'
import { sendChatMessage } from '@/lib/chat-api'
import type { DisplayMessage } from '@/types/chat'
import { GREETING, GREETING_ID, toHistory, useSupportChat } from './use-support-chat'

vi.mock('@/lib/chat-api', async (importOriginal) => ({
  ...(await importOriginal<typeof import('@/lib/chat-api')>()),
  sendChatMessage: vi.fn()
}))
const mockedSend = vi.mocked(sendChatMessage)

describe('useSupportChat', () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  it('starts with the greeting and no pending request', () => {
    const { result } = renderHook(() => useSupportChat())

    expect(result.current.isLoading).toBe(false)
    expect(result.current.messages).toHaveLength(1)
    expect(result.current.messages[0]).toMatchObject({ id: GREETING_ID, role: 'assistant', content: GREETING })
  })

  it('appends the user message and the reply', async () => {
    mockedSend.mockResolvedValue({ response: 'Refresh triggered.', actionTaken: 'trigger_identity_refresh' })
    const { result } = renderHook(() => useSupportChat())

    await act(async () => {
      await result.current.sendMessage('  Please refresh Ram  ')
    })

    expect(mockedSend).toHaveBeenCalledWith('Please refresh Ram', [])
    expect(result.current.isLoading).toBe(false)
    expect(result.current.messages.slice(1)).toMatchObject([
      { role: 'user', content: 'Please refresh Ram' },
      { role: 'assistant', content: 'Refresh triggered.', actionTaken: 'trigger_identity_refresh' }
    ])
  })

  it('sends earlier turns as history without the greeting', async () => {
    mockedSend
      .mockResolvedValueOnce({ response: 'Which user?', actionTaken: null })
      .mockResolvedValueOnce({ response: 'Done.', actionTaken: 'trigger_identity_refresh' })
    const { result } = renderHook(() => useSupportChat())

    await act(async () => {
      await result.current.sendMessage('I need a refresh')
    })
    await act(async () => {
      await result.current.sendMessage('Ram')
    })

    expect(mockedSend).toHaveBeenLastCalledWith('Ram', [
      { role: 'user', content: 'I need a refresh', timestamp: expect.any(String) },
      { role: 'assistant', content: 'Which user?', timestamp: expect.any(String) }
    ])
  })

  it('ignores blank messages', async () => {
    const { result } = renderHook(() => useSupportChat())

    await act(async () => {
      await result.current.sendMessage('   ')
    })

    expect(mockedSend).not.toHaveBeenCalled()
    expect(result.current.messages).toHaveLength(1)
  })

  it('adds an error message when the request fails', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined)
    mockedSend.mockRejectedValue(new AxiosError('Network Error', 'ERR_NETWORK'))
    const { result } = renderHook(() => useSupportChat())

    await act(async () => {
      await result.current.sendMessage('Hello')
    })

    expect(result.current.isLoading).toBe(false)
    expect(result.current.messages.at(-1)).toMatchObject({
      role: 'assistant',
      content: 'Error: Cannot connect to backend server. Please make sure the backend is running on http://localhost:3000',
      isError: true
    })
    expect(result.current.messages[1]).toMatchObject({ role: 'user', content: 'Hello', failed: true })
  })

  it('does not resend the turn that failed', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined)
    mockedSend
      .mockRejectedValueOnce(new AxiosError('Network Error', 'ERR_NETWORK'))
      .mockResolvedValueOnce({ response: 'Refresh triggered.', actionTaken: 'trigger_identity_refresh' })
    const { result } = renderHook(() => useSupportChat())

    await act(async () => {
      await result.current.sendMessage('Refresh Ram')
    })
    await act(async () => {
      await result.current.sendMessage('Refresh Ram')
    })

    expect(mockedSend).toHaveBeenLastCalledWith('Refresh Ram', [])
  })
})

describe('toHistory', () => {
  const at = new Date('2025-01-10T09:05:00.000Z')

  it('drops the greeting and failed turns', () => {
    const messages: DisplayMessage[] = [
      { id: GREETING_ID, role: 'assistant', content: GREETING, timestamp: at },
      { id: 'a', role: 'user', content: 'Hi', timestamp: at },
      { id: 'b', role: 'assistant', content: 'Hello!', timestamp: at, actionTaken: null },
      { id: 'c', role: 'user', content: 'Refresh Ram', timestamp: at, failed: true },
      { id: 'd', role: 'assistant', content: 'Error: Server error: 500', timestamp: at, isError: true }
    ]

    expect(toHistory(messages)).toEqual([
      { role: 'user', content: 'Hi', timestamp: '2025-01-10T09:05:00.000Z' },
      { role: 'assistant', content: 'Hello!', timestamp: '2025-01-10T09:05:00.000Z' }
    ])
  })
})
