import { beforeEach, describe, expect, it, vi } from 'vitest'
import type { Mock } from 'vitest'
import { TelegramNotifier } from '../../src/integrations/telegram/notifier.js'
import type { TelegramCredentials } from '../../src/integrations/telegram/types.js'

type FetchArgs = [input: string | URL | Request, init?: RequestInit]

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status })
}

function sentMessage(): Response {
  return jsonResponse({ ok: true, result: { message_id: 1, date: 0, chat: { id: 1001, type: 'private' } } })
}

function requestBody(call: FetchArgs | undefined): unknown {
  const body = call?.[1]?.body
  return typeof body === 'string' ? JSON.parse(body) : undefined
}

describe('TelegramNotifier', () => {
  const sleep = vi.fn(async (_ms: number) => undefined)
  let fetchMock: Mock<(...args: FetchArgs) => Promise<Response>>
  let credentials: TelegramCredentials

  function makeNotifier(threadId?: number): TelegramNotifier {
    return new TelegramNotifier({ credentials: () => credentials, threadId, sleep })
  }

  beforeEach(() => {
    sleep.mockClear()
    credentials = { botToken: 'test-token', chatId: '1001' }
    fetchMock = vi.fn<(...args: FetchArgs) => Promise<Response>>()
    vi.stubGlobal('fetch', fetchMock)
  })

  it('sends an HTML message to the configured chat', async () => {
    fetchMock.mockResolvedValueOnce(sentMessage())

    await expect(makeNotifier(7).send('<b>hi</b>')).resolves.toBe(true)

    expect(fetchMock.mock.calls[0]?.[0]).toBe('https://api.telegram.org/bottest-token/sendMessage')
    expect(requestBody(fetchMock.mock.calls[0])).toEqual({
      chat_id: '1001',
      message_thread_id: 7,
      text: '<b>hi</b>',
      parse_mode: 'HTML',
      disable_web_page_preview: true,
    })
  })

  it('skips delivery when credentials are missing', async () => {
    credentials = { botToken: 'test-token' }
    const notifier = makeNotifier()

    expect(notifier.isConfigured()).toBe(false)
    await expect(notifier.send('hello')).resolves.toBe(false)
    expect(fetchMock).not.toHaveBeenCalled()
  })

  it('does not retry when Telegram rejects the message', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({
      ok: false,
      error_code: 400,
      description: 'Bad Request: chat not found',
    }, 400))

    await expect(makeNotifier().send('hello')).resolves.toBe(false)
    expect(fetchMock).toHaveBeenCalledTimes(1)
    expect(sleep).not.toHaveBeenCalled()
  })

  it('retries transport failures up to three attempts', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'))

    await expect(makeNotifier().send('hello')).resolves.toBe(false)
    expect(fetchMock).toHaveBeenCalledTimes(3)
    expect(sleep).toHaveBeenCalledTimes(2)
    expect(sleep).toHaveBeenCalledWith(2000)
  })

  it('delivers once a retry gets through', async () => {
    fetchMock
      .mockRejectedValueOnce(new TypeError('fetch failed'))
      .mockResolvedValueOnce(sentMessage())

    await expect(makeNotifier().send('hello')).resolves.toBe(true)
    expect(fetchMock).toHaveBeenCalledTimes(2)
  })

  it('delivers concurrent sends in call order', async () => {
    fetchMock.mockImplementation(async () => sentMessage())
    const notifier = makeNotifier()

    await Promise.all([notifier.send('first'), notifier.send('second'), notifier.send('third')])

    const texts = fetchMock.mock.calls.map((call) => {
      const body = requestBody(call)
      return typeof body === 'object' && body !== null && 'text' in body ? body.text : undefined
    })
    expect(texts).toEqual(['first', 'second', 'third'])
  })

  it('picks up changed credentials on the next send', async () => {
    fetchMock.mockImplementation(async () => sentMessage())
    const notifier = makeNotifier()

    await notifier.send('one')
    credentials = { botToken: 'other-token', chatId: '2002' }
    await notifier.send('two')

    expect(fetchMock.mock.calls[1]?.[0]).toBe('https://api.telegram.org/botother-token/sendMessage')
    expect(requestBody(fetchMock.mock.calls[1])).toMatchObject({ chat_id: '2002', text: 'two' })
  })
})
