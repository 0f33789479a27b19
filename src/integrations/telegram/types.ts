import { z } from 'zod'

export const telegramUserSchema = z.object({
  id: z.number(),
  is_bot: z.boolean(),
  username: z.string().optional(),
  first_name: z.string().optional(),
})

export type TelegramUser = z.infer<typeof telegramUserSchema>

export const telegramMessageSchema = z.object({
  message_id: z.number(),
  date: z.number(),
  chat: z.object({
    id: z.number(),
    type: z.string(),
    title: z.string().optional(),
  }),
  from: telegramUserSchema.optional(),
  text: z.string().optional(),
  message_thread_id: z.number().optional(),
})

export type TelegramMessage = z.infer<typeof telegramMessageSchema>

export const telegramUpdateSchema = z.object({
  update_id: z.number(),
  message: telegramMessageSchema.optional(),
})

export type TelegramUpdate = z.infer<typeof telegramUpdateSchema>

// Every Bot API call answers with this envelope, success or not.
export const telegramEnvelopeSchema = z.discriminatedUnion('ok', [
  z.object({
    ok: z.literal(true),
    result: z.unknown(),
  }),
  z.object({
    ok: z.literal(false),
    error_code: z.number().optional(),
    description: z.string().optional(),
    parameters: z.object({ retry_after: z.number().optional() }).optional(),
  }),
])

export interface TelegramGetUpdatesParams {
  offset?: number
  limit?: number
  timeout?: number
  allowed_updates?: string[]
}

export interface TelegramBotCommand {
  command: string
  description: string
}

export interface TelegramSendMessageParams {
  chatId: string
  threadId?: number
  text: string
  disableWebPreview?: boolean
}

export interface TelegramCredentials {
  botToken?: string
  chatId?: string
}
