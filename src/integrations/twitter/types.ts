import { z } from 'zod'

// Numeric ids above 2^53 lose digits in JSON.parse; the provider sends them as strings.
const idSchema = z.string().min(1)

export const envelopeSchema = z.object({
  status: z.string().optional(),
  msg: z.string().nullish(),
  message: z.string().nullish(),
})

export const userInfoSchema = z.object({
  userName: z.string().nullish(),
  name: z.string().nullish(),
  followers: z.number().nullish(),
  profilePicture: z.string().nullish(),
  pinnedTweetIds: z.array(idSchema).nullish(),
})

export const userInfoResponseSchema = z.object({
  data: userInfoSchema,
})

export type ApiUserInfo = z.infer<typeof userInfoSchema>

export const tweetSchema = z.object({
  id: idSchema,
  text: z.string().nullish(),
  url: z.string().nullish(),
  createdAt: z.string().nullish(),
  isReply: z.boolean().nullish(),
  retweeted_tweet: z.record(z.unknown()).nullish(),
})

export type ApiTweet = z.infer<typeof tweetSchema>

// Recent responses nest the list under `data`; older ones put it at the top level.
export const lastTweetsResponseSchema = z.object({
  data: z.object({ tweets: z.array(tweetSchema).nullish() }).nullish(),
  tweets: z.array(tweetSchema).nullish(),
})
