export const ITEM_CATEGORIES = ['original', 'reply', 'repost'] as const

export type ItemCategory = typeof ITEM_CATEGORIES[number]

/** Dedup slot tracked per account: one per item category plus the pinned reference. */
export type Slot = ItemCategory | 'pinned'

export const SLOTS: readonly Slot[] = [...ITEM_CATEGORIES, 'pinned']

export interface Item {
  id: string
  category: ItemCategory
  text: string
  url: string
  createdAt: string
}

export interface ProfileInfo {
  handle: string
  name: string
  followers: number
  avatarUrl: string
  pinnedItemId: string | null
}

export type FetchFailureKind = 'config' | 'network' | 'rejected' | 'invalid'

export type FetchResult<T> =
  | { ok: true; value: T }
  | { ok: false; kind: FetchFailureKind; message: string }

export interface DataSourceClient {
  fetchProfile(handle: string): Promise<FetchResult<ProfileInfo>>
  fetchRecentItems(handle: string): Promise<FetchResult<Item[]>>
}

export type ClassifiedItems = Partial<Record<ItemCategory, Item>>

export type NotifyLocale = 'en' | 'zh'
