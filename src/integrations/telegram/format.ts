import type { MonitorEvent } from '../../core/monitor/types.js'
import type { ItemCategory, NotifyLocale } from '../../types/index.js'
import { statusUrl } from '../twitter/client.js'

export const TEXT_PREVIEW_LIMIT = 200

interface Labels {
  categories: Record<ItemCategory, string>
  newItem: (category: string) => string
  pinnedChanged: string
  pinnedCleared: string
  account: string
  text: string
  link: string
  time: string
  previous: string
  current: string
  none: string
  testTitle: string
  testBody: string
}

const LABELS: Record<NotifyLocale, Labels> = {
  en: {
    categories: { original: 'post', reply: 'reply', repost: 'repost' },
    newItem: category => `New ${category}`,
    pinnedChanged: 'Pinned post changed',
    pinnedCleared: 'Pinned post removed',
    account: 'Account',
    text: 'Text',
    link: 'Link',
    time: 'Time',
    previous: 'Previous',
    current: 'New',
    none: 'none',
    testTitle: 'Test message',
    testBody: 'Social Watch notifications are configured correctly.',
  },
  zh: {
    categories: { original: '原创', reply: '回复', repost: '转发' },
    newItem: category => `新${category}推文`,
    pinnedChanged: '更换置顶推文',
    pinnedCleared: '取消置顶推文',
    account: '用户',
    text: '内容',
    link: '链接',
    time: '时间',
    previous: '原置顶',
    current: '新置顶',
    none: '无',
    testTitle: '测试消息',
    testBody: '社交账号监控配置成功！',
  },
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
}

/** Cuts on code points so surrogate pairs are never split. */
export function truncateText(value: string, limit = TEXT_PREVIEW_LIMIT): string {
  const chars = Array.from(value)
  if (chars.length <= limit) return value
  return `${chars.slice(0, limit - 1).join('')}…`
}

export function categoryLabel(category: ItemCategory, locale: NotifyLocale = 'en'): string {
  return LABELS[locale].categories[category]
}

function accountLine(labels: Labels, name: string, handle: string): string {
  return `<b>${labels.account}:</b> ${escapeHtml(name)} (@${escapeHtml(handle)})`
}

export function formatEvent(event: MonitorEvent, locale: NotifyLocale = 'en'): string {
  const labels = LABELS[locale]
  const { handle, name } = event.account

  switch (event.kind) {
    case 'new-item': {
      const { item } = event
      return [
        `🐦 <b>${escapeHtml(labels.newItem(labels.categories[item.category]))}</b>`,
        '',
        accountLine(labels, name, handle),
        `<b>${labels.text}:</b> ${escapeHtml(truncateText(item.text))}`,
        `<b>${labels.link}:</b> ${escapeHtml(item.url)}`,
        `<b>${labels.time}:</b> ${escapeHtml(item.createdAt)}`,
      ].join('\n')
    }
    case 'pinned-changed': {
      const previous = event.previousId ? statusUrl(handle, event.previousId) : labels.none
      return [
        `📌 <b>${labels.pinnedChanged}</b>`,
        '',
        accountLine(labels, name, handle),
        `<b>${labels.previous}:</b> ${escapeHtml(previous)}`,
        `<b>${labels.current}:</b> ${escapeHtml(statusUrl(handle, event.currentId))}`,
      ].join('\n')
    }
    case 'pinned-cleared':
      return [
        `📌 <b>${labels.pinnedCleared}</b>`,
        '',
        accountLine(labels, name, handle),
      ].join('\n')
  }
}

export function formatTestMessage(locale: NotifyLocale = 'en'): string {
  const labels = LABELS[locale]
  return `🔔 <b>${labels.testTitle}</b>\n\n${labels.testBody}`
}
