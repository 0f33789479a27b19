import { ITEM_CATEGORIES } from '../../types/index.js'
import type { ClassifiedItems, Item, ItemCategory } from '../../types/index.js'

/** Keeps the first item of each category in fetch order. */
export function classify(items: readonly Item[]): ClassifiedItems {
  const result: ClassifiedItems = {}
  let filled = 0

  for (const item of items) {
    if (result[item.category]) continue
    result[item.category] = item
    filled += 1
    if (filled === ITEM_CATEGORIES.length) break
  }

  return result
}

export function classifiedEntries(classified: ClassifiedItems): Array<[ItemCategory, Item]> {
  const entries: Array<[ItemCategory, Item]> = []
  for (const category of ITEM_CATEGORIES) {
    const item = classified[category]
    if (item) entries.push([category, item])
  }
  return entries
}
