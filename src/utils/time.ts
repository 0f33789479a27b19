export type Sleep = (ms: number) => Promise<void>

export function nowIso(): string {
  return new Date().toISOString()
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}

/**
 * Waits up to `totalMs` in steps of at most `tickMs`, returning early once
 * `keepWaiting` turns false. Resolves to true when the full duration elapsed.
 */
export async function sleepWhile(
  totalMs: number,
  keepWaiting: () => boolean,
  options: { tickMs?: number; sleep?: Sleep } = {},
): Promise<boolean> {
  const tickMs = Math.max(1, options.tickMs ?? 1000)
  const wait = options.sleep ?? sleep
  let remaining = Math.max(0, totalMs)

  while (remaining > 0) {
    if (!keepWaiting()) return false
    const step = Math.min(tickMs, remaining)
    await wait(step)
    remaining -= step
  }
  return keepWaiting()
}
