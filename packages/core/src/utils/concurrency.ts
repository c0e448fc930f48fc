/** Run `worker` over `items` with at most `limit` in flight; results keep input order. */
export async function mapLimit<T, R>(items: readonly T[], limit: number, worker: (item: T, index: number) => Promise<R>): Promise<readonly R[]> {
  const n: number = Math.max(1, Math.floor(limit) || 1)
  const results: R[] = new Array<R>(items.length)
  let next = 0
  let failed = false
  async function start(): Promise<void> {
    while (!failed) {
      const idx = next++
      if (idx >= items.length) return
      const item: T = items[idx]
      try {
        results[idx] = await worker(item, idx)
      } catch (e) {
        failed = true
        throw e
      }
    }
  }
  const runners: Promise<void>[] = []
  for (let i = 0; i < Math.min(n, items.length); i++) runners.push(start())
  await Promise.all(runners)
  return results
}
