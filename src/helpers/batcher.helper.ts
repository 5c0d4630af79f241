// Splits items into consecutive chunks of at most batchSize, keeping order
export function batcher<T>(items: Iterable<T>, batchSize: number): T[][] {
  if (!Number.isInteger(batchSize) || batchSize <= 0) {
    throw new RangeError(
      `Expected 'batchSize' to be a positive integer but got ${batchSize}.`,
    )
  }

  const batches: T[][] = []
  let current: T[] = []

  for (const item of items) {
    current.push(item)
    if (current.length === batchSize) {
      batches.push(current)
      current = []
    }
  }

  if (current.length > 0) {
    batches.push(current)
  }

  return batches
}
