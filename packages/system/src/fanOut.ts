/**
 * Fan-Out / Fan-In
 *
 * Runs one job per input and gathers the results, in batches.
 * Jobs inside a batch run together (Promise.all); between batches control
 * goes back to the event loop so long runs don't starve timers and I/O.
 *
 * Philosophy:
 * - Jobs are independent, results are gathered in input order
 * - No shared mutable state between jobs
 * - A failing job rejects the whole run (no partial results)
 */

import { setImmediate as nextTick } from 'node:timers/promises'

// ============================================================================
// Types
// ============================================================================

/**
 * Job run for each input. May be synchronous or return a promise.
 */
export type FanOutJob<TInput, TOutput> = (
  input: TInput,
  index: number,
) => TOutput | Promise<TOutput>

/**
 * Options for a fan-out run
 */
export type FanOutOptions = {
  /**
   * Number of jobs started together before yielding.
   * Defaults to 64.
   */
  batchSize?: number

  /**
   * Called between batches. Defaults to a setImmediate tick.
   * Tests inject their own to observe batching.
   */
  yieldBetweenBatches?: () => Promise<unknown>
}

export const DEFAULT_FAN_OUT_BATCH_SIZE = 64

// ============================================================================
// Implementation
// ============================================================================

/**
 * Run `job` over every input and fan the results back in.
 *
 * @example
 * ```ts
 * const counts = await fanOut(buckets, (bucket) => scan(bucket), {
 *   batchSize: 32,
 * })
 * ```
 */
export async function fanOut<TInput, TOutput>(
  inputs: Iterable<TInput>,
  job: FanOutJob<TInput, TOutput>,
  options: FanOutOptions = {},
): Promise<Array<TOutput>> {
  const {
    batchSize = DEFAULT_FAN_OUT_BATCH_SIZE,
    yieldBetweenBatches = () => nextTick(),
  } = options

  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new Error(`Invalid batch size: ${batchSize}`)
  }

  const results: Array<TOutput> = []
  let batch: Array<Promise<TOutput>> = []
  let index = 0

  for (const input of inputs) {
    // Wrap so a synchronous throw becomes a rejection of this run
    const currentIndex = index++
    batch.push(Promise.resolve().then(() => job(input, currentIndex)))

    if (batch.length === batchSize) {
      results.push(...(await Promise.all(batch)))
      batch = []
      await yieldBetweenBatches()
    }
  }

  if (batch.length > 0) {
    results.push(...(await Promise.all(batch)))
  }

  return results
}
