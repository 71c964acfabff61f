/**
 * Stopwatch
 *
 * Lap timer for phase timings (milliseconds).
 * The clock is injectable so timings can be asserted in tests.
 */

export type Clock = () => number

export type Stopwatch = {
  /**
   * Record the time elapsed since the previous lap (or since creation)
   * under `label`, and return it. Repeated labels accumulate.
   */
  lap: (label: string) => number

  /** Time elapsed since creation */
  elapsed: () => number

  /** Snapshot of all recorded laps */
  laps: () => Record<string, number>
}

const defaultClock: Clock = () => performance.now()

export function createStopwatch(clock: Clock = defaultClock): Stopwatch {
  const startedAt = clock()
  let lastLap = startedAt
  const recorded = new Map<string, number>()

  return {
    lap: (label) => {
      const now = clock()
      const duration = now - lastLap
      lastLap = now
      recorded.set(label, (recorded.get(label) ?? 0) + duration)
      return duration
    },

    elapsed: () => clock() - startedAt,

    laps: () => Object.fromEntries(recorded),
  }
}

/**
 * Time a single synchronous call
 */
export function timed<T>(
  fn: () => T,
  clock: Clock = defaultClock,
): { result: T; elapsedMs: number } {
  const start = clock()
  const result = fn()
  return { result, elapsedMs: clock() - start }
}
