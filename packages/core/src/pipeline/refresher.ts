/**
 * Interval-driven statistics refresh, independent of matcher and classifier
 * runs. Each tick refreshes only when the stored snapshot has gone stale.
 */

import type { Result, EngineError } from '../common/index.js'
import type { ThresholdStatisticsService, RefreshOutcome } from '../statistics/service.js'

const DEFAULT_TICK_MS = 60_000

export class StatisticsRefresher {
  private timer: ReturnType<typeof setInterval> | null = null

  constructor(
    private service: ThresholdStatisticsService,
    private tickMs: number = DEFAULT_TICK_MS,
    private now: () => Date = () => new Date(),
  ) {}

  get running(): boolean {
    return this.timer !== null
  }

  /** Ticks once immediately, then every `tickMs`. Calling twice is a no-op. */
  start(): void {
    if (this.timer) return
    this.tick()
    this.timer = setInterval(() => {
      this.tick()
    }, this.tickMs)
    // Never keep the process alive just for this.
    this.timer.unref()
    console.log(`[statistics] refresher started (tick ${this.tickMs}ms)`)
  }

  stop(): void {
    if (!this.timer) return
    clearInterval(this.timer)
    this.timer = null
    console.log('[statistics] refresher stopped')
  }

  tick(): Result<RefreshOutcome, EngineError> {
    const outcome = this.service.refreshIfStale(this.now())
    if (!outcome.ok) {
      console.error(`[statistics] scheduled refresh failed: ${outcome.error.message}`)
    }
    return outcome
  }
}
