import type { OutputEvent } from '../game/events.ts'
import type { InputIntent } from '../game/input.ts'

/**
 * Anything advanced in whole fixed steps
 */
export interface Steppable {
  tick(input: InputIntent, dt: number): OutputEvent[]
}

export interface FixedTimestepOptions {
  /** Steps per second (default: 60) */
  tickRate?: number
  /** Backlog beyond this is dropped (default: 200 ms) */
  maxAccumulatedMs?: number
}

/**
 * Turns real elapsed time into whole fixed steps.
 * The host measures time and polls input; the simulation never reads a clock.
 */
export class FixedTimestep {
  private readonly stepMs: number
  private readonly maxAccumulatedMs: number
  private accumulator = 0

  constructor(
    private readonly target: Steppable,
    options: FixedTimestepOptions = {}
  ) {
    const tickRate = options.tickRate ?? 60
    if (!(tickRate > 0)) {
      throw new Error(`Invalid tick rate ${tickRate}`)
    }
    this.stepMs = 1000 / tickRate
    this.maxAccumulatedMs = options.maxAccumulatedMs ?? 200
  }

  /**
   * Run every whole step that fits in the accumulated time, all with the
   * latest input, and return their events in order
   */
  advance(elapsedMs: number, input: InputIntent): OutputEvent[] {
    if (Number.isFinite(elapsedMs) && elapsedMs > 0) {
      this.accumulator += elapsedMs
    }

    // Cap accumulator to prevent spiral of death
    if (this.accumulator > this.maxAccumulatedMs) {
      this.accumulator = this.maxAccumulatedMs
    }

    const events: OutputEvent[] = []
    const dt = this.stepMs / 1000
    while (this.accumulator >= this.stepMs) {
      events.push(...this.target.tick(input, dt))
      this.accumulator -= this.stepMs
    }
    return events
  }

  /**
   * How far into the next step the leftover time reaches, for interpolated drawing
   */
  getAlpha(): number {
    return this.accumulator / this.stepMs
  }

  reset(): void {
    this.accumulator = 0
  }
}
