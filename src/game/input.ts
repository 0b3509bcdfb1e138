/**
 * Input intents
 *
 * What the host's input polling hands the simulation each tick. Device
 * mapping lives outside; the core only sees intents.
 */

import { SafeConsole } from '../core/SafeConsole.ts'
import { clamp } from '../math/Vector2.ts'

export interface InputIntent {
  /** Desired direction, each axis in [-1, 1] */
  move: { x: number; y: number }
  fire: boolean
  special: boolean
}

/**
 * Create an empty input (no keys pressed)
 */
export function emptyInput(): InputIntent {
  return {
    move: { x: 0, y: 0 },
    fire: false,
    special: false,
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null
}

function readAxis(value: unknown): number {
  return typeof value === 'number' && Number.isFinite(value) ? clamp(value, -1, 1) : 0
}

/**
 * Validate untyped input at the boundary.
 * Axes are clamped to [-1, 1]; non-finite axes become 0; flags must be true to count.
 * Anything that is not an object becomes the empty input.
 */
export function parseInputIntent(raw: unknown): InputIntent {
  if (!isRecord(raw)) {
    SafeConsole.warn('[input] Rejected malformed input intent:', raw)
    return emptyInput()
  }

  const move: Record<string, unknown> = isRecord(raw.move) ? raw.move : {}
  return {
    move: { x: readAxis(move.x), y: readAxis(move.y) },
    fire: raw.fire === true,
    special: raw.special === true,
  }
}
