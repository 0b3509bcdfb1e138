/**
 * Homing guidance
 *
 * Bullets lock onto an opposing entity by id and turn toward it by at most
 * `turnRate` radians per reference tick, keeping their speed.
 */

import type { Entity } from '../entities/Entity.ts'
import type { Bullet } from '../entities/Bullet.ts'
import { clamp, normalizeAngle } from '../math/Vector2.ts'

export interface HomingSettings {
  /** Radians per reference tick */
  turnRate: number
  range: number
  tickRate: number
}

/**
 * Nearest live candidate within range. Ties go to the earliest candidate.
 */
export function acquireTarget(from: Entity, candidates: readonly Entity[], range: number): Entity | null {
  let best: Entity | null = null
  let bestDistSq = range * range
  for (const candidate of candidates) {
    if (!candidate.alive) continue
    const distSq = from.distanceSquaredTo(candidate)
    if (distSq < bestDistSq || (best === null && distSq === bestDistSq)) {
      best = candidate
      bestDistSq = distSq
    }
  }
  return best
}

/**
 * Rotate a bullet's velocity toward a target by at most turnRate * dt * tickRate.
 * Returns the signed turn applied.
 */
export function steerToward(bullet: Bullet, target: Entity, dt: number, settings: HomingSettings): number {
  const speed = bullet.getSpeed()
  if (speed === 0) return 0

  const heading = Math.atan2(bullet.vy, bullet.vx)
  const maxTurn = settings.turnRate * dt * settings.tickRate
  const turn = clamp(normalizeAngle(bullet.angleTo(target) - heading), -maxTurn, maxTurn)
  const newHeading = heading + turn

  bullet.vx = Math.cos(newHeading) * speed
  bullet.vy = Math.sin(newHeading) * speed
  return turn
}

/**
 * One guidance step for a homing bullet.
 *
 * A lock whose target is gone is dropped and the bullet flies straight for
 * this tick; the next tick scans for a new target.
 */
export function guideBullet(
  bullet: Bullet,
  candidates: readonly Entity[],
  dt: number,
  settings: HomingSettings
): void {
  if (!bullet.isHoming() || !bullet.alive) return

  let target: Entity | null
  if (bullet.targetId !== null) {
    const lockedId = bullet.targetId
    target = candidates.find((c) => c.id === lockedId && c.alive) ?? null
    if (!target) {
      bullet.targetId = null
      return
    }
  } else {
    target = acquireTarget(bullet, candidates, settings.range)
    if (!target) return
    bullet.targetId = target.id
  }

  steerToward(bullet, target, dt, settings)
}
