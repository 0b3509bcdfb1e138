/**
 * Bullet patterns
 *
 * Geometry of every volley in the game, and the step that turns a fire
 * request into bullets in the Entity Store.
 */

import { Bullet, type BulletKind, type BulletOwner } from '../entities/Bullet.ts'
import type { Player } from '../entities/Player.ts'
import type { EntityStore } from '../game/EntityStore.ts'
import type { BulletSettings, PlayerSettings } from '../config/GameConfig.ts'
import { randomInt, type RandomSource } from '../math/SeededRandom.ts'

/**
 * Starting point and velocity of one projectile
 */
export interface ShotVector {
  x: number
  y: number
  vx: number
  vy: number
}

/**
 * What an enemy asks to fire this tick
 */
export type FireRequest =
  | { pattern: 'aimed'; x: number; y: number; targetX: number; targetY: number; speed: number; damage: number }
  | { pattern: 'spread'; x: number; y: number; count: number; spreadAngle: number; speed: number; damage: number }
  | { pattern: 'ring'; x: number; y: number; count: number; speed: number; damage: number }
  | { pattern: 'homing'; x: number; y: number; count: number; jitter: number; speed: number; damage: number }

// ============================================================================
// Geometry
// ============================================================================

/**
 * One shot straight at a point. Null when already there.
 */
export function aimedShot(x: number, y: number, targetX: number, targetY: number, speed: number): ShotVector | null {
  const dx = targetX - x
  const dy = targetY - y
  const distance = Math.sqrt(dx * dx + dy * dy)
  if (distance === 0) return null
  return { x, y, vx: (dx / distance) * speed, vy: (dy / distance) * speed }
}

/**
 * Fan of `count` shots evenly spaced over [-spreadAngle, spreadAngle] around
 * straight down (enemy) or straight up (player).
 */
export function spreadShot(
  x: number,
  y: number,
  count: number,
  spreadAngle: number,
  speed: number,
  owner: BulletOwner
): ShotVector[] {
  const baseVy = owner === 'player' ? -speed : speed
  const shots: ShotVector[] = []
  for (let i = 0; i < count; i++) {
    const angle = count === 1 ? 0 : -spreadAngle + (2 * spreadAngle * i) / (count - 1)
    shots.push({ x, y, vx: -baseVy * Math.sin(angle), vy: baseVy * Math.cos(angle) })
  }
  return shots
}

/**
 * `count` shots evenly around a full circle, the first pointing right
 */
export function ringShot(x: number, y: number, count: number, speed: number): ShotVector[] {
  const step = (Math.PI * 2) / count
  const shots: ShotVector[] = []
  for (let i = 0; i < count; i++) {
    const angle = i * step
    shots.push({ x, y, vx: Math.cos(angle) * speed, vy: Math.sin(angle) * speed })
  }
  return shots
}

/**
 * The player's volley: one shot, or a three-way fan with multi-shot
 */
export function playerVolley(
  player: Player,
  settings: PlayerSettings,
  speed: number,
  multiShot: boolean
): ShotVector[] {
  const y = player.y - settings.muzzleOffset
  if (!multiShot) {
    return [{ x: player.x, y, vx: 0, vy: -speed }]
  }
  return settings.multiShotAngles.map((angle) => ({
    x: player.x + Math.sin(angle) * settings.multiShotOffset,
    y,
    vx: speed * Math.sin(angle),
    vy: -speed * Math.cos(angle),
  }))
}

// ============================================================================
// Spawning
// ============================================================================

/**
 * Turn an enemy fire request into bullets in the store
 */
export function spawnEnemyFire(
  store: EntityStore,
  request: FireRequest,
  settings: BulletSettings,
  rng: RandomSource
): Bullet[] {
  let shots: ShotVector[]
  let kind: BulletKind = 'normal'

  switch (request.pattern) {
    case 'aimed': {
      const shot = aimedShot(request.x, request.y, request.targetX, request.targetY, request.speed)
      shots = shot ? [shot] : []
      break
    }
    case 'spread':
      shots = spreadShot(request.x, request.y, request.count, request.spreadAngle, request.speed, 'enemy')
      break
    case 'ring':
      shots = ringShot(request.x, request.y, request.count, request.speed)
      break
    case 'homing':
      kind = 'homing'
      shots = []
      for (let i = 0; i < request.count; i++) {
        const x = request.x + randomInt(rng, -request.jitter, request.jitter)
        shots.push({ x, y: request.y, vx: 0, vy: request.speed })
      }
      break
    default: {
      const unhandled: never = request
      throw new Error(`Unknown fire pattern: ${JSON.stringify(unhandled)}`)
    }
  }

  return shots.map((shot) => {
    const bullet = Bullet.createEnemyShot(
      store.allocateId(), shot.x, shot.y, shot.vx, shot.vy, request.damage, settings, kind
    )
    store.addBullet(bullet)
    return bullet
  })
}

/**
 * Fire the player's volley into the store. Homing shots fly slower.
 */
export function spawnPlayerVolley(
  store: EntityStore,
  player: Player,
  settings: BulletSettings
): Bullet[] {
  const homing = player.hasPowerUp('homing')
  const kind: BulletKind = homing ? 'homing' : 'normal'
  const speed = homing ? settings.homingSpeed : settings.speed
  const shots = playerVolley(player, player.settings, speed, player.hasPowerUp('multi_shot'))

  return shots.map((shot) => {
    const bullet = Bullet.createPlayerShot(
      store.allocateId(), shot.x, shot.y, shot.vx, shot.vy, player.bulletDamage, settings, kind
    )
    store.addBullet(bullet)
    return bullet
  })
}
