import type { Entity } from '../entities/Entity.ts'
import type { Player } from '../entities/Player.ts'
import type { Enemy } from '../entities/Enemy.ts'
import type { Bullet } from '../entities/Bullet.ts'
import type { PowerUp } from '../entities/PowerUp.ts'
import type { EntityStore } from '../game/EntityStore.ts'

/**
 * Collision result types, in the order they are detected
 */
export type CollisionResult =
  | { kind: 'bullet_enemy'; bullet: Bullet; enemies: readonly Enemy[] }
  | { kind: 'enemy_bullet_player'; bullet: Bullet; player: Player }
  | { kind: 'enemy_player'; enemy: Enemy; player: Player }
  | { kind: 'player_powerup'; player: Player; powerUp: PowerUp }

export type CollisionKind = CollisionResult['kind']

/**
 * Box vs box collision (AABB), centers and half extents
 */
export function boxVsBox(
  x1: number, y1: number, hw1: number, hh1: number,
  x2: number, y2: number, hw2: number, hh2: number
): boolean {
  return (
    Math.abs(x1 - x2) < hw1 + hw2 &&
    Math.abs(y1 - y2) < hh1 + hh2
  )
}

/**
 * Whether two entities' boxes overlap. Touching edges do not count.
 */
export function entitiesCollide(a: Entity, b: Entity): boolean {
  return boxVsBox(
    a.x, a.y, a.width / 2, a.height / 2,
    b.x, b.y, b.width / 2, b.height / 2
  )
}

/**
 * Collision detection system. Reports overlaps; never changes an entity.
 */
export class CollisionSystem {
  /**
   * All overlaps among live entities, grouped in resolution order:
   * player bullets x enemies, enemy bullets x player, player x enemies,
   * player x power-ups. A player bullet reports every enemy it overlaps,
   * in store order; the resolver spends it on the first one still alive.
   */
  detect(store: EntityStore): CollisionResult[] {
    const results: CollisionResult[] = []
    const enemies = store.getEnemies()

    for (const bullet of store.getPlayerBullets()) {
      if (!bullet.alive) continue
      const hit = this.findCollisions(bullet, enemies)
      if (hit.length > 0) results.push({ kind: 'bullet_enemy', bullet, enemies: hit })
    }

    const player = store.getPlayer()
    if (!player?.alive) return results

    for (const bullet of store.getEnemyBullets()) {
      if (bullet.alive && entitiesCollide(bullet, player)) {
        results.push({ kind: 'enemy_bullet_player', bullet, player })
      }
    }

    for (const enemy of enemies) {
      if (enemy.alive && entitiesCollide(player, enemy)) {
        results.push({ kind: 'enemy_player', enemy, player })
      }
    }

    for (const powerUp of store.getPowerUps()) {
      if (powerUp.alive && entitiesCollide(player, powerUp)) {
        results.push({ kind: 'player_powerup', player, powerUp })
      }
    }

    return results
  }

  /**
   * Live targets overlapping the entity, in store order
   */
  findCollisions<T extends Entity>(entity: Entity, targets: readonly T[]): T[] {
    return targets.filter((target) => target.alive && entitiesCollide(entity, target))
  }
}
