/**
 * Entity Store
 *
 * Owns every live entity of a session. Other systems borrow references for
 * the length of a tick and address entities across ticks by id.
 *
 * Removal never happens mid-iteration: systems flip `alive` and the store
 * compacts its arrays afterwards, preserving insertion order.
 */

import { SafeConsole } from '../core/SafeConsole.ts'
import type { ScreenSettings } from '../config/GameConfig.ts'
import type { Entity } from '../entities/Entity.ts'
import type { Player } from '../entities/Player.ts'
import type { Enemy } from '../entities/Enemy.ts'
import type { Bullet } from '../entities/Bullet.ts'
import type { PowerUp } from '../entities/PowerUp.ts'

export interface PruneResult {
  enemies: number
  bullets: number
  powerUps: number
}

export class EntityStore {
  private nextId = 1
  private player: Player | null = null
  private enemies: Enemy[] = []
  private playerBullets: Bullet[] = []
  private enemyBullets: Bullet[] = []
  private powerUps: PowerUp[] = []
  private readonly bulletCapacity: number

  /**
   * @param maxBullets - shared budget; each faction keeps half
   */
  constructor(maxBullets: number) {
    this.bulletCapacity = Math.max(1, Math.floor(maxBullets / 2))
  }

  /**
   * Reserve a fresh entity id. Ids are never reused within a session.
   */
  allocateId(): number {
    return this.nextId++
  }

  // ==========================================================================
  // Insertion
  // ==========================================================================

  setPlayer(player: Player): void {
    this.player = player
  }

  addEnemy(enemy: Enemy): void {
    this.enemies.push(enemy)
  }

  /**
   * Add a bullet to its faction's pool. When the pool is full the oldest
   * bullet is evicted and returned.
   */
  addBullet(bullet: Bullet): Bullet | null {
    const pool = bullet.owner === 'player' ? this.playerBullets : this.enemyBullets
    pool.push(bullet)
    if (pool.length <= this.bulletCapacity) return null

    const evicted = pool.shift() ?? null
    if (evicted) {
      evicted.kill()
      SafeConsole.debug(`[EntityStore] ${bullet.owner} bullet pool full, evicted #${evicted.id}`)
    }
    return evicted
  }

  addPowerUp(powerUp: PowerUp): void {
    this.powerUps.push(powerUp)
  }

  // ==========================================================================
  // Access
  // ==========================================================================

  getPlayer(): Player | null {
    return this.player
  }

  getEnemies(): readonly Enemy[] {
    return this.enemies
  }

  getPlayerBullets(): readonly Bullet[] {
    return this.playerBullets
  }

  getEnemyBullets(): readonly Bullet[] {
    return this.enemyBullets
  }

  getPowerUps(): readonly PowerUp[] {
    return this.powerUps
  }

  getLiveEnemyCount(): number {
    let count = 0
    for (const enemy of this.enemies) {
      if (enemy.alive) count++
    }
    return count
  }

  // ==========================================================================
  // Removal
  // ==========================================================================

  /**
   * Mark entities that left play as dead. Returns how many per group.
   */
  prune(screen: ScreenSettings): PruneResult {
    return {
      enemies: expire(this.enemies, screen),
      bullets: expire(this.playerBullets, screen) + expire(this.enemyBullets, screen),
      powerUps: expire(this.powerUps, screen),
    }
  }

  /**
   * Drop every dead entity, keeping order
   */
  compact(): void {
    this.enemies = this.enemies.filter((e) => e.alive)
    this.playerBullets = this.playerBullets.filter((b) => b.alive)
    this.enemyBullets = this.enemyBullets.filter((b) => b.alive)
    this.powerUps = this.powerUps.filter((p) => p.alive)
  }

  /**
   * Empty every collection at once (session end)
   */
  clear(): void {
    this.player = null
    this.enemies = []
    this.playerBullets = []
    this.enemyBullets = []
    this.powerUps = []
    this.nextId = 1
  }
}

function expire(entities: readonly Entity[], screen: ScreenSettings): number {
  let count = 0
  for (const entity of entities) {
    if (entity.alive && entity.isExpired(screen)) {
      entity.kill()
      count++
    }
  }
  return count
}
