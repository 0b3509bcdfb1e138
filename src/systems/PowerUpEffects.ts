/**
 * Power-Up Effect Timer
 *
 * Applies collected power-ups to the player and counts timed ones down.
 * Instant kinds act once; timed kinds hold a window that re-collecting
 * resets rather than extends.
 */

import { SafeConsole } from '../core/SafeConsole.ts'
import { POWERUP_KINDS, type GameConfig, type PowerUpKind } from '../config/GameConfig.ts'
import { PowerUp, isTimedPowerUp } from '../entities/PowerUp.ts'
import type { Player } from '../entities/Player.ts'
import type { EntityStore } from '../game/EntityStore.ts'
import type { EventQueue } from '../game/events.ts'
import { weightedChoice, type RandomSource, type WeightedEntry } from '../math/SeededRandom.ts'

/**
 * Weighted-random power-up kind from the configured drop table
 */
export function rollPowerUpKind(rng: RandomSource, weights: Readonly<Record<PowerUpKind, number>>): PowerUpKind {
  const entries: WeightedEntry<PowerUpKind>[] = POWERUP_KINDS.map((kind) => ({ value: kind, weight: weights[kind] }))
  return weightedChoice(rng, entries) ?? 'health'
}

export class PowerUpEffects {
  constructor(
    private readonly config: GameConfig,
    private readonly events: EventQueue
  ) {}

  /**
   * Put a power-up into play and announce it
   */
  spawn(store: EntityStore, kind: PowerUpKind, x: number, y: number): PowerUp {
    const powerUp = PowerUp.create(store.allocateId(), kind, x, y, this.config)
    store.addPowerUp(powerUp)
    this.events.emit({ type: 'powerup_spawned', powerUpId: powerUp.id, kind, x, y })
    return powerUp
  }

  /**
   * Apply a collected power-up
   */
  apply(player: Player, kind: PowerUpKind, store: EntityStore): void {
    const duration = this.config.powerUps.duration

    if (isTimedPowerUp(kind)) {
      player.powerUps.set(kind, duration)
      if (kind === 'shield') {
        player.invulnerableTime = Math.max(player.invulnerableTime, duration)
      }
      return
    }

    switch (kind) {
      case 'health':
        player.heal(this.config.powerUps.healAmount)
        break
      case 'screen_clear':
        this.clearScreen(store)
        break
    }
  }

  /**
   * Count every active window down; each one that runs out is removed and
   * reported exactly once.
   */
  tick(player: Player, dt: number): void {
    for (const [kind, remaining] of player.powerUps) {
      const next = remaining - dt
      if (next > 0) {
        player.powerUps.set(kind, next)
        continue
      }
      player.powerUps.delete(kind)
      this.events.emit({ type: 'powerup_expired', kind })
      SafeConsole.debug(`[PowerUpEffects] ${kind} expired`)
    }
  }

  private clearScreen(store: EntityStore): void {
    const intensity = this.config.effects.contactExplosion
    for (const enemy of store.getEnemies()) {
      if (!enemy.alive) continue
      enemy.destroy()
      this.events.emit({ type: 'explosion_requested', x: enemy.x, y: enemy.y, intensity })
      this.events.emit({
        type: 'enemy_destroyed',
        enemyId: enemy.id,
        variant: enemy.variant,
        x: enemy.x,
        y: enemy.y,
        scoreValue: 0,
        cause: 'screen_clear',
      })
    }
  }
}
