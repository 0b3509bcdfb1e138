/**
 * Movement & Timer Integrator
 *
 * Advances positions, ages and countdowns by one step. The player's side runs
 * in real time; enemies, their bullets and falling power-ups run on a scaled
 * clock that time freeze stops and time slow halves.
 */

import type { Player } from '../entities/Player.ts'
import type { EntityStore } from '../game/EntityStore.ts'
import type { GameConfig } from '../config/GameConfig.ts'

/**
 * Seconds each side advances this tick
 */
export interface TickStep {
  dt: number
  hostileDt: number
}

/**
 * Multiplier on dt for everything that is not on the player's side
 */
export function getHostileTimeScale(player: Player | null, timeSlowScale: number): number {
  if (!player) return 1
  if (player.isTimeFrozen()) return 0
  if (player.hasPowerUp('time_slow')) return timeSlowScale
  return 1
}

export function createTickStep(player: Player | null, dt: number, config: GameConfig): TickStep {
  return { dt, hostileDt: dt * getHostileTimeScale(player, config.effects.timeSlowScale) }
}

/**
 * Move and age every live entity by one step
 */
export function integrate(store: EntityStore, step: TickStep, config: GameConfig): void {
  const tickRate = config.referenceTickRate
  const screen = config.screen

  const player = store.getPlayer()
  if (player?.alive) {
    player.update(step.dt, tickRate)
    player.clampToScreen(screen)
  }

  for (const bullet of store.getPlayerBullets()) {
    if (bullet.alive) bullet.update(step.dt, tickRate)
  }

  if (step.hostileDt <= 0) return

  for (const enemy of store.getEnemies()) {
    if (!enemy.alive) continue
    enemy.update(step.hostileDt, tickRate)
    enemy.clampToScreen(screen)
  }
  for (const bullet of store.getEnemyBullets()) {
    if (bullet.alive) bullet.update(step.hostileDt, tickRate)
  }
  for (const powerUp of store.getPowerUps()) {
    if (powerUp.alive) powerUp.update(step.hostileDt, tickRate)
  }
}
