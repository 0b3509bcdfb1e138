/**
 * Combat Resolver
 *
 * Applies detected collisions in order. The only place health and score
 * change. An event whose entities died earlier in the pass is skipped;
 * a player bullet moves on to the next live enemy it overlaps.
 */

import type { GameConfig, PowerUpKind } from '../config/GameConfig.ts'
import type { Bullet } from '../entities/Bullet.ts'
import type { Enemy } from '../entities/Enemy.ts'
import type { Player } from '../entities/Player.ts'
import type { PowerUp } from '../entities/PowerUp.ts'
import type { EntityStore } from '../game/EntityStore.ts'
import type { DestroyCause, EventQueue } from '../game/events.ts'
import { chance, pickOne, type RandomSource } from '../math/SeededRandom.ts'
import type { CollisionResult } from './CollisionSystem.ts'
import { rollPowerUpKind, type PowerUpEffects } from './PowerUpEffects.ts'

const BOSS_RARE_DROPS: readonly PowerUpKind[] = ['homing', 'time_slow']
const BOSS_DROP_SPREAD = 30
const BOSS_DROP_STAGGER = 40

export class CombatResolver {
  private score = 0

  constructor(
    private readonly config: GameConfig,
    private readonly rng: RandomSource,
    private readonly events: EventQueue,
    private readonly powerUps: PowerUpEffects
  ) {}

  getScore(): number {
    return this.score
  }

  reset(): void {
    this.score = 0
  }

  resolve(results: readonly CollisionResult[], store: EntityStore): void {
    for (const result of results) {
      switch (result.kind) {
        case 'bullet_enemy':
          this.resolveBulletHit(result.bullet, result.enemies, store)
          break
        case 'enemy_bullet_player':
          this.resolvePlayerHit(result.bullet, result.player)
          break
        case 'enemy_player':
          this.resolveContact(result.enemy, result.player)
          break
        case 'player_powerup':
          this.resolvePickup(result.player, result.powerUp, store)
          break
        default: {
          const unhandled: never = result
          throw new Error(`Unknown collision: ${JSON.stringify(unhandled)}`)
        }
      }
    }
  }

  private resolveBulletHit(bullet: Bullet, candidates: readonly Enemy[], store: EntityStore): void {
    if (!bullet.alive) return
    // Enemies killed earlier in this pass no longer stop the bullet
    const enemy = candidates.find((candidate) => candidate.alive)
    if (!enemy) return

    const destroyed = enemy.takeDamage(bullet.damage)
    bullet.kill()

    const effects = this.config.effects
    const intensity = bullet.kind === 'explosive' ? effects.explosiveHitExplosion : effects.hitExplosion
    this.events.emit({ type: 'explosion_requested', x: enemy.x, y: enemy.y, intensity })

    if (!destroyed) return

    this.score += enemy.scoreValue
    this.emitDestroyed(enemy, enemy.scoreValue, 'bullet')

    if (enemy.isBoss()) {
      this.dropBossReward(enemy, store)
    } else if (chance(this.rng, this.config.powerUps.spawnChance)) {
      this.powerUps.spawn(store, rollPowerUpKind(this.rng, this.config.powerUps.weights), enemy.x, enemy.y)
    }
  }

  private resolvePlayerHit(bullet: Bullet, player: Player): void {
    if (!bullet.alive || !player.canTakeDamage()) return

    player.takeDamage(bullet.damage)
    bullet.kill()
    this.emitPlayerDamaged(player, bullet.damage, this.config.effects.screenShake)
  }

  private resolveContact(enemy: Enemy, player: Player): void {
    if (!enemy.alive || !player.canTakeDamage()) return

    const damage = this.config.player.contactDamage
    player.takeDamage(damage)
    enemy.destroy()

    this.emitDestroyed(enemy, 0, 'collision')
    this.events.emit({
      type: 'explosion_requested',
      x: enemy.x,
      y: enemy.y,
      intensity: this.config.effects.contactExplosion,
    })
    this.emitPlayerDamaged(player, damage, this.config.effects.contactShake)
  }

  private resolvePickup(player: Player, powerUp: PowerUp, store: EntityStore): void {
    if (!powerUp.alive || !player.alive) return

    powerUp.kill()
    this.powerUps.apply(player, powerUp.kind, store)
    this.events.emit({ type: 'powerup_collected', kind: powerUp.kind })
    this.events.emit({
      type: 'screen_feedback',
      shake: 0,
      flash: 'powerup',
      flashDuration: this.config.effects.powerUpFlash,
    })
  }

  /**
   * Health and shield either side, then a chance at a rare kind above and a
   * screen clear below
   */
  private dropBossReward(boss: Enemy, store: EntityStore): void {
    const { x, y } = boss
    const settings = this.config.powerUps

    this.powerUps.spawn(store, 'health', x - BOSS_DROP_SPREAD, y)
    this.powerUps.spawn(store, 'shield', x + BOSS_DROP_SPREAD, y)

    if (chance(this.rng, settings.bossRareChance)) {
      this.powerUps.spawn(store, pickOne(this.rng, BOSS_RARE_DROPS) ?? 'homing', x, y - BOSS_DROP_STAGGER)
    }
    if (chance(this.rng, settings.bossClearChance)) {
      this.powerUps.spawn(store, 'screen_clear', x, y + BOSS_DROP_STAGGER)
    }
  }

  private emitDestroyed(enemy: Enemy, scoreValue: number, cause: DestroyCause): void {
    this.events.emit({
      type: 'enemy_destroyed',
      enemyId: enemy.id,
      variant: enemy.variant,
      x: enemy.x,
      y: enemy.y,
      scoreValue,
      cause,
    })
  }

  private emitPlayerDamaged(player: Player, amount: number, shake: number): void {
    this.events.emit({ type: 'player_damaged', amount, remainingHealth: player.health })
    this.events.emit({
      type: 'screen_feedback',
      shake,
      flash: 'damage',
      flashDuration: this.config.effects.damageFlash,
    })
  }
}
