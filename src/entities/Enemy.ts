import { Entity, type Damageable, reduceHealth } from './Entity.ts'
import { clamp } from '../math/Vector2.ts'
import {
  getDifficulty,
  type EnemyVariant,
  type GameConfig,
  type ScreenSettings,
} from '../config/GameConfig.ts'

/**
 * Boss attack patterns, cycled in this order
 */
export type BossPattern = 'sweep' | 'orbit' | 'pursuit'

export const BOSS_PATTERNS: readonly BossPattern[] = ['sweep', 'orbit', 'pursuit']

/**
 * Per-variant AI scratch state. The tag is the variant.
 */
export type BehaviorState =
  | { readonly kind: 'basic' }
  | { readonly kind: 'fast'; readonly targetX: number }
  | { readonly kind: 'heavy' }
  | { readonly kind: 'zigzag' }
  | { readonly kind: 'boss'; readonly pattern: BossPattern; readonly patternTimer: number }

export function initialBehavior(variant: EnemyVariant, x: number): BehaviorState {
  switch (variant) {
    case 'basic':
    case 'heavy':
    case 'zigzag':
      return { kind: variant }
    case 'fast':
      return { kind: 'fast', targetX: x }
    case 'boss':
      return { kind: 'boss', pattern: 'sweep', patternTimer: 0 }
  }
}

/**
 * Enemy configuration for creation
 */
export interface EnemyConfig {
  variant: EnemyVariant
  x: number
  y: number
  width: number
  height: number
  health: number
  speed: number
  scoreValue: number
  fireRate: number
  bulletDamage: number
}

/**
 * Enemy entity - hostile ships
 */
export class Enemy extends Entity implements Damageable {
  public health: number
  public maxHealth: number
  public readonly speed: number
  public readonly scoreValue: number
  public readonly fireRate: number
  public readonly bulletDamage: number

  public behavior: BehaviorState
  public aiTimer: number = 0
  /** Simulation clock of the last shot; -Infinity lets the first shot through */
  public lastShotTime: number = -Infinity

  constructor(id: number, config: EnemyConfig) {
    super(id, 'enemy', config.x, config.y, { width: config.width, height: config.height })
    this.behavior = initialBehavior(config.variant, config.x)
    this.health = config.health
    this.maxHealth = config.health
    this.speed = config.speed
    this.scoreValue = config.scoreValue
    this.fireRate = config.fireRate
    this.bulletDamage = config.bulletDamage
  }

  /**
   * Create an enemy of a variant with stats scaled by the configured difficulty
   */
  static create(id: number, variant: EnemyVariant, x: number, y: number, config: GameConfig): Enemy {
    const stats = config.enemies[variant]
    const difficulty = getDifficulty(config)
    return new Enemy(id, {
      variant,
      x,
      y,
      width: stats.size.width,
      height: stats.size.height,
      health: Math.max(1, Math.floor(stats.health * difficulty.enemyHealthMult)),
      speed: stats.speed * difficulty.enemySpeedMult,
      scoreValue: Math.floor(stats.score * difficulty.scoreMult),
      fireRate: stats.fireRate,
      bulletDamage: stats.bulletDamage,
    })
  }

  get variant(): EnemyVariant {
    return this.behavior.kind
  }

  isBoss(): boolean {
    return this.behavior.kind === 'boss'
  }

  /**
   * Take damage, returns true if this hit destroyed the enemy
   */
  takeDamage(amount: number): boolean {
    if (!this.alive) return false
    this.health = reduceHealth(this.health, amount)
    if (this.health <= 0) {
      this.kill()
      return true
    }
    return false
  }

  /**
   * Destroy regardless of remaining health
   */
  destroy(): void {
    this.health = 0
    this.kill()
  }

  getHealthPercent(): number {
    return this.maxHealth > 0 ? this.health / this.maxHealth : 0
  }

  /**
   * Whether the fire interval has elapsed on the simulation clock
   */
  isReloaded(now: number): boolean {
    return this.fireRate > 0 && now - this.lastShotTime >= 1 / this.fireRate
  }

  /**
   * Keep the hull inside the horizontal play area
   */
  clampToScreen(screen: ScreenSettings): void {
    this.x = clamp(this.x, this.width / 2, screen.width - this.width / 2)
  }

  update(dt: number, tickRate: number): void {
    this.move(dt, tickRate)
  }

  /**
   * Gone once below the bottom or past a side. Enemies enter from above, so the top is open.
   */
  isExpired(screen: ScreenSettings): boolean {
    const m = screen.offscreenMargin
    return this.y > screen.height + m || this.x < -m || this.x > screen.width + m
  }
}
