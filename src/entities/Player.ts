import { Entity, type Damageable, countdown, reduceHealth } from './Entity.ts'
import { Vector2, clamp } from '../math/Vector2.ts'
import {
  getDifficulty,
  type GameConfig,
  type PlayerSettings,
  type ScreenSettings,
  type TimedPowerUpKind,
} from '../config/GameConfig.ts'

/**
 * Player configuration for creation
 */
export interface PlayerConfig {
  x: number
  y: number
  maxHealth: number
  bulletDamage: number
  settings: PlayerSettings
}

/**
 * Player entity - the player's ship
 */
export class Player extends Entity implements Damageable {
  public health: number
  public maxHealth: number
  public bulletDamage: number
  public readonly settings: PlayerSettings

  // Countdowns, seconds
  public invulnerableTime: number = 0
  public fireCooldown: number = 0
  public specialCooldown: number = 0
  public timeFreeze: number = 0

  /** Timed power-up kind -> seconds remaining */
  public readonly powerUps: Map<TimedPowerUpKind, number> = new Map()

  constructor(id: number, config: PlayerConfig) {
    super(id, 'player', config.x, config.y, config.settings.size)
    this.settings = config.settings
    this.maxHealth = config.maxHealth
    this.health = config.maxHealth
    this.bulletDamage = config.bulletDamage
  }

  /**
   * Create a player at the bottom center, scaled by the configured difficulty
   */
  static create(id: number, config: GameConfig): Player {
    const difficulty = getDifficulty(config)
    return new Player(id, {
      x: config.screen.width / 2,
      y: config.player.startY,
      maxHealth: Math.round(config.player.maxHealth * difficulty.playerHealthMult),
      bulletDamage: config.bullets.damage * difficulty.playerDamageMult,
      settings: config.player,
    })
  }

  isInvulnerable(): boolean {
    return this.invulnerableTime > 0
  }

  canTakeDamage(): boolean {
    return this.alive && !this.isInvulnerable()
  }

  /**
   * Take damage and open the invulnerability window.
   * Returns false when the hit was ignored.
   */
  takeDamage(amount: number): boolean {
    if (!this.canTakeDamage()) return false

    this.health = reduceHealth(this.health, amount)
    this.invulnerableTime = Math.max(this.invulnerableTime, this.settings.invulnerabilityTime)
    return true
  }

  heal(amount: number): void {
    this.health = Math.min(this.maxHealth, this.health + amount)
  }

  getHealthPercent(): number {
    return this.maxHealth > 0 ? this.health / this.maxHealth : 0
  }

  isDestroyed(): boolean {
    return this.health <= 0
  }

  hasPowerUp(kind: TimedPowerUpKind): boolean {
    return (this.powerUps.get(kind) ?? 0) > 0
  }

  isTimeFrozen(): boolean {
    return this.timeFreeze > 0
  }

  /**
   * Shots per second, doubled by rapid fire
   */
  getFireRate(): number {
    return this.hasPowerUp('rapid_fire') ? this.settings.fireRate * 2 : this.settings.fireRate
  }

  getSpeedMultiplier(): number {
    let mult = 1
    if (this.hasPowerUp('rapid_fire')) mult *= this.settings.rapidFireSpeedMult
    if (this.hasPowerUp('shield')) mult *= this.settings.shieldSpeedMult
    return mult
  }

  /**
   * Ease velocity toward the input direction, then damp it.
   * The move vector is limited to unit length so diagonals are not faster.
   */
  steer(moveX: number, moveY: number): void {
    const direction = new Vector2(moveX, moveY).limit(1)
    const target = direction.scale(this.settings.speed * this.getSpeedMultiplier())
    const { acceleration, friction } = this.settings

    this.vx = (this.vx + (target.x - this.vx) * acceleration) * friction
    this.vy = (this.vy + (target.y - this.vy) * acceleration) * friction
  }

  /**
   * Start the fire cooldown if it has run out. Returns true if a volley fires.
   */
  tryFire(): boolean {
    if (this.fireCooldown > 0) return false
    this.fireCooldown = 1 / this.getFireRate()
    return true
  }

  /**
   * Start the time freeze if the special is off cooldown
   */
  tryActivateSpecial(): boolean {
    if (this.specialCooldown > 0) return false
    this.timeFreeze = this.settings.timeFreezeDuration
    this.specialCooldown = this.settings.specialCooldown
    return true
  }

  clampToScreen(screen: ScreenSettings): void {
    this.x = clamp(this.x, this.width / 2, screen.width - this.width / 2)
    this.y = clamp(this.y, this.height / 2, screen.height - this.height / 2)
  }

  update(dt: number, tickRate: number): void {
    this.move(dt, tickRate)
    this.invulnerableTime = countdown(this.invulnerableTime, dt)
    this.fireCooldown = countdown(this.fireCooldown, dt)
    this.specialCooldown = countdown(this.specialCooldown, dt)
    this.timeFreeze = countdown(this.timeFreeze, dt)
  }

  /**
   * The player is never pruned; it leaves play only when the session ends
   */
  isExpired(_screen: ScreenSettings): boolean {
    return false
  }
}
