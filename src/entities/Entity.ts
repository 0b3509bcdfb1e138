import { Vector2 } from '../math/Vector2.ts'
import type { ScreenSettings, Size } from '../config/GameConfig.ts'

/**
 * Which side an entity fights for. Power-ups belong to nobody.
 */
export type Faction = 'player' | 'enemy' | 'neutral'

/**
 * Base class for all simulated entities.
 * Position is the center of an axis-aligned box of `width` x `height`.
 * Velocity is in units per reference tick, so `move` scales by dt * tickRate.
 */
export abstract class Entity {
  public readonly id: number
  public readonly faction: Faction
  public readonly width: number
  public readonly height: number
  public alive: boolean = true
  protected position: Vector2
  protected velocity: Vector2

  constructor(id: number, faction: Faction, x: number, y: number, size: Size) {
    this.id = id
    this.faction = faction
    this.width = size.width
    this.height = size.height
    this.position = new Vector2(x, y)
    this.velocity = new Vector2(0, 0)
  }

  get x(): number {
    return this.position.x
  }

  set x(value: number) {
    this.position.x = value
  }

  get y(): number {
    return this.position.y
  }

  set y(value: number) {
    this.position.y = value
  }

  get vx(): number {
    return this.velocity.x
  }

  set vx(value: number) {
    this.velocity.x = value
  }

  get vy(): number {
    return this.velocity.y
  }

  set vy(value: number) {
    this.velocity.y = value
  }

  /**
   * Get speed (velocity magnitude)
   */
  getSpeed(): number {
    return this.velocity.length()
  }

  /**
   * Advance position by velocity over `dt` seconds
   */
  move(dt: number, tickRate: number): void {
    this.position.x += this.velocity.x * dt * tickRate
    this.position.y += this.velocity.y * dt * tickRate
  }

  distanceSquaredTo(other: Entity): number {
    return this.position.distanceSquaredTo(other.position)
  }

  /**
   * Bearing to another entity in radians
   */
  angleTo(other: Entity): number {
    return Math.atan2(other.y - this.y, other.x - this.x)
  }

  /**
   * True once the center is more than `offscreenMargin` past any edge
   */
  isOutside(screen: ScreenSettings): boolean {
    const m = screen.offscreenMargin
    return this.x < -m || this.x > screen.width + m || this.y < -m || this.y > screen.height + m
  }

  kill(): void {
    this.alive = false
  }

  /**
   * Advance own position and timers (override in subclasses)
   */
  abstract update(dt: number, tickRate: number): void

  /**
   * Whether the entity has left play and should be pruned
   */
  abstract isExpired(screen: ScreenSettings): boolean
}

/**
 * Interface for entities that can take damage.
 * Health never leaves [0, maxHealth].
 */
export interface Damageable {
  health: number
  maxHealth: number
  takeDamage(amount: number): boolean
  getHealthPercent(): number
}

/**
 * Subtract damage, clamping at zero
 */
export function reduceHealth(health: number, amount: number): number {
  return Math.max(0, health - Math.max(0, amount))
}

/**
 * Decrement a countdown, clamping at zero
 */
export function countdown(remaining: number, dt: number): number {
  return remaining > dt ? remaining - dt : 0
}
