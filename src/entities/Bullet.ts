import { Entity } from './Entity.ts'
import type { BulletSettings, ScreenSettings, Size } from '../config/GameConfig.ts'

export type BulletKind = 'normal' | 'homing' | 'explosive'

export type BulletOwner = 'player' | 'enemy'

export interface BulletConfig {
  kind: BulletKind
  owner: BulletOwner
  damage: number
  size: Size
  maxLifetime: number
}

/**
 * Bullet entity - projectiles fired by the player and enemies
 */
export class Bullet extends Entity {
  public readonly kind: BulletKind
  public readonly owner: BulletOwner
  public readonly damage: number
  public readonly maxLifetime: number
  public age: number = 0
  /** Homing lock, resolved by id each tick */
  public targetId: number | null = null

  constructor(id: number, x: number, y: number, vx: number, vy: number, config: BulletConfig) {
    super(id, config.owner, x, y, config.size)
    this.vx = vx
    this.vy = vy
    this.kind = config.kind
    this.owner = config.owner
    this.damage = config.damage
    this.maxLifetime = config.maxLifetime
  }

  /**
   * Create a player projectile
   */
  static createPlayerShot(
    id: number,
    x: number,
    y: number,
    vx: number,
    vy: number,
    damage: number,
    settings: BulletSettings,
    kind: BulletKind = 'normal'
  ): Bullet {
    return new Bullet(id, x, y, vx, vy, {
      kind,
      owner: 'player',
      damage,
      size: settings.size,
      maxLifetime: settings.maxLifetime,
    })
  }

  /**
   * Create an enemy projectile
   */
  static createEnemyShot(
    id: number,
    x: number,
    y: number,
    vx: number,
    vy: number,
    damage: number,
    settings: BulletSettings,
    kind: BulletKind = 'normal'
  ): Bullet {
    return new Bullet(id, x, y, vx, vy, {
      kind,
      owner: 'enemy',
      damage,
      size: settings.size,
      maxLifetime: settings.maxLifetime,
    })
  }

  isHoming(): boolean {
    return this.kind === 'homing'
  }

  update(dt: number, tickRate: number): void {
    this.move(dt, tickRate)
    this.age += dt
  }

  isExpired(screen: ScreenSettings): boolean {
    return this.age > this.maxLifetime || this.isOutside(screen)
  }
}
