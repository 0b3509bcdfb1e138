import { Entity } from './Entity.ts'
import {
  POWERUP_KINDS,
  type GameConfig,
  type PowerUpKind,
  type ScreenSettings,
  type TimedPowerUpKind,
} from '../config/GameConfig.ts'

export type { PowerUpKind, TimedPowerUpKind }

/** Kinds that run on a countdown instead of applying once */
const TIMED_POWERUPS: Record<PowerUpKind, boolean> = {
  health: false,
  shield: true,
  rapid_fire: true,
  multi_shot: true,
  screen_clear: false,
  time_slow: true,
  homing: true,
}

export function isTimedPowerUp(kind: PowerUpKind): kind is TimedPowerUpKind {
  return TIMED_POWERUPS[kind]
}

/**
 * Validate a power-up kind arriving from outside the simulation
 */
export function parsePowerUpKind(raw: unknown): PowerUpKind | null {
  if (typeof raw !== 'string') return null
  return POWERUP_KINDS.find((kind) => kind === raw) ?? null
}

/**
 * PowerUp entity - collectible drifting down the screen
 */
export class PowerUp extends Entity {
  public readonly kind: PowerUpKind
  public readonly maxAge: number
  public age: number = 0

  constructor(id: number, kind: PowerUpKind, x: number, y: number, config: GameConfig) {
    super(id, 'neutral', x, y, config.powerUps.size)
    this.kind = kind
    this.maxAge = config.powerUps.maxAge
    this.vy = config.powerUps.fallSpeed
  }

  static create(id: number, kind: PowerUpKind, x: number, y: number, config: GameConfig): PowerUp {
    return new PowerUp(id, kind, x, y, config)
  }

  update(dt: number, tickRate: number): void {
    this.move(dt, tickRate)
    this.age += dt
  }

  /**
   * Gone once it falls past the bottom or sits uncollected too long
   */
  isExpired(screen: ScreenSettings): boolean {
    return this.y > screen.height + screen.offscreenMargin || this.age > this.maxAge
  }
}
