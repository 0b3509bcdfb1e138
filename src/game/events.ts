/**
 * Output events
 *
 * The only channel from the simulation to its hosts (rendering, audio, HUD,
 * persistence). Emitted during a tick, drained once at its end.
 */

import type { EnemyVariant, PowerUpKind, TimedPowerUpKind } from '../config/GameConfig.ts'

// =============================================================================
// Event Types
// =============================================================================

export type OutputEvent =
  | EnemyDestroyedEvent
  | PlayerDamagedEvent
  | PowerUpCollectedEvent
  | PowerUpSpawnedEvent
  | PowerUpExpiredEvent
  | ExplosionRequestedEvent
  | ScreenFeedbackEvent
  | WaveCompletedEvent
  | BossWaveStartedEvent
  | SpecialActivatedEvent
  | LevelCompletedEvent
  | GameOverEvent

export type OutputEventType = OutputEvent['type']

/** How an enemy died; only bullets award score */
export type DestroyCause = 'bullet' | 'collision' | 'screen_clear'

export interface EnemyDestroyedEvent {
  type: 'enemy_destroyed'
  enemyId: number
  variant: EnemyVariant
  x: number
  y: number
  scoreValue: number
  cause: DestroyCause
}

export interface PlayerDamagedEvent {
  type: 'player_damaged'
  amount: number
  remainingHealth: number
}

export interface PowerUpCollectedEvent {
  type: 'powerup_collected'
  kind: PowerUpKind
}

export interface PowerUpSpawnedEvent {
  type: 'powerup_spawned'
  powerUpId: number
  kind: PowerUpKind
  x: number
  y: number
}

export interface PowerUpExpiredEvent {
  type: 'powerup_expired'
  kind: TimedPowerUpKind
}

export interface ExplosionRequestedEvent {
  type: 'explosion_requested'
  x: number
  y: number
  /** Particle count */
  intensity: number
}

export type FlashKind = 'damage' | 'powerup'

export interface ScreenFeedbackEvent {
  type: 'screen_feedback'
  shake: number
  flash: FlashKind | null
  flashDuration: number
}

export interface WaveCompletedEvent {
  type: 'wave_completed'
  waveNumber: number
}

export interface BossWaveStartedEvent {
  type: 'boss_wave_started'
  waveNumber: number
}

export interface SpecialActivatedEvent {
  type: 'special_activated'
  ability: 'time_freeze'
  duration: number
}

export interface LevelCompletedEvent {
  type: 'level_completed'
  level: number
  finalScore: number
  unlockedLevels: number[]
}

export interface GameOverEvent {
  type: 'game_over'
  finalScore: number
  waveNumber: number
  level: number
  unlockedLevels: number[]
}

/**
 * Narrow a drained batch to one event type
 */
export function eventsOfType<T extends OutputEventType>(
  events: readonly OutputEvent[],
  type: T
): Extract<OutputEvent, { type: T }>[] {
  return events.filter((event): event is Extract<OutputEvent, { type: T }> => event.type === type)
}

// =============================================================================
// Queue
// =============================================================================

/**
 * FIFO of events raised during the current tick
 */
export class EventQueue {
  private events: OutputEvent[] = []

  emit(event: OutputEvent): void {
    this.events.push(event)
  }

  /**
   * Events raised so far this tick, oldest first
   */
  peek(): readonly OutputEvent[] {
    return this.events
  }

  /**
   * Hand over every pending event and empty the queue
   */
  drain(): OutputEvent[] {
    const drained = this.events
    this.events = []
    return drained
  }

  get size(): number {
    return this.events.length
  }

  clear(): void {
    this.events = []
  }
}
