/**
 * Game Simulation
 *
 * One session of play advanced a fixed step at a time. Each tick runs:
 * player control, enemy AI and fire, homing, movement, pruning, collision
 * detection and resolution, compaction, the game-over check, wave spawning
 * and completion, power-up timers, particles. Events raised along the way
 * are drained and returned once at the end.
 *
 * No wall clock, no Math.random(): identical seeds, inputs and dt streams
 * give identical event streams.
 */

import { SafeConsole } from '../core/SafeConsole.ts'
import { createGameConfig, type GameConfig } from '../config/GameConfig.ts'
import { Enemy } from '../entities/Enemy.ts'
import { Player } from '../entities/Player.ts'
import type { Bullet } from '../entities/Bullet.ts'
import { parsePowerUpKind, type PowerUp } from '../entities/PowerUp.ts'
import { SeededRandom, type RandomSource } from '../math/SeededRandom.ts'
import { BehaviorEngine } from '../systems/BehaviorEngine.ts'
import { spawnEnemyFire, spawnPlayerVolley } from '../systems/BulletPatterns.ts'
import { CollisionSystem } from '../systems/CollisionSystem.ts'
import { CombatResolver } from '../systems/CombatResolver.ts'
import { createTickStep, integrate } from '../systems/MovementIntegrator.ts'
import { ParticleSystem, type Particle } from '../systems/ParticleSystem.ts'
import { PowerUpEffects } from '../systems/PowerUpEffects.ts'
import { WaveSpawner } from '../systems/WaveSpawner.ts'
import { EntityStore } from './EntityStore.ts'
import { EventQueue, type OutputEvent } from './events.ts'
import type { InputIntent } from './input.ts'
import { clampLevel, isLevelComplete, unlockedLevels } from './Levels.ts'

// ============================================================================
// Types
// ============================================================================

export type SessionStatus = 'running' | 'game_over' | 'level_completed' | 'ended'

export interface SimulationOptions {
  config?: GameConfig
  /** Defaults to a SeededRandom on the configured seed */
  rng?: RandomSource
  level?: number
}

/**
 * Read-only view of a session for hosts that draw or inspect it
 */
export interface SimulationState {
  status: SessionStatus
  frame: number
  /** Seconds of play */
  time: number
  level: number
  wave: number
  score: number
  player: Player | null
  enemies: readonly Enemy[]
  playerBullets: readonly Bullet[]
  enemyBullets: readonly Bullet[]
  powerUps: readonly PowerUp[]
  particles: readonly Particle[]
}

// ============================================================================
// Main Simulation Class
// ============================================================================

export class Simulation {
  private readonly config: GameConfig
  private readonly rng: RandomSource
  private readonly store: EntityStore
  private readonly events = new EventQueue()
  private readonly collisions = new CollisionSystem()
  private readonly behavior: BehaviorEngine
  private readonly powerUps: PowerUpEffects
  private readonly combat: CombatResolver
  private readonly spawner: WaveSpawner
  private readonly particles: ParticleSystem

  private status: SessionStatus = 'running'
  private level: number
  private wave = 0
  private frame = 0
  private time = 0
  /** Clock enemies fire by; stands still during time freeze */
  private hostileTime = 0

  constructor(options: SimulationOptions = {}) {
    this.config = options.config ?? createGameConfig()
    this.rng = options.rng ?? new SeededRandom(this.config.seed)
    this.level = clampLevel(options.level ?? 1, this.config.levels)

    this.store = new EntityStore(this.config.bullets.maxBullets)
    this.behavior = new BehaviorEngine(this.config, this.rng)
    this.powerUps = new PowerUpEffects(this.config, this.events)
    this.combat = new CombatResolver(this.config, this.rng, this.events, this.powerUps)
    this.spawner = new WaveSpawner(this.config, this.rng)
    this.particles = new ParticleSystem(this.config.screen, this.config.effects.maxParticles)

    this.startSession()
  }

  // ==========================================================================
  // Session
  // ==========================================================================

  /**
   * Throw the current session away and start again, optionally on another level
   */
  reset(level: number = this.level): void {
    this.level = clampLevel(level, this.config.levels)
    this.startSession()
  }

  /**
   * Stop the session without a result. Every collection empties at once.
   */
  endSession(): void {
    if (this.status === 'running') this.status = 'ended'
    this.clearSession()
  }

  private startSession(): void {
    this.clearSession()
    this.store.setPlayer(Player.create(this.store.allocateId(), this.config))
    this.combat.reset()
    this.status = 'running'
    this.wave = 0
    this.frame = 0
    this.time = 0
    this.hostileTime = 0
    this.startWave(1)
  }

  private clearSession(): void {
    this.store.clear()
    this.spawner.reset()
    this.particles.clear()
    this.events.clear()
  }

  // ==========================================================================
  // Main Tick
  // ==========================================================================

  /**
   * Advance the session by `dt` seconds and return the events it raised.
   * A finished session or a non-positive dt does nothing.
   */
  tick(input: InputIntent, dt: number): OutputEvent[] {
    const player = this.store.getPlayer()
    if (this.status !== 'running' || !player || !(dt > 0)) return []

    this.frame++

    this.updatePlayerControl(player, input)

    const step = createTickStep(player, dt, this.config)
    this.time += step.dt
    this.hostileTime += step.hostileDt

    this.behavior.steerEnemies(this.store.getEnemies(), player, step.hostileDt)
    this.behavior.guideBullets(this.store, step.dt, step.hostileDt)

    integrate(this.store, step, this.config)

    const requests = this.behavior.planEnemyFire(this.store.getEnemies(), player, step.hostileDt, this.hostileTime)
    for (const request of requests) {
      spawnEnemyFire(this.store, request, this.config.bullets, this.rng)
    }
    this.store.prune(this.config.screen)

    this.combat.resolve(this.collisions.detect(this.store), this.store)
    this.store.compact()

    if (player.isDestroyed()) {
      return this.finish('game_over')
    }

    if (this.updateWaves(dt)) {
      return this.finish('level_completed')
    }

    this.powerUps.tick(player, dt)

    this.particles.handleEvents(this.events.peek(), this.rng)
    this.particles.update(dt)

    return this.events.drain()
  }

  private updatePlayerControl(player: Player, input: InputIntent): void {
    player.steer(input.move.x, input.move.y)

    if (input.special && player.tryActivateSpecial()) {
      this.events.emit({
        type: 'special_activated',
        ability: 'time_freeze',
        duration: this.config.player.timeFreezeDuration,
      })
    }

    if (input.fire && player.tryFire()) {
      spawnPlayerVolley(this.store, player, this.config.bullets)
    }
  }

  // ==========================================================================
  // Waves
  // ==========================================================================

  private startWave(wave: number): void {
    this.wave = wave
    this.spawner.startWave(wave)
    if (this.spawner.shouldSpawnBoss(wave)) {
      this.events.emit({ type: 'boss_wave_started', waveNumber: wave })
    }
  }

  /**
   * Spawn this tick's enemy and roll over to the next wave once the field is
   * clear. Returns true when the level's last wave is done.
   */
  private updateWaves(dt: number): boolean {
    const spawn = this.spawner.update(dt)
    if (spawn) {
      this.store.addEnemy(Enemy.create(this.store.allocateId(), spawn.variant, spawn.x, spawn.y, this.config))
    }

    if (!this.spawner.isIdle() || this.store.getLiveEnemyCount() > 0) return false

    this.events.emit({ type: 'wave_completed', waveNumber: this.wave })
    const next = this.wave + 1
    if (isLevelComplete(this.level, next, this.config.levels)) return true

    this.startWave(next)
    return false
  }

  // ==========================================================================
  // Session end
  // ==========================================================================

  private finish(status: 'game_over' | 'level_completed'): OutputEvent[] {
    const finalScore = this.combat.getScore()
    const unlocked = unlockedLevels(finalScore, this.config.levels)

    if (status === 'game_over') {
      this.events.emit({
        type: 'game_over',
        finalScore,
        waveNumber: this.wave,
        level: this.level,
        unlockedLevels: unlocked,
      })
    } else {
      this.events.emit({ type: 'level_completed', level: this.level, finalScore, unlockedLevels: unlocked })
    }
    SafeConsole.info(`[Simulation] ${status} on level ${this.level}, wave ${this.wave}, score ${finalScore}`)

    this.status = status
    const drained = this.events.drain()
    this.clearSession()
    return drained
  }

  // ==========================================================================
  // External requests
  // ==========================================================================

  /**
   * Drop a power-up into play on a host's request. Unknown kinds are
   * rejected and nothing changes.
   */
  spawnPowerUp(x: number, y: number, rawKind: unknown): boolean {
    const kind = parsePowerUpKind(rawKind)
    if (this.status !== 'running' || kind === null || !Number.isFinite(x) || !Number.isFinite(y)) {
      SafeConsole.warn('[Simulation] Rejected power-up spawn:', rawKind)
      return false
    }
    this.powerUps.spawn(this.store, kind, x, y)
    return true
  }

  // ==========================================================================
  // Accessors
  // ==========================================================================

  getStatus(): SessionStatus {
    return this.status
  }

  isRunning(): boolean {
    return this.status === 'running'
  }

  getFrame(): number {
    return this.frame
  }

  getLevel(): number {
    return this.level
  }

  getWave(): number {
    return this.wave
  }

  getScore(): number {
    return this.combat.getScore()
  }

  getConfig(): GameConfig {
    return this.config
  }

  getStore(): EntityStore {
    return this.store
  }

  getState(): SimulationState {
    return {
      status: this.status,
      frame: this.frame,
      time: this.time,
      level: this.level,
      wave: this.wave,
      score: this.combat.getScore(),
      player: this.store.getPlayer(),
      enemies: this.store.getEnemies(),
      playerBullets: this.store.getPlayerBullets(),
      enemyBullets: this.store.getEnemyBullets(),
      powerUps: this.store.getPowerUps(),
      particles: this.particles.getParticles(),
    }
  }
}
