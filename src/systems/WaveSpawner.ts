import { SafeConsole } from '../core/SafeConsole.ts'
import type { EnemyVariant, GameConfig, WaveWeightTable } from '../config/GameConfig.ts'
import { randomInt, weightedChoice, type RandomSource } from '../math/SeededRandom.ts'

/**
 * Spawn request for an enemy
 */
export interface EnemySpawn {
  variant: EnemyVariant
  x: number
  y: number
}

/**
 * Idle between waves; Spawning while the current wave still has enemies to send
 */
export type SpawnerState =
  | { phase: 'idle' }
  | { phase: 'spawning'; remaining: number; timer: number }

/**
 * Wave spawning system
 * Meters a wave's enemies out one per spawn delay and picks their variants
 */
export class WaveSpawner {
  private state: SpawnerState = { phase: 'idle' }
  private wave = 0
  private table: WaveWeightTable | null = null

  constructor(
    private readonly config: GameConfig,
    private readonly rng: RandomSource
  ) {}

  /**
   * Check if a wave should spawn a boss
   */
  shouldSpawnBoss(wave: number): boolean {
    return wave > 0 && wave % this.config.waves.bossInterval === 0
  }

  /**
   * Enemies a wave sends: one boss, or the base count plus a per-wave increase
   */
  getEnemyCount(wave: number): number {
    if (this.shouldSpawnBoss(wave)) return 1
    const { baseEnemies, enemiesPerWave } = this.config.waves
    return Math.max(0, baseEnemies + (wave - 1) * enemiesPerWave)
  }

  /**
   * Weight table for a wave. Waves past every table use the last one.
   */
  getWeightTable(wave: number): WaveWeightTable {
    const tables = this.config.waves.tables
    const table = tables.find((t) => wave <= t.upToWave)
    if (table) return table

    const fallback = tables.reduce((highest, t) => (t.upToWave > highest.upToWave ? t : highest))
    SafeConsole.warn(`[WaveSpawner] No weight table for wave ${wave}, using the one up to wave ${fallback.upToWave}`)
    return fallback
  }

  /**
   * Begin sending a wave. A wave with nothing to send leaves the spawner idle.
   */
  startWave(wave: number): void {
    this.wave = wave
    const count = this.getEnemyCount(wave)
    this.table = this.shouldSpawnBoss(wave) || count === 0 ? null : this.getWeightTable(wave)
    this.state = count > 0 ? { phase: 'spawning', remaining: count, timer: 0 } : { phase: 'idle' }
  }

  /**
   * Advance the spawn timer. Returns the enemy to create this tick, if any.
   */
  update(dt: number): EnemySpawn | null {
    const state = this.state
    if (state.phase === 'idle') return null

    const timer = state.timer + dt
    if (timer < this.config.waves.spawnDelay) {
      this.state = { ...state, timer }
      return null
    }

    const remaining = state.remaining - 1
    this.state = remaining > 0 ? { phase: 'spawning', remaining, timer: 0 } : { phase: 'idle' }
    return this.nextSpawn()
  }

  isIdle(): boolean {
    return this.state.phase === 'idle'
  }

  getState(): SpawnerState {
    return this.state
  }

  getWave(): number {
    return this.wave
  }

  reset(): void {
    this.state = { phase: 'idle' }
    this.wave = 0
    this.table = null
  }

  private nextSpawn(): EnemySpawn {
    const { screen, waves } = this.config

    if (this.shouldSpawnBoss(this.wave)) {
      return { variant: 'boss', x: screen.width / 2, y: waves.bossSpawnY }
    }

    const weights = this.table?.weights ?? []
    const margin = waves.spawnMarginX
    return {
      variant: weightedChoice(this.rng, weights) ?? 'basic',
      x: randomInt(this.rng, margin, screen.width - margin),
      y: randomInt(this.rng, waves.spawnMinY, waves.spawnMaxY),
    }
  }
}
