/**
 * Game configuration
 *
 * Every tunable table the simulation reads lives in one immutable object.
 * Systems receive it at construction; nothing reads module-level state.
 * Velocities are in units per reference tick (1/60 s), times in seconds.
 */

import { SafeConsole } from '../core/SafeConsole.ts'
import type { EnvSource } from '../core/env.ts'

// ============================================================================
// Shared unions
// ============================================================================

export type EnemyVariant = 'basic' | 'fast' | 'heavy' | 'zigzag' | 'boss'

/** Variants the weighted wave tables may pick; bosses come from boss waves only */
export type WaveEnemyVariant = Exclude<EnemyVariant, 'boss'>

export type PowerUpKind =
  | 'health'
  | 'shield'
  | 'rapid_fire'
  | 'multi_shot'
  | 'screen_clear'
  | 'time_slow'
  | 'homing'

/** Power-ups that run on a countdown instead of applying instantly */
export type TimedPowerUpKind = Exclude<PowerUpKind, 'health' | 'screen_clear'>

export type DifficultyName = 'CADET' | 'PILOT' | 'COMMANDER' | 'ACE' | 'LEGEND'

export const ENEMY_VARIANTS: readonly EnemyVariant[] = ['basic', 'fast', 'heavy', 'zigzag', 'boss']

export const POWERUP_KINDS: readonly PowerUpKind[] = [
  'health', 'shield', 'rapid_fire', 'multi_shot', 'screen_clear', 'time_slow', 'homing',
]

export const DIFFICULTY_NAMES: readonly DifficultyName[] = ['CADET', 'PILOT', 'COMMANDER', 'ACE', 'LEGEND']

// ============================================================================
// Section types
// ============================================================================

export interface Size {
  readonly width: number
  readonly height: number
}

export interface ScreenSettings {
  readonly width: number
  readonly height: number
  /** Distance past an edge before an entity counts as gone */
  readonly offscreenMargin: number
}

export interface DifficultyModifiers {
  readonly name: DifficultyName
  readonly description: string
  readonly enemySpeedMult: number
  readonly enemyHealthMult: number
  readonly spawnRateMult: number
  readonly playerDamageMult: number
  readonly scoreMult: number
  /** Max health multiplier for the player */
  readonly playerHealthMult: number
}

export interface PlayerSettings {
  readonly speed: number
  readonly maxHealth: number
  readonly fireRate: number
  readonly size: Size
  readonly invulnerabilityTime: number
  readonly acceleration: number
  readonly friction: number
  readonly rapidFireSpeedMult: number
  readonly shieldSpeedMult: number
  readonly contactDamage: number
  readonly specialCooldown: number
  readonly timeFreezeDuration: number
  /** Half-angle offsets (radians) of a multi-shot volley */
  readonly multiShotAngles: readonly number[]
  readonly multiShotOffset: number
  readonly muzzleOffset: number
  readonly startY: number
}

export interface EnemyStats {
  readonly speed: number
  readonly health: number
  readonly score: number
  readonly size: Size
  /** Shots per second */
  readonly fireRate: number
  readonly bulletDamage: number
}

export interface EnemyAiSettings {
  readonly fireRange: number
  readonly trackThreshold: number
  readonly trackSpeed: number
  readonly aimedShotSpeedMult: number
  readonly fastRetargetInterval: number
  readonly fastSteer: number
  readonly targetMargin: number
  readonly bossPatternDuration: number
  readonly bossOrbitCenterY: number
  readonly bossOrbitRadius: number
  readonly bossPursuitRange: number
  readonly bossSpread: { readonly count: number; readonly angle: number; readonly speedMult: number }
  readonly bossRing: { readonly count: number; readonly speedMult: number }
  readonly bossMissiles: { readonly count: number; readonly jitter: number; readonly damageMult: number }
}

export interface BulletSettings {
  readonly speed: number
  readonly damage: number
  readonly size: Size
  readonly homingSpeed: number
  /** Radians per reference tick */
  readonly homingTurnRate: number
  readonly homingRange: number
  readonly maxLifetime: number
  /** Shared by both factions; each faction keeps half */
  readonly maxBullets: number
}

export interface PowerUpSettings {
  readonly spawnChance: number
  readonly duration: number
  readonly fallSpeed: number
  readonly size: Size
  readonly maxAge: number
  readonly healAmount: number
  readonly weights: Readonly<Record<PowerUpKind, number>>
  readonly bossRareChance: number
  readonly bossClearChance: number
}

export interface WaveWeightTable {
  /** Last wave number this table covers */
  readonly upToWave: number
  readonly weights: readonly { readonly value: WaveEnemyVariant; readonly weight: number }[]
}

export interface WaveSettings {
  readonly baseEnemies: number
  readonly enemiesPerWave: number
  readonly bossInterval: number
  readonly spawnDelay: number
  /** Distance from either side wall kept clear of spawns */
  readonly spawnMarginX: number
  readonly spawnMinY: number
  readonly spawnMaxY: number
  readonly bossSpawnY: number
  readonly tables: readonly WaveWeightTable[]
}

export interface LevelSettings {
  readonly maxLevels: number
  readonly baseWaves: number
  readonly wavesPerLevel: number
  /** Score needed to unlock level i + 1 */
  readonly unlockScores: readonly number[]
}

export interface EffectSettings {
  readonly timeSlowScale: number
  readonly screenShake: number
  readonly contactShake: number
  readonly damageFlash: number
  readonly powerUpFlash: number
  readonly hitExplosion: number
  readonly explosiveHitExplosion: number
  readonly contactExplosion: number
  readonly maxParticles: number
}

export interface GameConfig {
  /** Ticks per second the velocity units are expressed in */
  readonly referenceTickRate: number
  readonly difficulty: DifficultyName
  readonly seed: number
  readonly screen: ScreenSettings
  readonly difficulties: Readonly<Record<DifficultyName, DifficultyModifiers>>
  readonly player: PlayerSettings
  readonly enemies: Readonly<Record<EnemyVariant, EnemyStats>>
  readonly enemyAi: EnemyAiSettings
  readonly bullets: BulletSettings
  readonly powerUps: PowerUpSettings
  readonly waves: WaveSettings
  readonly levels: LevelSettings
  readonly effects: EffectSettings
}

/**
 * Per-section partial overrides for {@link createGameConfig}
 */
export interface ConfigOverrides {
  referenceTickRate?: number
  difficulty?: DifficultyName
  seed?: number
  screen?: Partial<ScreenSettings>
  player?: Partial<PlayerSettings>
  enemies?: Partial<Record<EnemyVariant, Partial<EnemyStats>>>
  enemyAi?: Partial<EnemyAiSettings>
  bullets?: Partial<BulletSettings>
  powerUps?: Partial<PowerUpSettings>
  waves?: Partial<WaveSettings>
  levels?: Partial<LevelSettings>
  effects?: Partial<EffectSettings>
}

// ============================================================================
// Defaults
// ============================================================================

const square = (side: number): Size => ({ width: side, height: side })

export const DEFAULT_CONFIG: GameConfig = {
  referenceTickRate: 60,
  difficulty: 'COMMANDER',
  seed: 1,
  screen: { width: 1200, height: 800, offscreenMargin: 50 },
  difficulties: {
    CADET: {
      name: 'CADET', description: 'Perfect for beginners',
      enemySpeedMult: 0.7, enemyHealthMult: 0.8, spawnRateMult: 0.8,
      playerDamageMult: 1.5, scoreMult: 1.0, playerHealthMult: 1.2,
    },
    PILOT: {
      name: 'PILOT', description: 'Balanced challenge',
      enemySpeedMult: 0.85, enemyHealthMult: 0.9, spawnRateMult: 0.9,
      playerDamageMult: 1.2, scoreMult: 1.2, playerHealthMult: 1.2,
    },
    COMMANDER: {
      name: 'COMMANDER', description: 'Standard difficulty',
      enemySpeedMult: 1.0, enemyHealthMult: 1.0, spawnRateMult: 1.0,
      playerDamageMult: 1.0, scoreMult: 1.5, playerHealthMult: 1.0,
    },
    ACE: {
      name: 'ACE', description: 'For experienced pilots',
      enemySpeedMult: 1.2, enemyHealthMult: 1.3, spawnRateMult: 1.2,
      playerDamageMult: 0.8, scoreMult: 2.0, playerHealthMult: 1.0,
    },
    LEGEND: {
      name: 'LEGEND', description: 'Only for the elite',
      enemySpeedMult: 1.5, enemyHealthMult: 1.5, spawnRateMult: 1.4,
      playerDamageMult: 0.6, scoreMult: 3.0, playerHealthMult: 1.0,
    },
  },
  player: {
    speed: 5,
    maxHealth: 100,
    fireRate: 10,
    size: square(40),
    invulnerabilityTime: 2.0,
    acceleration: 0.5,
    friction: 0.8,
    rapidFireSpeedMult: 1.2,
    shieldSpeedMult: 0.8,
    contactDamage: 10,
    specialCooldown: 15.0,
    timeFreezeDuration: 3.0,
    multiShotAngles: [-0.3, 0, 0.3],
    multiShotOffset: 20,
    muzzleOffset: 20,
    startY: 700,
  },
  enemies: {
    basic: { speed: 2, health: 1, score: 100, size: square(30), fireRate: 1.0, bulletDamage: 1 },
    fast: { speed: 4, health: 1, score: 150, size: square(25), fireRate: 1.5, bulletDamage: 1 },
    heavy: { speed: 1, health: 5, score: 300, size: square(45), fireRate: 0.5, bulletDamage: 1 },
    zigzag: { speed: 3, health: 2, score: 200, size: square(35), fireRate: 0.8, bulletDamage: 1 },
    boss: { speed: 1.5, health: 50, score: 1000, size: square(80), fireRate: 3.0, bulletDamage: 1 },
  },
  enemyAi: {
    fireRange: 400,
    trackThreshold: 50,
    trackSpeed: 0.5,
    aimedShotSpeedMult: 0.8,
    fastRetargetInterval: 0.5,
    fastSteer: 0.1,
    targetMargin: 50,
    bossPatternDuration: 5.0,
    bossOrbitCenterY: 150,
    bossOrbitRadius: 100,
    bossPursuitRange: 200,
    bossSpread: { count: 5, angle: 0.8, speedMult: 0.6 },
    bossRing: { count: 8, speedMult: 0.5 },
    bossMissiles: { count: 2, jitter: 20, damageMult: 2 },
  },
  bullets: {
    speed: 8,
    damage: 1,
    size: { width: 4, height: 10 },
    homingSpeed: 6,
    homingTurnRate: 0.1,
    homingRange: 200,
    maxLifetime: 5.0,
    maxBullets: 200,
  },
  powerUps: {
    spawnChance: 0.15,
    duration: 10.0,
    fallSpeed: 2,
    size: square(24),
    maxAge: 15.0,
    healAmount: 25,
    weights: {
      health: 25,
      shield: 20,
      rapid_fire: 20,
      multi_shot: 15,
      screen_clear: 10,
      time_slow: 7,
      homing: 3,
    },
    bossRareChance: 0.5,
    bossClearChance: 0.25,
  },
  waves: {
    baseEnemies: 5,
    enemiesPerWave: 2,
    bossInterval: 5,
    spawnDelay: 1.0,
    spawnMarginX: 50,
    spawnMinY: -100,
    spawnMaxY: -50,
    bossSpawnY: -50,
    tables: [
      { upToWave: 2, weights: [{ value: 'basic', weight: 100 }] },
      { upToWave: 5, weights: [{ value: 'basic', weight: 70 }, { value: 'fast', weight: 30 }] },
      {
        upToWave: 10,
        weights: [{ value: 'basic', weight: 50 }, { value: 'fast', weight: 30 }, { value: 'heavy', weight: 20 }],
      },
      {
        upToWave: 20,
        weights: [
          { value: 'basic', weight: 40 },
          { value: 'fast', weight: 30 },
          { value: 'heavy', weight: 20 },
          { value: 'zigzag', weight: 10 },
        ],
      },
    ],
  },
  levels: {
    maxLevels: 20,
    baseWaves: 10,
    wavesPerLevel: 2,
    unlockScores: [
      0, 1000, 2500, 5000, 8000, 12000, 17000, 23000, 30000, 40000,
      52000, 66000, 82000, 100000, 120000, 142000, 166000, 192000, 220000, 250000,
    ],
  },
  effects: {
    timeSlowScale: 0.5,
    screenShake: 5,
    contactShake: 10,
    damageFlash: 0.1,
    powerUpFlash: 0.2,
    hitExplosion: 10,
    explosiveHitExplosion: 20,
    contactExplosion: 15,
    maxParticles: 500,
  },
}

// ============================================================================
// Construction
// ============================================================================

function freezeDeep(value: object): void {
  for (const child of Object.values(value)) {
    if (typeof child === 'object' && child !== null && !Object.isFrozen(child)) {
      freezeDeep(child)
    }
  }
  Object.freeze(value)
}

function mergeEnemies(
  base: GameConfig['enemies'],
  overrides: ConfigOverrides['enemies'] = {}
): Record<EnemyVariant, EnemyStats> {
  return {
    basic: { ...base.basic, ...overrides.basic },
    fast: { ...base.fast, ...overrides.fast },
    heavy: { ...base.heavy, ...overrides.heavy },
    zigzag: { ...base.zigzag, ...overrides.zigzag },
    boss: { ...base.boss, ...overrides.boss },
  }
}

function validate(config: GameConfig): void {
  if (config.screen.width <= 0 || config.screen.height <= 0) {
    throw new Error(`Invalid screen size ${config.screen.width}x${config.screen.height}`)
  }
  if (config.referenceTickRate <= 0) {
    throw new Error(`Invalid reference tick rate ${config.referenceTickRate}`)
  }
  if (config.waves.tables.length === 0) {
    throw new Error('At least one wave weight table is required')
  }
}

freezeDeep(DEFAULT_CONFIG)

/**
 * Build a frozen configuration from the defaults and per-section overrides.
 * Throws only for values no tick could run with.
 */
export function createGameConfig(overrides: ConfigOverrides = {}): GameConfig {
  const base = DEFAULT_CONFIG
  const config: GameConfig = {
    referenceTickRate: overrides.referenceTickRate ?? base.referenceTickRate,
    difficulty: overrides.difficulty ?? base.difficulty,
    seed: overrides.seed ?? base.seed,
    screen: { ...base.screen, ...overrides.screen },
    difficulties: base.difficulties,
    player: { ...base.player, ...overrides.player },
    enemies: mergeEnemies(base.enemies, overrides.enemies),
    enemyAi: { ...base.enemyAi, ...overrides.enemyAi },
    bullets: { ...base.bullets, ...overrides.bullets },
    powerUps: { ...base.powerUps, ...overrides.powerUps },
    waves: { ...base.waves, ...overrides.waves },
    levels: { ...base.levels, ...overrides.levels },
    effects: { ...base.effects, ...overrides.effects },
  }
  validate(config)
  freezeDeep(config)
  return config
}

/**
 * Modifiers of the configured difficulty
 */
export function getDifficulty(config: GameConfig): DifficultyModifiers {
  return config.difficulties[config.difficulty]
}

export function isDifficultyName(value: unknown): value is DifficultyName {
  return typeof value === 'string' && DIFFICULTY_NAMES.some((name) => name === value)
}

/**
 * Read SIM_DIFFICULTY and SIM_SEED. Invalid values are dropped with a warning.
 */
export function loadConfigOverridesFromEnv(env: EnvSource = process.env): ConfigOverrides {
  const overrides: ConfigOverrides = {}

  const difficulty = env.SIM_DIFFICULTY?.toUpperCase()
  if (difficulty !== undefined) {
    if (isDifficultyName(difficulty)) {
      overrides.difficulty = difficulty
    } else {
      SafeConsole.warn('[GameConfig] Ignoring unknown SIM_DIFFICULTY:', env.SIM_DIFFICULTY)
    }
  }

  const seed = env.SIM_SEED
  if (seed !== undefined) {
    const parsed = Number(seed)
    if (Number.isInteger(parsed) && parsed > 0) {
      overrides.seed = parsed
    } else {
      SafeConsole.warn('[GameConfig] Ignoring invalid SIM_SEED:', seed)
    }
  }

  return overrides
}
