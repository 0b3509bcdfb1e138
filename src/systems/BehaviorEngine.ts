/**
 * Behavior Engine
 *
 * Enemy AI as pure functions of (state, dt, player position): each variant
 * yields a velocity and its next scratch state. Fire gating turns the result
 * into fire requests; homing bullets are steered here too.
 */

import type { BehaviorState, BossPattern, Enemy } from '../entities/Enemy.ts'
import { BOSS_PATTERNS } from '../entities/Enemy.ts'
import type { Player } from '../entities/Player.ts'
import type { EntityStore } from '../game/EntityStore.ts'
import type { BulletSettings, EnemyAiSettings, GameConfig, ScreenSettings } from '../config/GameConfig.ts'
import { randomInt, type RandomSource } from '../math/SeededRandom.ts'
import type { FireRequest } from './BulletPatterns.ts'
import { guideBullet, type HomingSettings } from './Homing.ts'

// Motion shape constants (units per reference tick)
const HEAVY_DESCENT = 0.8
const HEAVY_SWAY = 0.5
const ZIGZAG_FREQUENCY = 3
const ZIGZAG_AMPLITUDE = 2
const SWEEP_FREQUENCY = 2
const SWEEP_AMPLITUDE = 3
const SWEEP_DESCENT = 0.5
const ORBIT_FREQUENCY = 2
const ORBIT_FOLLOW = 0.05
const PURSUIT_SPEED = 2
const RETREAT_FACTOR = 0.01

export interface BehaviorContext {
  dt: number
  playerX: number
  playerY: number
  screen: ScreenSettings
  ai: EnemyAiSettings
  rng: RandomSource
}

export interface MotionState {
  readonly x: number
  readonly y: number
  readonly speed: number
  readonly aiTimer: number
  readonly behavior: BehaviorState
}

export interface MotionResult {
  vx: number
  vy: number
  aiTimer: number
  behavior: BehaviorState
}

function assertUnreachable(value: never): never {
  throw new Error(`Unhandled behavior: ${JSON.stringify(value)}`)
}

// ============================================================================
// Variant motion
// ============================================================================

function basicMotion(state: MotionState, aiTimer: number, ctx: BehaviorContext): MotionResult {
  const dx = ctx.playerX - state.x
  const vx = Math.abs(dx) > ctx.ai.trackThreshold ? Math.sign(dx) * ctx.ai.trackSpeed : 0
  return { vx, vy: state.speed, aiTimer, behavior: state.behavior }
}

function fastMotion(state: MotionState, targetX: number, aiTimer: number, ctx: BehaviorContext): MotionResult {
  let timer = aiTimer
  let target = targetX
  if (timer > ctx.ai.fastRetargetInterval) {
    target = randomInt(ctx.rng, ctx.ai.targetMargin, ctx.screen.width - ctx.ai.targetMargin)
    timer = 0
  }
  return {
    vx: (target - state.x) * ctx.ai.fastSteer,
    vy: state.speed,
    aiTimer: timer,
    behavior: { kind: 'fast', targetX: target },
  }
}

function heavyMotion(state: MotionState, aiTimer: number): MotionResult {
  // Sways during one half-second out of every two
  const swaying = Math.floor(aiTimer * 2) % 4 === 0
  return {
    vx: swaying ? Math.sin(aiTimer) * HEAVY_SWAY : 0,
    vy: state.speed * HEAVY_DESCENT,
    aiTimer,
    behavior: state.behavior,
  }
}

function zigzagMotion(state: MotionState, aiTimer: number): MotionResult {
  return {
    vx: Math.sin(aiTimer * ZIGZAG_FREQUENCY) * ZIGZAG_AMPLITUDE,
    vy: state.speed,
    aiTimer,
    behavior: state.behavior,
  }
}

export function nextBossPattern(pattern: BossPattern): BossPattern {
  const index = BOSS_PATTERNS.indexOf(pattern)
  return BOSS_PATTERNS[(index + 1) % BOSS_PATTERNS.length] ?? 'sweep'
}

function bossMotion(
  state: MotionState,
  pattern: BossPattern,
  patternTimer: number,
  aiTimer: number,
  ctx: BehaviorContext
): MotionResult {
  let current = pattern
  let timer = patternTimer + ctx.dt
  if (timer > ctx.ai.bossPatternDuration) {
    current = nextBossPattern(current)
    timer = 0
  }
  const behavior: BehaviorState = { kind: 'boss', pattern: current, patternTimer: timer }

  switch (current) {
    case 'sweep':
      return {
        vx: Math.sin(aiTimer * SWEEP_FREQUENCY) * SWEEP_AMPLITUDE,
        vy: SWEEP_DESCENT,
        aiTimer,
        behavior,
      }
    case 'orbit': {
      const angle = aiTimer * ORBIT_FREQUENCY
      const radius = ctx.ai.bossOrbitRadius
      const targetX = Math.floor(ctx.screen.width / 2) + Math.cos(angle) * radius
      const targetY = ctx.ai.bossOrbitCenterY + Math.sin(angle) * radius * 0.5
      return {
        vx: (targetX - state.x) * ORBIT_FOLLOW,
        vy: (targetY - state.y) * ORBIT_FOLLOW,
        aiTimer,
        behavior,
      }
    }
    case 'pursuit': {
      const dx = ctx.playerX - state.x
      const dy = ctx.playerY - state.y
      const distance = Math.sqrt(dx * dx + dy * dy)
      if (distance > ctx.ai.bossPursuitRange) {
        return { vx: (dx / distance) * PURSUIT_SPEED, vy: (dy / distance) * PURSUIT_SPEED, aiTimer, behavior }
      }
      return { vx: -dx * RETREAT_FACTOR, vy: -dy * RETREAT_FACTOR, aiTimer, behavior }
    }
    default:
      return assertUnreachable(current)
  }
}

/**
 * Next velocity and scratch state for an enemy. The AI timer advances first.
 */
export function computeMotion(state: MotionState, ctx: BehaviorContext): MotionResult {
  const aiTimer = state.aiTimer + ctx.dt
  const behavior = state.behavior

  switch (behavior.kind) {
    case 'basic':
      return basicMotion(state, aiTimer, ctx)
    case 'fast':
      return fastMotion(state, behavior.targetX, aiTimer, ctx)
    case 'heavy':
      return heavyMotion(state, aiTimer)
    case 'zigzag':
      return zigzagMotion(state, aiTimer)
    case 'boss':
      return bossMotion(state, behavior.pattern, behavior.patternTimer, aiTimer, ctx)
    default:
      return assertUnreachable(behavior)
  }
}

// ============================================================================
// Firing
// ============================================================================

/**
 * Fire request for an enemy that is reloaded and within range of the player.
 * Bosses fire their current pattern; everything else aims at the player.
 */
export function planFire(
  enemy: Enemy,
  now: number,
  playerX: number,
  playerY: number,
  ai: EnemyAiSettings,
  bullets: BulletSettings
): FireRequest | null {
  if (!enemy.isReloaded(now)) return null

  const dx = playerX - enemy.x
  const dy = playerY - enemy.y
  if (Math.sqrt(dx * dx + dy * dy) > ai.fireRange) return null

  const x = enemy.x
  const y = enemy.y + enemy.height / 2
  const damage = enemy.bulletDamage
  const behavior = enemy.behavior

  if (behavior.kind !== 'boss') {
    return { pattern: 'aimed', x, y, targetX: playerX, targetY: playerY, speed: bullets.speed * ai.aimedShotSpeedMult, damage }
  }

  switch (behavior.pattern) {
    case 'sweep':
      return {
        pattern: 'spread',
        x,
        y,
        count: ai.bossSpread.count,
        spreadAngle: ai.bossSpread.angle,
        speed: bullets.speed * ai.bossSpread.speedMult,
        damage,
      }
    case 'orbit':
      return { pattern: 'ring', x, y, count: ai.bossRing.count, speed: bullets.speed * ai.bossRing.speedMult, damage }
    case 'pursuit':
      return {
        pattern: 'homing',
        x,
        y,
        count: ai.bossMissiles.count,
        jitter: ai.bossMissiles.jitter,
        speed: bullets.homingSpeed,
        damage: damage * ai.bossMissiles.damageMult,
      }
    default:
      return assertUnreachable(behavior.pattern)
  }
}

// ============================================================================
// Engine
// ============================================================================

export class BehaviorEngine {
  private readonly homing: HomingSettings

  constructor(
    private readonly config: GameConfig,
    private readonly rng: RandomSource
  ) {
    this.homing = {
      turnRate: config.bullets.homingTurnRate,
      range: config.bullets.homingRange,
      tickRate: config.referenceTickRate,
    }
  }

  /**
   * Set every live enemy's velocity for this tick. A frozen tick (dt 0)
   * leaves them untouched.
   */
  steerEnemies(enemies: readonly Enemy[], player: Player, dt: number): void {
    if (dt <= 0) return

    const ctx: BehaviorContext = {
      dt,
      playerX: player.x,
      playerY: player.y,
      screen: this.config.screen,
      ai: this.config.enemyAi,
      rng: this.rng,
    }

    for (const enemy of enemies) {
      if (!enemy.alive) continue

      const motion = computeMotion(enemy, ctx)
      enemy.vx = motion.vx
      enemy.vy = motion.vy
      enemy.aiTimer = motion.aiTimer
      enemy.behavior = motion.behavior
    }
  }

  /**
   * Fire requests from enemies at their post-move positions. `now` is the
   * hostile clock; a frozen tick fires nothing.
   */
  planEnemyFire(enemies: readonly Enemy[], player: Player, dt: number, now: number): FireRequest[] {
    if (dt <= 0) return []

    const requests: FireRequest[] = []
    for (const enemy of enemies) {
      if (!enemy.alive) continue

      const request = planFire(enemy, now, player.x, player.y, this.config.enemyAi, this.config.bullets)
      if (request) {
        enemy.lastShotTime = now
        requests.push(request)
      }
    }
    return requests
  }

  /**
   * Steer homing bullets: the player's at the enemies, the enemies' at the player
   */
  guideBullets(store: EntityStore, playerDt: number, hostileDt: number): void {
    const enemies = store.getEnemies()
    for (const bullet of store.getPlayerBullets()) {
      guideBullet(bullet, enemies, playerDt, this.homing)
    }

    if (hostileDt <= 0) return
    const player = store.getPlayer()
    const targets = player ? [player] : []
    for (const bullet of store.getEnemyBullets()) {
      guideBullet(bullet, targets, hostileDt, this.homing)
    }
  }
}
