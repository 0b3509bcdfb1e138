import { SafeConsole } from '../core/SafeConsole.ts'
import type { ScreenSettings } from '../config/GameConfig.ts'
import type { OutputEvent } from '../game/events.ts'
import { randomRange, type RandomSource } from '../math/SeededRandom.ts'

/** Added to vy per second */
const GRAVITY = 50
/** Velocity multiplier per update */
const FRICTION = 0.95
/** Lifetime lost per second */
const FADE_RATE = 2
/** Particles die this far outside the field */
const CULL_MARGIN = 50

/**
 * Particle for visual effects
 */
export interface Particle {
  id: number
  x: number
  y: number
  vx: number
  vy: number
  size: number
  life: number
  maxLife: number
}

/**
 * Particle emitter configuration
 */
export interface EmitterConfig {
  x: number
  y: number
  count: number
  minSpeed: number
  maxSpeed: number
  minSize: number
  maxSize: number
  minLife: number
  maxLife: number
  /** Random offset of each spawn point, either axis */
  jitter?: number
}

/**
 * Particle system for managing visual effects. Nothing else in the
 * simulation reads particles; hosts draw them.
 */
export class ParticleSystem {
  private particles: Particle[] = []
  private nextId: number = 1
  private maxParticles: number

  constructor(
    private readonly screen: ScreenSettings,
    maxParticles: number = 500
  ) {
    this.maxParticles = maxParticles
  }

  /**
   * Get all active particles
   */
  getParticles(): readonly Particle[] {
    return this.particles
  }

  /**
   * Emit particles in a burst, evicting the oldest beyond capacity
   */
  emit(config: EmitterConfig, rng: RandomSource): void {
    const jitter = config.jitter ?? 0
    let evicted = 0

    for (let i = 0; i < config.count; i++) {
      if (this.particles.length >= this.maxParticles) {
        this.particles.shift()
        evicted++
      }

      const angle = randomRange(rng, 0, Math.PI * 2)
      const speed = randomRange(rng, config.minSpeed, config.maxSpeed)
      const x = config.x + randomRange(rng, -jitter, jitter)
      const y = config.y + randomRange(rng, -jitter, jitter)
      const size = randomRange(rng, config.minSize, config.maxSize)
      const life = randomRange(rng, config.minLife, config.maxLife)

      this.particles.push({
        id: this.nextId++,
        x,
        y,
        vx: Math.cos(angle) * speed,
        vy: Math.sin(angle) * speed,
        size,
        life,
        maxLife: life,
      })
    }

    if (evicted > 0) {
      SafeConsole.debug(`[ParticleSystem] At capacity, evicted ${evicted} oldest particles`)
    }
  }

  /**
   * Emit explosion effect
   */
  emitExplosion(x: number, y: number, count: number, rng: RandomSource): void {
    this.emit({
      x,
      y,
      count,
      minSpeed: 50,
      maxSpeed: 200,
      minSize: 2,
      maxSize: 6,
      minLife: 0.5,
      maxLife: 1.5,
      jitter: 5,
    }, rng)
  }

  /**
   * Spawn the effects a tick's events ask for
   */
  handleEvents(events: readonly OutputEvent[], rng: RandomSource): void {
    for (const event of events) {
      if (event.type === 'explosion_requested') {
        this.emitExplosion(event.x, event.y, event.intensity, rng)
      }
    }
  }

  /**
   * Update all particles
   */
  update(dt: number): void {
    for (const particle of this.particles) {
      particle.life -= dt * FADE_RATE

      particle.vy += GRAVITY * dt
      particle.vx *= FRICTION
      particle.vy *= FRICTION

      particle.x += particle.vx * dt * 60
      particle.y += particle.vy * dt * 60
    }

    // Remove dead particles
    this.particles = this.particles.filter((p) => this.isAlive(p))
  }

  /**
   * Clear all particles
   */
  clear(): void {
    this.particles = []
  }

  private isAlive(particle: Particle): boolean {
    return (
      particle.life > 0 &&
      particle.x > -CULL_MARGIN &&
      particle.x < this.screen.width + CULL_MARGIN &&
      particle.y > -CULL_MARGIN &&
      particle.y < this.screen.height + CULL_MARGIN
    )
  }
}
