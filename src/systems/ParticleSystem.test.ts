import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { ParticleSystem, type EmitterConfig } from './ParticleSystem.ts'
import { SafeConsole } from '../core/SafeConsole.ts'
import { createGameConfig } from '../config/GameConfig.ts'
import { SequenceRandom } from '../__tests__/SequenceRandom.ts'

describe('ParticleSystem', () => {
  const screen = createGameConfig().screen
  let system: ParticleSystem

  const fixed = (overrides: Partial<EmitterConfig>): EmitterConfig => ({
    x: 600,
    y: 400,
    count: 1,
    minSpeed: 10,
    maxSpeed: 10,
    minSize: 2,
    maxSize: 2,
    minLife: 1,
    maxLife: 1,
    ...overrides,
  })

  beforeEach(() => {
    system = new ParticleSystem(screen, 100)
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe('constructor', () => {
    it('should create empty particle system', () => {
      expect(system.getParticles()).toHaveLength(0)
    })
  })

  describe('emitExplosion', () => {
    it('should spread particles around the explosion', () => {
      // Every roll 0: angle 0, speed 50, offset -5, size 2, life 0.5
      system.emitExplosion(100, 100, 4, new SequenceRandom([0]))

      expect(system.getParticles()).toHaveLength(4)
      expect(system.getParticles()[0]).toEqual({
        id: 1,
        x: 95,
        y: 95,
        vx: 50,
        vy: 0,
        size: 2,
        life: 0.5,
        maxLife: 0.5,
      })
    })
  })

  describe('capacity', () => {
    it('should evict the oldest particles first', () => {
      vi.spyOn(SafeConsole, 'debug').mockImplementation(() => {})
      const small = new ParticleSystem(screen, 10)
      small.emit(fixed({ count: 15 }), new SequenceRandom([0]))

      expect(small.getParticles()).toHaveLength(10)
      expect(small.getParticles().map((p) => p.id)).toEqual([6, 7, 8, 9, 10, 11, 12, 13, 14, 15])
      expect(SafeConsole.debug).toHaveBeenCalledTimes(1)
    })
  })

  describe('update', () => {
    it('should apply gravity, friction and fade', () => {
      system.emitExplosion(100, 100, 1, new SequenceRandom([0]))
      system.update(0.1)

      const particle = system.getParticles()[0]
      expect(particle?.life).toBeCloseTo(0.3)
      expect(particle?.vx).toBeCloseTo(47.5)
      expect(particle?.vy).toBeCloseTo(4.75)
      expect(particle?.x).toBeCloseTo(95 + 47.5 * 6)
      expect(particle?.y).toBeCloseTo(95 + 4.75 * 6)
    })

    it('should remove particles whose life runs out', () => {
      system.emitExplosion(100, 100, 3, new SequenceRandom([0]))
      system.update(0.3)
      expect(system.getParticles()).toHaveLength(0)
    })

    it('should remove particles that leave the field', () => {
      system.emit(fixed({ x: 1200 }), new SequenceRandom([0]))
      system.update(0.1)
      expect(system.getParticles()).toHaveLength(0)
    })

    it('should keep particles that are still inside', () => {
      system.emit(fixed({ x: 600 }), new SequenceRandom([0]))
      system.update(0.1)
      expect(system.getParticles()).toHaveLength(1)
    })
  })

  describe('handleEvents', () => {
    it('should spawn a burst per explosion request', () => {
      system.handleEvents(
        [
          { type: 'explosion_requested', x: 10, y: 20, intensity: 3 },
          { type: 'wave_completed', waveNumber: 1 },
          { type: 'explosion_requested', x: 30, y: 40, intensity: 2 },
        ],
        new SequenceRandom([0.5])
      )
      expect(system.getParticles()).toHaveLength(5)
    })
  })

  describe('clear', () => {
    it('should remove all particles', () => {
      system.emitExplosion(100, 100, 5, new SequenceRandom([0]))
      system.clear()
      expect(system.getParticles()).toHaveLength(0)
    })
  })
})
