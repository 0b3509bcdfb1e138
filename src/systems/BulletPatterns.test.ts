import { describe, it, expect, beforeEach } from 'vitest'
import {
  aimedShot,
  spreadShot,
  ringShot,
  playerVolley,
  spawnEnemyFire,
  spawnPlayerVolley,
} from './BulletPatterns.ts'
import { EntityStore } from '../game/EntityStore.ts'
import { Player } from '../entities/Player.ts'
import { createGameConfig, type GameConfig } from '../config/GameConfig.ts'
import { SequenceRandom } from '../__tests__/SequenceRandom.ts'

describe('BulletPatterns', () => {
  let config: GameConfig
  let store: EntityStore
  let player: Player

  beforeEach(() => {
    config = createGameConfig()
    store = new EntityStore(config.bullets.maxBullets)
    player = Player.create(store.allocateId(), config)
    store.setPlayer(player)
  })

  describe('aimedShot', () => {
    it('should point at the target with the given speed', () => {
      const shot = aimedShot(0, 0, 30, 40, 6.4)
      expect(shot).not.toBeNull()
      expect(shot?.vx).toBeCloseTo(3.84)
      expect(shot?.vy).toBeCloseTo(5.12)
    })

    it('should not fire at a target on top of the shooter', () => {
      expect(aimedShot(10, 10, 10, 10, 8)).toBeNull()
    })
  })

  describe('spreadShot', () => {
    it('should fan enemy shots around straight down', () => {
      const shots = spreadShot(600, 100, 5, 0.8, 4.8, 'enemy')
      expect(shots).toHaveLength(5)
      const angles = shots.map((s) => Math.atan2(s.vy, s.vx) - Math.PI / 2)
      const expected = [-0.8, -0.4, 0, 0.4, 0.8]
      angles.forEach((angle, i) => expect(angle).toBeCloseTo(expected[i] ?? NaN))
      for (const shot of shots) {
        expect(Math.hypot(shot.vx, shot.vy)).toBeCloseTo(4.8)
      }
    })

    it('should fire a single shot straight', () => {
      const [shot] = spreadShot(0, 0, 1, 0.8, 8, 'player')
      expect(shot?.vx).toBeCloseTo(0)
      expect(shot?.vy).toBe(-8)
    })
  })

  describe('ringShot', () => {
    it('should space shots evenly around the circle', () => {
      const shots = ringShot(0, 0, 8, 4)
      expect(shots).toHaveLength(8)
      expect(shots[0]?.vx).toBe(4)
      expect(shots[2]?.vx).toBeCloseTo(0)
      expect(shots[2]?.vy).toBeCloseTo(4)
      expect(shots[4]?.vx).toBeCloseTo(-4)
    })
  })

  describe('playerVolley', () => {
    it('should fire one shot from the muzzle', () => {
      expect(playerVolley(player, config.player, 8, false)).toEqual([{ x: 600, y: 680, vx: 0, vy: -8 }])
    })

    it('should fan three shots with multi-shot', () => {
      const shots = playerVolley(player, config.player, 8, true)
      expect(shots).toHaveLength(3)
      expect(shots[0]?.x).toBeCloseTo(600 + Math.sin(-0.3) * 20)
      expect(shots[1]?.x).toBe(600)
      expect(shots[2]?.vx).toBeCloseTo(8 * Math.sin(0.3))
      expect(shots[2]?.vy).toBeCloseTo(-8 * Math.cos(0.3))
    })
  })

  describe('spawnEnemyFire', () => {
    it('should add one aimed enemy bullet', () => {
      const bullets = spawnEnemyFire(
        store,
        { pattern: 'aimed', x: 600, y: 315, targetX: 600, targetY: 700, speed: 6.4, damage: 1 },
        config.bullets,
        new SequenceRandom([0])
      )
      expect(bullets).toHaveLength(1)
      expect(bullets[0]?.owner).toBe('enemy')
      expect(bullets[0]?.vy).toBeCloseTo(6.4)
      expect(store.getEnemyBullets()).toHaveLength(1)
    })

    it('should add a ring of eight', () => {
      spawnEnemyFire(
        store,
        { pattern: 'ring', x: 600, y: 100, count: 8, speed: 4, damage: 1 },
        config.bullets,
        new SequenceRandom([0])
      )
      expect(store.getEnemyBullets()).toHaveLength(8)
    })

    it('should jitter homing missiles with the random source', () => {
      // randomInt(-20, 20): floor(0 * 41) - 20 = -20, floor(0.999 * 41) - 20 = 20
      const bullets = spawnEnemyFire(
        store,
        { pattern: 'homing', x: 600, y: 140, count: 2, jitter: 20, speed: 6, damage: 2 },
        config.bullets,
        new SequenceRandom([0, 0.999])
      )
      expect(bullets.map((b) => b.x)).toEqual([580, 620])
      expect(bullets.every((b) => b.kind === 'homing' && b.damage === 2 && b.vy === 6)).toBe(true)
    })

    it('should add nothing for an aimed shot at its own position', () => {
      const bullets = spawnEnemyFire(
        store,
        { pattern: 'aimed', x: 10, y: 10, targetX: 10, targetY: 10, speed: 6.4, damage: 1 },
        config.bullets,
        new SequenceRandom([0])
      )
      expect(bullets).toEqual([])
    })
  })

  describe('spawnPlayerVolley', () => {
    it('should fire a normal shot by default', () => {
      const bullets = spawnPlayerVolley(store, player, config.bullets)
      expect(bullets).toHaveLength(1)
      expect(bullets[0]?.kind).toBe('normal')
      expect(bullets[0]?.vy).toBe(-8)
      expect(store.getPlayerBullets()).toHaveLength(1)
    })

    it('should fire slower homing shots with the homing power-up', () => {
      player.powerUps.set('homing', 10)
      const bullets = spawnPlayerVolley(store, player, config.bullets)
      expect(bullets[0]?.kind).toBe('homing')
      expect(bullets[0]?.vy).toBe(-6)
    })

    it('should fire three shots with multi-shot', () => {
      player.powerUps.set('multi_shot', 10)
      expect(spawnPlayerVolley(store, player, config.bullets)).toHaveLength(3)
    })

    it('should carry the difficulty damage', () => {
      const cadet = Player.create(99, createGameConfig({ difficulty: 'CADET' }))
      const [bullet] = spawnPlayerVolley(store, cadet, config.bullets)
      expect(bullet?.damage).toBe(1.5)
    })
  })
})
