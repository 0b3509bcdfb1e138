import { describe, it, expect, beforeEach } from 'vitest'
import fc from 'fast-check'
import { acquireTarget, steerToward, guideBullet, type HomingSettings } from './Homing.ts'
import { Bullet } from '../entities/Bullet.ts'
import { Enemy } from '../entities/Enemy.ts'
import { createGameConfig, type GameConfig } from '../config/GameConfig.ts'

describe('Homing', () => {
  let config: GameConfig
  const settings: HomingSettings = { turnRate: 0.1, range: 200, tickRate: 60 }
  const dt = 1 / 60

  const missile = (x: number, y: number, vx: number, vy: number): Bullet =>
    Bullet.createPlayerShot(100, x, y, vx, vy, 1, config.bullets, 'homing')

  beforeEach(() => {
    config = createGameConfig()
  })

  describe('acquireTarget', () => {
    it('should pick the nearest candidate in range', () => {
      const bullet = missile(0, 0, 0, -6)
      const far = Enemy.create(1, 'basic', 150, 0, config)
      const near = Enemy.create(2, 'basic', 0, 100, config)
      expect(acquireTarget(bullet, [far, near], 200)).toBe(near)
    })

    it('should ignore candidates out of range or dead', () => {
      const bullet = missile(0, 0, 0, -6)
      const distant = Enemy.create(1, 'basic', 300, 0, config)
      const dead = Enemy.create(2, 'basic', 10, 0, config)
      dead.kill()
      expect(acquireTarget(bullet, [distant, dead], 200)).toBeNull()
    })

    it('should keep the first of equally near candidates', () => {
      const bullet = missile(0, 0, 0, -6)
      const left = Enemy.create(1, 'basic', -50, 0, config)
      const right = Enemy.create(2, 'basic', 50, 0, config)
      expect(acquireTarget(bullet, [left, right], 200)).toBe(left)
    })
  })

  describe('steerToward', () => {
    it('should turn by at most the turn rate per tick', () => {
      // Heading up (-PI/2), target to the right (0): wants +PI/2, gets 0.1
      const bullet = missile(0, 0, 0, -6)
      const target = Enemy.create(1, 'basic', 100, 0, config)
      const turn = steerToward(bullet, target, dt, settings)
      expect(turn).toBeCloseTo(0.1)
      expect(Math.atan2(bullet.vy, bullet.vx)).toBeCloseTo(-Math.PI / 2 + 0.1)
      expect(bullet.getSpeed()).toBeCloseTo(6)
    })

    it('should snap onto a bearing within the turn limit', () => {
      const bullet = missile(0, 0, 6, 0)
      const target = Enemy.create(1, 'basic', 100, 5, config)
      const turn = steerToward(bullet, target, dt, settings)
      expect(turn).toBeCloseTo(Math.atan2(5, 100))
    })

    it('should turn the short way across the PI boundary', () => {
      // Heading just below PI, target just above -PI: short way is positive
      const bullet = missile(0, 0, -6, 0.01)
      const target = Enemy.create(1, 'basic', -100, -1, config)
      expect(steerToward(bullet, target, dt, settings)).toBeGreaterThan(0)
    })

    it('should never exceed the turn bound', () => {
      fc.assert(
        fc.property(
          fc.double({ min: -Math.PI, max: Math.PI, noNaN: true }),
          fc.double({ min: -500, max: 500, noNaN: true }),
          fc.double({ min: -500, max: 500, noNaN: true }),
          fc.double({ min: 0.001, max: 0.1, noNaN: true }),
          (heading, tx, ty, step) => {
            const bullet = missile(0, 0, Math.cos(heading) * 6, Math.sin(heading) * 6)
            const target = Enemy.create(1, 'basic', tx, ty, config)
            const turn = steerToward(bullet, target, step, settings)
            return Math.abs(turn) <= settings.turnRate * step * settings.tickRate + 1e-12
          }
        )
      )
    })
  })

  describe('guideBullet', () => {
    it('should lock onto a target by id', () => {
      const bullet = missile(0, 0, 0, -6)
      const enemy = Enemy.create(7, 'basic', 50, -50, config)
      guideBullet(bullet, [enemy], dt, settings)
      expect(bullet.targetId).toBe(7)
    })

    it('should keep a lock outside acquisition range', () => {
      const bullet = missile(0, 0, 0, -6)
      const enemy = Enemy.create(7, 'basic', 50, -50, config)
      guideBullet(bullet, [enemy], dt, settings)
      enemy.x = 1000
      guideBullet(bullet, [enemy], dt, settings)
      expect(bullet.targetId).toBe(7)
    })

    it('should drop a dead lock and fly straight that tick', () => {
      const bullet = missile(0, 0, 0, -6)
      const first = Enemy.create(7, 'basic', 50, -50, config)
      const second = Enemy.create(8, 'basic', -20, -20, config)
      bullet.targetId = 7
      first.kill()

      guideBullet(bullet, [first, second], dt, settings)
      expect(bullet.targetId).toBeNull()
      expect(bullet.vx).toBe(0)
      expect(bullet.vy).toBe(-6)

      guideBullet(bullet, [first, second], dt, settings)
      expect(bullet.targetId).toBe(8)
    })

    it('should leave normal bullets alone', () => {
      const bullet = Bullet.createPlayerShot(1, 0, 0, 0, -8, 1, config.bullets)
      guideBullet(bullet, [Enemy.create(7, 'basic', 10, 0, config)], dt, settings)
      expect(bullet.targetId).toBeNull()
      expect(bullet.vx).toBe(0)
    })
  })
})
