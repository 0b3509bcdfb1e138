import { describe, it, expect, beforeEach } from 'vitest'
import fc from 'fast-check'
import { CollisionSystem, boxVsBox, entitiesCollide } from './CollisionSystem.ts'
import { EntityStore } from '../game/EntityStore.ts'
import { Player } from '../entities/Player.ts'
import { Enemy } from '../entities/Enemy.ts'
import { Bullet } from '../entities/Bullet.ts'
import { PowerUp } from '../entities/PowerUp.ts'
import { createGameConfig, type GameConfig } from '../config/GameConfig.ts'

describe('collision primitives', () => {
  describe('boxVsBox', () => {
    it('should detect overlapping boxes', () => {
      expect(boxVsBox(0, 0, 10, 10, 15, 0, 10, 10)).toBe(true)
    })

    it('should not count touching edges', () => {
      expect(boxVsBox(0, 0, 10, 10, 20, 0, 10, 10)).toBe(false)
    })

    it('should detect non-overlapping boxes', () => {
      expect(boxVsBox(0, 0, 10, 10, 25, 0, 10, 10)).toBe(false)
    })

    it('should detect contained boxes', () => {
      expect(boxVsBox(0, 0, 20, 20, 5, 5, 5, 5)).toBe(true)
    })

    it('should require overlap on both axes', () => {
      expect(boxVsBox(0, 0, 10, 10, 5, 30, 10, 10)).toBe(false)
    })

    it('should be symmetric', () => {
      const coord = fc.integer({ min: -500, max: 500 })
      const half = fc.integer({ min: 1, max: 60 })
      fc.assert(
        fc.property(coord, coord, half, half, coord, coord, half, half, (x1, y1, w1, h1, x2, y2, w2, h2) => {
          expect(boxVsBox(x1, y1, w1, h1, x2, y2, w2, h2)).toBe(boxVsBox(x2, y2, w2, h2, x1, y1, w1, h1))
        })
      )
    })
  })
})

describe('CollisionSystem', () => {
  let config: GameConfig
  let store: EntityStore
  let system: CollisionSystem
  let player: Player

  const enemyAt = (x: number, y: number): Enemy => {
    const enemy = Enemy.create(store.allocateId(), 'basic', x, y, config)
    store.addEnemy(enemy)
    return enemy
  }

  const playerShotAt = (x: number, y: number): Bullet => {
    const bullet = Bullet.createPlayerShot(store.allocateId(), x, y, 0, -8, 1, config.bullets)
    store.addBullet(bullet)
    return bullet
  }

  beforeEach(() => {
    config = createGameConfig()
    store = new EntityStore(config.bullets.maxBullets)
    system = new CollisionSystem()
    player = Player.create(store.allocateId(), config)
    store.setPlayer(player)
  })

  it('should use each entity size', () => {
    const enemy = enemyAt(100, 100)
    // Half widths 2 + 15 = 17
    expect(entitiesCollide(playerShotAt(116, 100), enemy)).toBe(true)
    expect(entitiesCollide(playerShotAt(117, 100), enemy)).toBe(false)
  })

  it('should report nothing for an empty field', () => {
    expect(system.detect(store)).toEqual([])
  })

  it('should report every enemy a bullet overlaps in store order', () => {
    const first = enemyAt(100, 100)
    const second = enemyAt(105, 100)
    enemyAt(140, 100)
    const bullet = playerShotAt(102, 100)

    expect(system.detect(store)).toEqual([{ kind: 'bullet_enemy', bullet, enemies: [first, second] }])
  })

  it('should ignore dead entities', () => {
    const enemy = enemyAt(100, 100)
    enemy.kill()
    const bullet = playerShotAt(100, 100)
    const shot = Bullet.createEnemyShot(store.allocateId(), player.x, player.y, 0, 6, 1, config.bullets)
    shot.kill()
    store.addBullet(shot)

    expect(system.detect(store)).toEqual([])
    expect(bullet.alive).toBe(true)
  })

  it('should report groups in resolution order', () => {
    const enemy = enemyAt(player.x + 10, player.y)
    const bullet = playerShotAt(player.x + 10, player.y)
    const shot = Bullet.createEnemyShot(store.allocateId(), player.x, player.y, 0, 6, 1, config.bullets)
    store.addBullet(shot)
    const powerUp = PowerUp.create(store.allocateId(), 'shield', player.x, player.y, config)
    store.addPowerUp(powerUp)

    expect(system.detect(store).map((result) => result.kind)).toEqual([
      'bullet_enemy',
      'enemy_bullet_player',
      'enemy_player',
      'player_powerup',
    ])
    expect(bullet.alive).toBe(true)
    expect(enemy.health).toBe(1)
  })

  it('should skip player collisions once the player is gone', () => {
    enemyAt(player.x, player.y)
    player.kill()
    expect(system.detect(store)).toEqual([])
  })

  describe('findCollisions', () => {
    it('should return only live overlapping targets', () => {
      const a = enemyAt(100, 100)
      const b = enemyAt(110, 100)
      b.kill()
      const c = enemyAt(300, 100)
      expect(system.findCollisions(playerShotAt(105, 100), [a, b, c])).toEqual([a])
    })
  })
})
