import { describe, it, expect, beforeEach } from 'vitest'
import { EntityStore } from './EntityStore.ts'
import { Player } from '../entities/Player.ts'
import { Enemy } from '../entities/Enemy.ts'
import { Bullet } from '../entities/Bullet.ts'
import { PowerUp } from '../entities/PowerUp.ts'
import { createGameConfig, type GameConfig } from '../config/GameConfig.ts'

describe('EntityStore', () => {
  let config: GameConfig
  let store: EntityStore

  const shot = (owner: 'player' | 'enemy'): Bullet =>
    owner === 'player'
      ? Bullet.createPlayerShot(store.allocateId(), 100, 100, 0, -8, 1, config.bullets)
      : Bullet.createEnemyShot(store.allocateId(), 100, 100, 0, 8, 1, config.bullets)

  beforeEach(() => {
    config = createGameConfig({ bullets: { maxBullets: 6 } })
    store = new EntityStore(config.bullets.maxBullets)
  })

  describe('allocateId', () => {
    it('should hand out increasing ids', () => {
      expect(store.allocateId()).toBe(1)
      expect(store.allocateId()).toBe(2)
    })
  })

  describe('addBullet', () => {
    it('should split the budget between factions', () => {
      const added = ['player', 'player', 'player', 'enemy', 'enemy', 'enemy'] as const
      expect(added.map((owner) => store.addBullet(shot(owner)))).toEqual([null, null, null, null, null, null])
      expect(store.addBullet(shot('enemy'))).not.toBeNull()
    })

    it('should evict the oldest bullet of the same faction when full', () => {
      const first = shot('player')
      store.addBullet(first)
      store.addBullet(shot('player'))
      store.addBullet(shot('player'))
      store.addBullet(shot('enemy'))

      const newest = shot('player')
      const evicted = store.addBullet(newest)

      expect(evicted).toBe(first)
      expect(first.alive).toBe(false)
      expect(store.getPlayerBullets()).toHaveLength(3)
      expect(store.getPlayerBullets()[2]).toBe(newest)
      expect(store.getEnemyBullets()).toHaveLength(1)
    })

    it('should return null while under capacity', () => {
      expect(store.addBullet(shot('enemy'))).toBeNull()
    })
  })

  describe('prune', () => {
    it('should mark expired entities and count them', () => {
      const gone = Enemy.create(store.allocateId(), 'basic', 100, 900, config)
      const staying = Enemy.create(store.allocateId(), 'basic', 100, -80, config)
      const oldShot = shot('player')
      oldShot.age = 6
      const lost = PowerUp.create(store.allocateId(), 'health', 100, 100, config)
      lost.age = 20
      store.addEnemy(gone)
      store.addEnemy(staying)
      store.addBullet(oldShot)
      store.addPowerUp(lost)

      expect(store.prune(config.screen)).toEqual({ enemies: 1, bullets: 1, powerUps: 1 })
      expect(gone.alive).toBe(false)
      expect(staying.alive).toBe(true)
      expect(store.getLiveEnemyCount()).toBe(1)
    })
  })

  describe('compact', () => {
    it('should drop dead entities and keep order', () => {
      const a = Enemy.create(store.allocateId(), 'basic', 100, 100, config)
      const b = Enemy.create(store.allocateId(), 'fast', 200, 100, config)
      const c = Enemy.create(store.allocateId(), 'heavy', 300, 100, config)
      store.addEnemy(a)
      store.addEnemy(b)
      store.addEnemy(c)
      b.kill()

      store.compact()

      expect(store.getEnemies()).toEqual([a, c])
    })
  })

  describe('clear', () => {
    it('should empty every collection and restart ids', () => {
      store.setPlayer(Player.create(store.allocateId(), config))
      store.addEnemy(Enemy.create(store.allocateId(), 'basic', 100, 100, config))
      store.addBullet(shot('enemy'))
      store.addPowerUp(PowerUp.create(store.allocateId(), 'shield', 0, 0, config))

      store.clear()

      expect(store.getPlayer()).toBeNull()
      expect(store.getEnemies()).toEqual([])
      expect(store.getEnemyBullets()).toEqual([])
      expect(store.getPowerUps()).toEqual([])
      expect(store.allocateId()).toBe(1)
    })
  })
})
