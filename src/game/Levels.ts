import type { LevelSettings } from '../config/GameConfig.ts'

/**
 * Waves a level runs before it counts as complete
 */
export function wavesForLevel(level: number, settings: LevelSettings): number {
  return settings.baseWaves + (level - 1) * settings.wavesPerLevel
}

/**
 * True once the wave counter has passed the level's last wave
 */
export function isLevelComplete(level: number, wave: number, settings: LevelSettings): boolean {
  return wave > wavesForLevel(level, settings)
}

/**
 * Levels a score unlocks, in ascending order. Level 1 is always open.
 */
export function unlockedLevels(score: number, settings: LevelSettings): number[] {
  const levels: number[] = []
  const count = Math.min(settings.maxLevels, settings.unlockScores.length)
  for (let i = 0; i < count; i++) {
    const threshold = settings.unlockScores[i] ?? Infinity
    if (i === 0 || score >= threshold) levels.push(i + 1)
  }
  return levels
}

export function clampLevel(level: number, settings: LevelSettings): number {
  if (!Number.isFinite(level)) return 1
  return Math.min(settings.maxLevels, Math.max(1, Math.floor(level)))
}
