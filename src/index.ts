export { Simulation } from './game/Simulation.ts'
export type { SessionStatus, SimulationOptions, SimulationState } from './game/Simulation.ts'
export { FixedTimestep } from './core/FixedTimestep.ts'
export type { FixedTimestepOptions, Steppable } from './core/FixedTimestep.ts'
export { SafeConsole } from './core/SafeConsole.ts'
export { getEnvironment } from './core/env.ts'
export type { Environment } from './core/env.ts'

export {
  DEFAULT_CONFIG,
  createGameConfig,
  getDifficulty,
  loadConfigOverridesFromEnv,
} from './config/GameConfig.ts'
export type {
  ConfigOverrides,
  DifficultyName,
  EnemyVariant,
  GameConfig,
  PowerUpKind,
  TimedPowerUpKind,
} from './config/GameConfig.ts'

export { emptyInput, parseInputIntent } from './game/input.ts'
export type { InputIntent } from './game/input.ts'
export { eventsOfType } from './game/events.ts'
export type { OutputEvent, OutputEventType } from './game/events.ts'
export { unlockedLevels, wavesForLevel } from './game/Levels.ts'
export { parsePowerUpKind } from './entities/PowerUp.ts'

export { SeededRandom } from './math/SeededRandom.ts'
export type { RandomSource } from './math/SeededRandom.ts'
