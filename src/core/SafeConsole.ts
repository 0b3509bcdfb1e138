/**
 * SafeConsole - diagnostics for the simulation core
 *
 * Errors always reach the console. Every other level is written only in the
 * development environment, which is read per call so a host can switch it
 * without reloading the module. Callers tag messages with their subsystem,
 * e.g. `[WaveSpawner]`.
 */

import { isDevelopment } from './env.ts'

export type ConsoleLevel = 'debug' | 'info' | 'warn' | 'error'

type ConsoleWriter = (...args: unknown[]) => void

function writer(level: ConsoleLevel): ConsoleWriter {
  if (level === 'error') {
    return (...args) => console.error(...args)
  }
  return (...args) => {
    if (isDevelopment()) console[level](...args)
  }
}

export const SafeConsole: Record<ConsoleLevel, ConsoleWriter> = {
  debug: writer('debug'),
  info: writer('info'),
  warn: writer('warn'),
  error: writer('error'),
}
