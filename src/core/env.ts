/**
 * Environment Detection Utilities
 *
 * Resolved from process variables at call time, so tests can flip them.
 *
 * Environments are distinct deployment contexts (mutually exclusive):
 * - development: Local development (the default)
 * - test: Automated test runner (Vitest)
 * - staging: Deployed staging host (SIM_ENV=staging)
 * - production: True production (SIM_ENV=production)
 */

export type Environment = 'development' | 'test' | 'staging' | 'production'

export type EnvSource = Readonly<Record<string, string | undefined>>

/**
 * Get the current environment name.
 * Environments are mutually exclusive.
 */
export function getEnvironment(env: EnvSource = process.env): Environment {
  // Test environment (checked first - highest priority)
  if (env.NODE_ENV === 'test' || env.VITEST === 'true') {
    return 'test'
  }

  const simEnv = env.SIM_ENV
  if (simEnv === 'staging') return 'staging'
  if (simEnv === 'production') return 'production'
  if (env.NODE_ENV === 'production') return 'production'

  return 'development'
}

/** Check if running in development environment. */
export function isDevelopment(env?: EnvSource): boolean {
  return getEnvironment(env) === 'development'
}
