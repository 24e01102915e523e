import appRootPath from 'app-root-path'
import dotenv from 'dotenv-flow'
import path from 'node:path'
import { z } from 'zod'
import { mergeSimulationConfig, SimulationConfigOverrides } from './causal/config'
import { ConfigError } from './causal/errors'
import { formatIssues } from './causal/schema'
import { SimulationConfig } from './causal/types'
import { createLogger } from './logger'

const log = createLogger('env')

const EnvSchema = z.object({
  SIM_ITERATIONS: z.coerce.number().int().positive().optional(),
  SIM_HOP_LIMIT: z.coerce.number().int().nonnegative().optional(),
  SIM_INSTABILITY_FACTOR: z.coerce.number().positive().optional(),
  SIM_DISCARD_THRESHOLD: z.coerce.number().min(0).max(1).optional(),
  SIM_CONCURRENCY: z.coerce.number().int().positive().optional(),
  BASELINE_MIN_CONFIDENCE: z.coerce.number().min(0).max(1).optional(),
  BASELINE_MAX_AGE_DAYS: z.coerce.number().positive().optional()
})

export function loadEnv() {
  dotenv.config({ path: path.resolve(appRootPath.path), silent: true })
}

// empty strings count as unset
function defined(env: NodeJS.ProcessEnv) {
  return Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ''))
}

export function simulationOverridesFromEnv(env: NodeJS.ProcessEnv = process.env): SimulationConfigOverrides {
  const parsed = EnvSchema.safeParse(defined(env))
  if (!parsed.success) throw new ConfigError(`invalid environment: ${formatIssues(parsed.error)}`)
  const e = parsed.data

  const overrides: SimulationConfigOverrides = {}
  if (e.SIM_ITERATIONS !== undefined) overrides.defaults = { iterationCount: e.SIM_ITERATIONS }
  if (e.SIM_HOP_LIMIT !== undefined) overrides.hopLimit = e.SIM_HOP_LIMIT
  if (e.SIM_INSTABILITY_FACTOR !== undefined) overrides.instabilityFactor = e.SIM_INSTABILITY_FACTOR
  if (e.SIM_DISCARD_THRESHOLD !== undefined) overrides.discardThreshold = e.SIM_DISCARD_THRESHOLD
  if (e.SIM_CONCURRENCY !== undefined) overrides.concurrency = e.SIM_CONCURRENCY
  if (e.BASELINE_MIN_CONFIDENCE !== undefined || e.BASELINE_MAX_AGE_DAYS !== undefined) {
    overrides.baseline = {}
    if (e.BASELINE_MIN_CONFIDENCE !== undefined) overrides.baseline.minConfidence = e.BASELINE_MIN_CONFIDENCE
    if (e.BASELINE_MAX_AGE_DAYS !== undefined) overrides.baseline.maxAgeDays = e.BASELINE_MAX_AGE_DAYS
  }
  return overrides
}

export function loadSimulationConfigFromEnv(env: NodeJS.ProcessEnv = process.env): SimulationConfig {
  const overrides = simulationOverridesFromEnv(env)
  if (Object.keys(overrides).length > 0) log.debug('simulation overrides from env', overrides)
  return mergeSimulationConfig(overrides)
}
