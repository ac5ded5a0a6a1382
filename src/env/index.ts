/**
 * Environment Module
 *
 * Three-tier (include / passthru / exclude) environment variable selection.
 */

export { resolveEnvironment, snapshotEnv, specMatches } from './resolver'
export { parseEnvSpec, parseEnvSpecs, splitSpecList } from './spec'
export type {
  EnvSelector,
  EnvSnapshot,
  EnvSpec,
  EnvTier,
  ResolvedEnvironment
} from './types'
