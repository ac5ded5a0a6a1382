/**
 * Environment Resolver
 *
 * Computes the key-relevant environment and the child process environment from
 * an EnvSelector and a snapshot of the current environment.
 *
 * Specs are applied as ordered rules, last write wins within a tier:
 *   1. include rules (patterns expand against the snapshot here, not at parse time)
 *   2. passthru rules (assignments override include, forwards never do)
 *   3. a final exclusion pass over both results
 *
 * The snapshot is never mutated; callers get fresh objects.
 */

import { minimatch } from 'minimatch'
import type { EnvSelector, EnvSnapshot, EnvSpec, ResolvedEnvironment } from './types'

const MATCH_OPTIONS = {
  dot: true,
  nobrace: true,
  noext: true,
  nocomment: true,
  nonegate: true
} as const

interface ResolutionState {
  /** Names selected by include rules, with their include-tier values */
  readonly included: Map<string, string>
  /** Values set by passthru rules */
  readonly passthru: Map<string, string>
}

function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

function toSnapshot(entries: Iterable<[string, string]>): EnvSnapshot {
  return Object.fromEntries([...entries].sort(([a], [b]) => compareNames(a, b)))
}

/**
 * Whether a spec selects the given variable name.
 */
export function specMatches(spec: EnvSpec, name: string): boolean {
  if (spec.kind === 'pattern') {
    return minimatch(name, spec.pattern, MATCH_OPTIONS)
  }
  return spec.name === name
}

/** Own values only: names like `constructor` must not resolve through the prototype */
function lookupEnv(env: EnvSnapshot, name: string): string | undefined {
  return Object.hasOwn(env, name) ? env[name] : undefined
}

function applyIncludeRule(state: ResolutionState, spec: EnvSpec, currentEnv: EnvSnapshot): void {
  switch (spec.kind) {
    case 'assign':
      state.included.set(spec.name, spec.value)
      return
    case 'forward': {
      const value = lookupEnv(currentEnv, spec.name)
      if (value !== undefined) state.included.set(spec.name, value)
      return
    }
    case 'pattern':
      for (const name of Object.keys(currentEnv).sort(compareNames)) {
        const value = lookupEnv(currentEnv, name)
        if (value !== undefined && specMatches(spec, name)) state.included.set(name, value)
      }
      return
  }
}

function applyPassthruRule(state: ResolutionState, spec: EnvSpec, currentEnv: EnvSnapshot): void {
  switch (spec.kind) {
    case 'assign':
      state.passthru.set(spec.name, spec.value)
      return
    case 'forward': {
      const value = lookupEnv(currentEnv, spec.name)
      if (value !== undefined && !state.included.has(spec.name)) {
        state.passthru.set(spec.name, value)
      }
      return
    }
    case 'pattern':
      // Rejected at parse time; a hand-built selector gets the include behaviour
      for (const name of Object.keys(currentEnv).sort(compareNames)) {
        const value = lookupEnv(currentEnv, name)
        if (value !== undefined && !state.included.has(name) && specMatches(spec, name)) {
          state.passthru.set(name, value)
        }
      }
      return
  }
}

/**
 * Resolve the three-tier selection against a snapshot of the current environment.
 *
 * `keyEnv` holds only included names, each with the value the child will
 * actually see. `processEnv` is `keyEnv` plus passthru variables.
 */
export function resolveEnvironment(
  selector: EnvSelector,
  currentEnv: EnvSnapshot
): ResolvedEnvironment {
  const state: ResolutionState = { included: new Map(), passthru: new Map() }

  for (const spec of selector.include) applyIncludeRule(state, spec, currentEnv)
  for (const spec of selector.passthru) applyPassthruRule(state, spec, currentEnv)

  const isExcluded = (name: string): boolean =>
    selector.exclude.some((spec) => specMatches(spec, name))

  const processEnv = new Map([...state.included, ...state.passthru])
  for (const name of processEnv.keys()) {
    if (isExcluded(name)) processEnv.delete(name)
  }

  const keyEnv: [string, string][] = []
  for (const name of state.included.keys()) {
    const value = processEnv.get(name)
    if (value !== undefined) keyEnv.push([name, value])
  }

  return { keyEnv: toSnapshot(keyEnv), processEnv: toSnapshot(processEnv) }
}

/**
 * Copy `process.env` (or any similar mapping) into a snapshot, dropping unset names.
 */
export function snapshotEnv(env: Readonly<Record<string, string | undefined>>): EnvSnapshot {
  const entries: [string, string][] = []
  for (const [name, value] of Object.entries(env)) {
    if (value !== undefined) entries.push([name, value])
  }
  return toSnapshot(entries)
}
