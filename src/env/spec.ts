/**
 * Environment Spec Parsing
 *
 * Turns option values like `HOME,LANG=C,"GREETING=hello, world",AWS_*` into
 * EnvSpecs. Entries are separated by commas or whitespace; single quotes,
 * double quotes and backslashes work as they do in a POSIX shell.
 */

import { ConfigError } from '../errors'
import type { EnvSpec, EnvTier } from './types'

const WILDCARD_CHARS = /[*?[]/

/**
 * Split a list of specs on unquoted commas and whitespace, removing quotes.
 */
export function splitSpecList(text: string): string[] {
  const tokens: string[] = []
  let current = ''
  let inToken = false
  let quote: "'" | '"' | null = null

  for (let i = 0; i < text.length; i++) {
    const char = text.charAt(i)

    if (quote === "'") {
      if (char === "'") quote = null
      else current += char
      continue
    }

    if (char === '\\') {
      const next = text.charAt(i + 1)
      if (next === '') {
        throw new ConfigError(`Trailing backslash in environment spec: ${text}`)
      }
      // Inside double quotes a backslash only escapes characters the shell treats specially
      if (quote === '"' && !'"\\$`'.includes(next)) {
        current += char
      }
      current += next
      inToken = true
      i++
      continue
    }

    if (quote === '"') {
      if (char === '"') quote = null
      else current += char
      continue
    }

    if (char === "'" || char === '"') {
      quote = char
      inToken = true
      continue
    }

    if (char === ',' || /\s/.test(char)) {
      if (inToken) tokens.push(current)
      current = ''
      inToken = false
      continue
    }

    current += char
    inToken = true
  }

  if (quote) {
    throw new ConfigError(`Unterminated ${quote} quote in environment spec: ${text}`)
  }
  if (inToken) tokens.push(current)

  return tokens
}

/**
 * Parse a single, already unquoted, spec token.
 */
export function parseEnvSpec(token: string, tier: EnvTier): EnvSpec {
  const eq = token.indexOf('=')
  const name = eq === -1 ? token : token.slice(0, eq)

  if (name === '') {
    throw new ConfigError(`Missing variable name in environment spec: "${token}"`)
  }

  const isPattern = WILDCARD_CHARS.test(name)

  if (eq !== -1) {
    if (isPattern) {
      throw new ConfigError(`Cannot assign a value to wildcard pattern "${name}"`)
    }
    if (tier === 'exclude') {
      throw new ConfigError(`Cannot assign a value to excluded variable "${name}"`)
    }
    return { kind: 'assign', name, value: token.slice(eq + 1) }
  }

  if (isPattern) {
    if (tier === 'passthru') {
      throw new ConfigError(
        `Wildcard pattern "${name}" is not allowed in passthru variables; name them explicitly`
      )
    }
    return { kind: 'pattern', pattern: name }
  }

  return { kind: 'forward', name }
}

/**
 * Parse every option value given for one tier, in order.
 */
export function parseEnvSpecs(values: readonly string[], tier: EnvTier): EnvSpec[] {
  return values.flatMap((value) => splitSpecList(value).map((token) => parseEnvSpec(token, tier)))
}
