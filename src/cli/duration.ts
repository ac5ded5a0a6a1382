/**
 * Duration Parsing
 *
 * Accepts a bare number of seconds ("90"), unit groups ("1h30m", "2 days",
 * "500ms") or a clock form ("1:30", "1:00:00").
 */

import { ConfigError } from '../errors'

const SECOND = 1000
const MINUTE = 60 * SECOND
const HOUR = 60 * MINUTE
const DAY = 24 * HOUR
const WEEK = 7 * DAY

const UNITS: Readonly<Record<string, number>> = {
  ms: 1,
  s: SECOND,
  sec: SECOND,
  secs: SECOND,
  second: SECOND,
  seconds: SECOND,
  m: MINUTE,
  min: MINUTE,
  mins: MINUTE,
  minute: MINUTE,
  minutes: MINUTE,
  h: HOUR,
  hr: HOUR,
  hrs: HOUR,
  hour: HOUR,
  hours: HOUR,
  d: DAY,
  day: DAY,
  days: DAY,
  w: WEEK,
  week: WEEK,
  weeks: WEEK
}

const NUMBER = /^\d+(?:\.\d+)?$/
const UNIT_GROUP = /(\d+(?:\.\d+)?)([a-z]+)/y

function parseClock(text: string): number | undefined {
  const parts = text.split(':')
  if (parts.length > 3 || !parts.every((part) => NUMBER.test(part))) return undefined

  const [seconds = 0, minutes = 0, hours = 0] = parts.map(Number).reverse()
  return hours * HOUR + minutes * MINUTE + seconds * SECOND
}

function parseUnitGroups(text: string): number | undefined {
  let total = 0
  let index = 0
  while (index < text.length) {
    UNIT_GROUP.lastIndex = index
    const match = UNIT_GROUP.exec(text)
    if (!match) return undefined
    const [, amount = '', unit = ''] = match
    const factor = Object.hasOwn(UNITS, unit) ? UNITS[unit] : undefined
    if (factor === undefined) return undefined
    total += Number(amount) * factor
    index = UNIT_GROUP.lastIndex
  }
  return total
}

/**
 * Parse a duration into milliseconds.
 *
 * @throws ConfigError on anything unrecognized
 */
export function parseDuration(value: string | number): number {
  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value < 0) {
      throw new ConfigError(`Invalid duration: ${value}`)
    }
    return Math.round(value * SECOND)
  }

  const text = value.trim().toLowerCase()
  let ms: number | undefined
  if (NUMBER.test(text)) {
    ms = Number(text) * SECOND
  } else if (text.includes(':')) {
    ms = parseClock(text)
  } else if (text !== '') {
    ms = parseUnitGroups(text.replace(/\s+/g, ''))
  }

  if (ms === undefined) {
    throw new ConfigError(`Invalid duration: "${value}"`)
  }
  return Math.round(ms)
}
