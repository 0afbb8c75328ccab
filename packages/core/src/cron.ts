import {ParseError} from './errors.js'

/**
 * A parsed five-field cron expression.
 *
 * Fields: minute, hour, day of month, month, day of week. Matching is done
 * against UTC wall-clock time at minute granularity.
 */
export type CronSchedule = {
  expression: string;
  minutes: ReadonlySet<number>;
  hours: ReadonlySet<number>;
  daysOfMonth: ReadonlySet<number>;
  months: ReadonlySet<number>;
  daysOfWeek: ReadonlySet<number>;
  /** False when the field starts with `*`; see {@link matchesCron}. */
  restrictedDayOfMonth: boolean;
  restrictedDayOfWeek: boolean;
}

type FieldSpec = {
  name: string;
  min: number;
  max: number;
  names?: string[];
}

const fieldSpecs: FieldSpec[] = [
  {name: 'minute', min: 0, max: 59},
  {name: 'hour', min: 0, max: 23},
  {name: 'day of month', min: 1, max: 31},
  {name: 'month', min: 1, max: 12, names: ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec']},
  {name: 'day of week', min: 0, max: 7, names: ['sun', 'mon', 'tue', 'wed', 'thu', 'fri', 'sat']}
]

const minuteMs = 60_000

export function parseCron(expression: string): CronSchedule {
  const fields = expression.trim().split(/\s+/)
  if (fields.length !== 5) {
    throw new ParseError(`Invalid cron expression "${expression}": expected 5 fields, got ${fields.length}`)
  }

  const [minutes, hours, daysOfMonth, months, rawDaysOfWeek] = fields.map((field, i) => parseField(expression, field, fieldSpecs[i]))

  // 7 is an alias for Sunday
  const daysOfWeek = new Set([...rawDaysOfWeek].map(day => day % 7))

  return {
    expression,
    minutes,
    hours,
    daysOfMonth,
    months,
    daysOfWeek,
    restrictedDayOfMonth: !fields[2].startsWith('*'),
    restrictedDayOfWeek: !fields[4].startsWith('*')
  }
}

/**
 * Whether `date` (UTC, truncated to the minute) matches the schedule.
 * When both day fields are restricted, matching either one is enough.
 */
export function matchesCron(schedule: CronSchedule, date: Date): boolean {
  return schedule.minutes.has(date.getUTCMinutes())
    && schedule.hours.has(date.getUTCHours())
    && schedule.months.has(date.getUTCMonth() + 1)
    && matchesDay(schedule, date)
}

/** First matching minute strictly after `after`, searching up to five years ahead. */
export function nextMatch(schedule: CronSchedule, after: Date): Date | undefined {
  const limit = after.getTime() + (5 * 366 * 24 * 60 * minuteMs)
  let time = (Math.floor(after.getTime() / minuteMs) + 1) * minuteMs

  while (time <= limit) {
    const date = new Date(time)
    if (!schedule.months.has(date.getUTCMonth() + 1) || !matchesDay(schedule, date)) {
      time = Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate() + 1)
      continue
    }

    if (!schedule.hours.has(date.getUTCHours())) {
      time = Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate(), date.getUTCHours() + 1)
      continue
    }

    if (schedule.minutes.has(date.getUTCMinutes())) {
      return date
    }

    time += minuteMs
  }

  return undefined
}

function matchesDay(schedule: CronSchedule, date: Date): boolean {
  const dayOfMonth = schedule.daysOfMonth.has(date.getUTCDate())
  const dayOfWeek = schedule.daysOfWeek.has(date.getUTCDay())

  if (schedule.restrictedDayOfMonth && schedule.restrictedDayOfWeek) {
    return dayOfMonth || dayOfWeek
  }

  return dayOfMonth && dayOfWeek
}

function parseField(expression: string, field: string, spec: FieldSpec): Set<number> {
  const values = new Set<number>()

  for (const part of field.split(',')) {
    const [range, stepText, ...rest] = part.split('/')
    if (rest.length > 0 || range === '') {
      throw invalid(expression, spec, part)
    }

    const step = stepText === undefined ? 1 : parseNumber(expression, spec, stepText)
    if (step < 1) {
      throw invalid(expression, spec, part)
    }

    let start: number
    let end: number
    if (range === '*') {
      start = spec.min
      end = spec.max
    } else if (range.includes('-')) {
      const [from, to, ...extra] = range.split('-')
      if (extra.length > 0) {
        throw invalid(expression, spec, part)
      }

      start = parseValue(expression, spec, from)
      end = parseValue(expression, spec, to)
      if (start > end) {
        throw invalid(expression, spec, part)
      }
    } else {
      start = parseValue(expression, spec, range)
      // `5/15` means "from 5, every 15"
      end = stepText === undefined ? start : spec.max
    }

    for (let value = start; value <= end; value += step) {
      values.add(value)
    }
  }

  return values
}

function parseValue(expression: string, spec: FieldSpec, token: string): number {
  const index = spec.names?.indexOf(token.toLowerCase()) ?? -1
  if (index !== -1) {
    return index + (spec.name === 'month' ? 1 : 0)
  }

  const value = parseNumber(expression, spec, token)
  if (value < spec.min || value > spec.max) {
    throw new ParseError(`Invalid cron expression "${expression}": ${spec.name} value ${value} is out of range ${spec.min}-${spec.max}`)
  }

  return value
}

function parseNumber(expression: string, spec: FieldSpec, token: string): number {
  if (!/^\d+$/.test(token)) {
    throw invalid(expression, spec, token)
  }

  return Number(token)
}

function invalid(expression: string, spec: FieldSpec, token: string): ParseError {
  return new ParseError(`Invalid cron expression "${expression}": cannot parse ${spec.name} "${token}"`)
}
