/*
  중앙 시간 유틸. 순간(instant)은 UTC Date로 다루고, 달력 날짜는 서울 기준 날짜를 UTC 자정 Date로 표현한다.
*/

export type DateLike = string | number | Date

interface ServerClockState {
  baseTimeMs: number
  capturedAtMs: number
}

export interface ZonedDateTime {
  year: number
  month: number
  day: number
  hour: number
  minute: number
  second: number
  millisecond: number
}

let serverClock: ServerClockState | null = null

export const SCHOOL_TIME_ZONE = 'Asia/Seoul'

const MS_IN_DAY = 86_400_000

const zonedFormatters = new Map<string, Intl.DateTimeFormat>()

function toDate(value?: DateLike | null): Date {
  if (value instanceof Date) {
    return new Date(value.getTime())
  }

  if (typeof value === 'string' || typeof value === 'number') {
    const parsed = new Date(value)
    if (!Number.isNaN(parsed.getTime())) {
      return parsed
    }
  }

  return new Date()
}

function getElapsedMs(fromMs: number): number {
  return Date.now() - fromMs
}

function normalizeUtcDate(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()))
}

function startOfWeekUTC(value: DateLike, weekStartsOn: number): Date {
  const date = normalizeUtcDate(toDate(value))
  const currentDow = date.getUTCDay()
  const diff = (currentDow - weekStartsOn + 7) % 7
  date.setUTCDate(date.getUTCDate() - diff)
  return date
}

function getZonedFormatter(timeZone: string): Intl.DateTimeFormat {
  const cached = zonedFormatters.get(timeZone)
  if (cached) {
    return cached
  }

  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone,
    hourCycle: 'h23',
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
  })
  zonedFormatters.set(timeZone, formatter)
  return formatter
}

function pad(value: number, length = 2): string {
  return `${value}`.padStart(length, '0')
}

export function initServerClock(serverNow?: DateLike) {
  const base = serverNow ? toDate(serverNow) : new Date()
  serverClock = {
    baseTimeMs: base.getTime(),
    capturedAtMs: Date.now(),
  }
}

export function clearServerClock() {
  serverClock = null
}

export function nowUTC(): Date {
  if (serverClock) {
    return new Date(serverClock.baseTimeMs + getElapsedMs(serverClock.capturedAtMs))
  }

  return new Date()
}

/**
 * 주어진 순간을 timeZone 기준의 달력/시각 필드로 분해한다.
 */
export function getZonedDateTime(value: DateLike, timeZone: string = SCHOOL_TIME_ZONE): ZonedDateTime {
  const date = toDate(value)
  const fields: Record<string, string> = {}

  for (const part of getZonedFormatter(timeZone).formatToParts(date)) {
    fields[part.type] = part.value
  }

  return {
    year: Number(fields.year),
    month: Number(fields.month),
    day: Number(fields.day),
    hour: Number(fields.hour),
    minute: Number(fields.minute),
    second: Number(fields.second),
    millisecond: date.getUTCMilliseconds(),
  }
}

/**
 * 서울 기준 달력 날짜를 UTC 자정 Date로 돌려준다. 날짜 연산(addDays, startOfWeek, formatISODate)은 이 값 위에서 한다.
 */
export function toCivilDate(value: DateLike, timeZone: string = SCHOOL_TIME_ZONE): Date {
  const { year, month, day } = getZonedDateTime(value, timeZone)
  return new Date(Date.UTC(year, month - 1, day))
}

export function toZonedISOString(value: DateLike, timeZone: string = SCHOOL_TIME_ZONE): string {
  const date = toDate(value)
  const zoned = getZonedDateTime(date, timeZone)
  const wallClockMs = Date.UTC(
    zoned.year,
    zoned.month - 1,
    zoned.day,
    zoned.hour,
    zoned.minute,
    zoned.second,
    zoned.millisecond
  )
  const offsetMinutes = Math.round((wallClockMs - date.getTime()) / 60_000)
  const sign = offsetMinutes < 0 ? '-' : '+'
  const absOffset = Math.abs(offsetMinutes)

  return (
    `${zoned.year}-${pad(zoned.month)}-${pad(zoned.day)}` +
    `T${pad(zoned.hour)}:${pad(zoned.minute)}:${pad(zoned.second)}.${pad(zoned.millisecond, 3)}` +
    `${sign}${pad(Math.floor(absOffset / 60))}:${pad(absOffset % 60)}`
  )
}

export interface FormatOptions extends Intl.DateTimeFormatOptions {
  locale?: string
}

export function formatForDisplay(value: DateLike, options?: FormatOptions): string {
  const { locale = 'ko-KR', timeZone = SCHOOL_TIME_ZONE, ...rest } = options ?? {}

  // 서버 렌더 결과를 고정하기 위해 24시간 형식 사용
  const hasHour = rest.hour !== undefined || rest.timeStyle !== undefined
  const normalizedOptions: Intl.DateTimeFormatOptions = {
    timeZone,
    ...rest,
    ...(hasHour && !rest.hourCycle && rest.hour12 === undefined ? { hourCycle: 'h23' } : {}),
  }

  return new Intl.DateTimeFormat(locale, normalizedOptions).format(toDate(value))
}

export function addDays(value: DateLike, days: number): Date {
  return new Date(toDate(value).getTime() + days * MS_IN_DAY)
}

export function startOfWeek(value: DateLike, weekStartsOn = 1): Date {
  return startOfWeekUTC(value, weekStartsOn)
}

export function formatISODate(value: DateLike): string {
  const date = normalizeUtcDate(toDate(value))
  const month = pad(date.getUTCMonth() + 1)
  const day = pad(date.getUTCDate())
  return `${date.getUTCFullYear()}-${month}-${day}`
}

/** NEIS 요청 파라미터 형식 (YYYYMMDD) */
export function formatCompactDate(value: DateLike): string {
  return formatISODate(value).replaceAll('-', '')
}

export const DateUtil = {
  SCHOOL_TIME_ZONE,
  initServerClock,
  clearServerClock,
  nowUTC,
  getZonedDateTime,
  toCivilDate,
  toZonedISOString,
  formatForDisplay,
  addDays,
  startOfWeek,
  formatISODate,
  formatCompactDate,
}

export default DateUtil
