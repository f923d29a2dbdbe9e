import DateUtil, { type DateLike } from '@/lib/date-util'
import type { PeriodSlot, PeriodStatus, TimetableEntry } from '@/types/school'

export const WEEKDAY_LABELS = ['월', '화', '수', '목', '금', '토', '일'] as const

export const SCHOOL_DAYS_PER_WEEK = 5

// 교시별 수업 시간 (학교 종 시간표 기준, API에서 받아오지 않음)
export const PERIOD_SCHEDULE: readonly PeriodSlot[] = [
  { period: 1, start: '08:40', end: '09:30' },
  { period: 2, start: '09:40', end: '10:30' },
  { period: 3, start: '10:40', end: '11:30' },
  { period: 4, start: '11:40', end: '12:30' },
  { period: 5, start: '13:30', end: '14:20' },
  { period: 6, start: '14:30', end: '15:20' },
  { period: 7, start: '15:30', end: '16:20' },
]

function timeToMs(hm: string): number {
  const [hours, minutes] = hm.split(':').map(Number)
  return ((hours ?? 0) * 60 + (minutes ?? 0)) * 60_000
}

function msOfDay(value: DateLike): number {
  const { hour, minute, second, millisecond } = DateUtil.getZonedDateTime(value)
  return ((hour * 60 + minute) * 60 + second) * 1000 + millisecond
}

/**
 * 달력 날짜(UTC 자정 Date)의 요일 라벨. 월요일이 '월'.
 */
export function getWeekdayLabel(civilDate: Date): string {
  const isoWeekday = (civilDate.getUTCDay() + 6) % 7
  return WEEKDAY_LABELS[isoWeekday] ?? ''
}

// NEIS가 같은 교시·과목을 중복으로 돌려줄 수 있어 순번을 함께 쓴다
export function timetableEntryKey(entry: TimetableEntry, index: number): string {
  return `${index}-${entry.period}-${entry.subject}`
}

/**
 * now가 속한 주의 월요일부터 금요일까지 5일.
 */
export function currentWeekWeekdays(now: DateLike = DateUtil.nowUTC()): Date[] {
  const monday = DateUtil.startOfWeek(DateUtil.toCivilDate(now), 1)
  return Array.from({ length: SCHOOL_DAYS_PER_WEEK }, (_, index) => DateUtil.addDays(monday, index))
}

export function resolvePeriodStatus(
  now: DateLike = DateUtil.nowUTC(),
  schedule: readonly PeriodSlot[] = PERIOD_SCHEDULE
): PeriodStatus {
  const current = msOfDay(now)

  for (const [index, slot] of schedule.entries()) {
    const start = timeToMs(slot.start)
    const end = timeToMs(slot.end)

    if (start <= current && current <= end) {
      return { current: slot.period, next: schedule[index + 1]?.period ?? null }
    }

    if (current < start) {
      // 아직 이 교시 시작 전
      return { current: null, next: slot.period }
    }
  }

  return { current: null, next: null }
}
