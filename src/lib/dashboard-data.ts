/**
 * 대시보드 화면용 데이터 조립
 * 요청마다 외부 API를 새로 조회한다 (캐시 없음)
 */

import DateUtil, { type DateLike } from '@/lib/date-util'
import { currentWeekWeekdays, getWeekdayLabel, resolvePeriodStatus } from '@/lib/school-calendar'
import type { SchoolDataSource } from '@/lib/school-data'
import type { MealDay, TimetableDay, TimetableEntry } from '@/types/school'

// ============================================
// Types
// ============================================

export interface TodayView {
  date: string
  weekday: string
  meal: string[]
  timetable: TimetableEntry[]
  currentPeriod: number | null
  nextPeriod: number | null
}

export interface WeekView {
  meals: MealDay[]
  timetable: TimetableDay[]
}

export interface DashboardView {
  today: TodayView
  week: WeekView
}

// ============================================
// Fetch Functions
// ============================================

export async function fetchTodayView(source: SchoolDataSource, now: DateLike = DateUtil.nowUTC()): Promise<TodayView> {
  const today = DateUtil.toCivilDate(now)

  const [meal, timetable] = await Promise.all([source.getMeal(today), source.getTimetable(today)])
  const { current, next } = resolvePeriodStatus(now)

  return {
    date: DateUtil.formatISODate(today),
    weekday: getWeekdayLabel(today),
    meal,
    timetable,
    currentPeriod: current,
    nextPeriod: next,
  }
}

/**
 * 이번 주 월~금. 날짜별 조회는 서로 독립적이라 한 날짜의 실패가 다른 날짜에 영향을 주지 않는다.
 */
export async function fetchWeekView(source: SchoolDataSource, now: DateLike = DateUtil.nowUTC()): Promise<WeekView> {
  const days = await Promise.all(
    currentWeekWeekdays(now).map(async (date) => {
      const [dishes, rows] = await Promise.all([source.getMeal(date), source.getTimetable(date)])
      return {
        date: DateUtil.formatISODate(date),
        weekday: getWeekdayLabel(date),
        dishes,
        rows,
      }
    })
  )

  return {
    meals: days.map(({ date, weekday, dishes }) => ({ date, weekday, dishes })),
    timetable: days.map(({ date, weekday, rows }) => ({ date, weekday, rows })),
  }
}

export async function fetchDashboardView(
  source: SchoolDataSource,
  now: DateLike = DateUtil.nowUTC()
): Promise<DashboardView> {
  const [today, week] = await Promise.all([fetchTodayView(source, now), fetchWeekView(source, now)])
  return { today, week }
}
