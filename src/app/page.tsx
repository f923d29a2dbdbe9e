import Link from 'next/link'
import { ClipboardList, School } from 'lucide-react'

import { TodayMealCard } from '@/components/dashboard/TodayMealCard'
import { TodayTimetableCard } from '@/components/dashboard/TodayTimetableCard'
import { WeeklyMealTable } from '@/components/dashboard/WeeklyMealTable'
import { WeeklyTimetableTable } from '@/components/dashboard/WeeklyTimetableTable'
import { buttonVariants } from '@/components/ui/button'
import { fetchDashboardView } from '@/lib/dashboard-data'
import DateUtil from '@/lib/date-util'
import { getSchoolContext } from '@/lib/school-data'

export const dynamic = 'force-dynamic'

export default async function DashboardPage() {
  const { config, identity, data } = await getSchoolContext()
  const now = DateUtil.nowUTC()
  const { today, week } = await fetchDashboardView(data, now)

  const todayLabel = DateUtil.formatForDisplay(now, {
    year: 'numeric',
    month: 'long',
    day: 'numeric',
    weekday: 'long',
  })

  return (
    <main className="mx-auto flex w-full max-w-6xl flex-col gap-6 px-4 py-8">
      <header className="flex flex-col gap-3 sm:flex-row sm:items-end sm:justify-between">
        <div className="space-y-1">
          <div className="flex items-center gap-2 text-sm text-slate-500">
            <School className="h-4 w-4" />
            <span>
              {identity.schoolName} · {config.grade}학년 {config.classLabel}반
            </span>
          </div>
          <h1 className="text-2xl font-semibold text-slate-900">{todayLabel}</h1>
        </div>
        <Link href="/assess" className={buttonVariants({ variant: 'outline' })}>
          <ClipboardList className="h-4 w-4" />
          수행평가
        </Link>
      </header>

      <section className="grid gap-4 md:grid-cols-2">
        <TodayMealCard dishes={today.meal} />
        <TodayTimetableCard
          rows={today.timetable}
          currentPeriod={today.currentPeriod}
          nextPeriod={today.nextPeriod}
        />
      </section>

      <WeeklyMealTable meals={week.meals} today={today.date} />
      <WeeklyTimetableTable days={week.timetable} today={today.date} />
    </main>
  )
}
