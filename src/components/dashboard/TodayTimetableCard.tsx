import { CalendarClock } from 'lucide-react'

import { Badge } from '@/components/ui/badge'
import { Card, CardContent, CardHeader, CardTitle } from '@/components/ui/card'
import { timetableEntryKey } from '@/lib/school-calendar'
import { cn } from '@/lib/utils'
import type { TimetableEntry } from '@/types/school'

interface TodayTimetableCardProps {
  rows: TimetableEntry[]
  currentPeriod: number | null
  nextPeriod: number | null
}

function describePeriodStatus(currentPeriod: number | null, nextPeriod: number | null): string {
  if (currentPeriod !== null) {
    return nextPeriod !== null ? `지금 ${currentPeriod}교시 · 다음 ${nextPeriod}교시` : `지금 ${currentPeriod}교시 (마지막)`
  }
  if (nextPeriod !== null) {
    return `다음 ${nextPeriod}교시`
  }
  return '오늘 수업 종료'
}

export function TodayTimetableCard({ rows, currentPeriod, nextPeriod }: TodayTimetableCardProps) {
  return (
    <Card className="h-full">
      <CardHeader className="pb-1">
        <div className="flex items-center justify-between">
          <div className="flex items-center gap-2">
            <CalendarClock className="h-5 w-5 text-slate-500" />
            <CardTitle className="text-lg text-slate-900">오늘 시간표</CardTitle>
          </div>
          <span className="rounded-full border border-slate-200 bg-white px-2 py-1 text-xs font-medium text-slate-500">
            {describePeriodStatus(currentPeriod, nextPeriod)}
          </span>
        </div>
      </CardHeader>
      <CardContent>
        {rows.length > 0 ? (
          <div className="space-y-2">
            {rows.map((row, index) => {
              const isCurrent = row.period === currentPeriod
              const isNext = row.period === nextPeriod
              return (
                <div
                  key={timetableEntryKey(row, index)}
                  className={cn(
                    'flex items-center justify-between gap-2 rounded-md px-2 py-1 text-sm',
                    isCurrent && 'bg-slate-900 text-white'
                  )}
                >
                  <span className={cn('font-medium', isCurrent ? 'text-white' : 'text-slate-500')}>{row.period}교시</span>
                  <div className="flex items-center gap-2">
                    <span className={cn('truncate', isCurrent ? 'text-white' : 'text-slate-800')}>{row.subject}</span>
                    {isNext ? (
                      <Badge variant="secondary" className="h-5 px-1.5 text-[10px]">
                        다음
                      </Badge>
                    ) : null}
                  </div>
                </div>
              )
            })}
          </div>
        ) : (
          <p className="text-sm text-slate-400">오늘은 시간표 정보가 없습니다.</p>
        )}
      </CardContent>
    </Card>
  )
}
