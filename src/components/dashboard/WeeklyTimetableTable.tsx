import { Card, CardContent, CardHeader, CardTitle } from '@/components/ui/card'
import { Table, TableBody, TableCell, TableHead, TableHeader, TableRow } from '@/components/ui/table'
import { PERIOD_SCHEDULE } from '@/lib/school-calendar'
import { cn } from '@/lib/utils'
import type { TimetableDay } from '@/types/school'

interface WeeklyTimetableTableProps {
  days: TimetableDay[]
  today: string
}

function collectPeriods(days: TimetableDay[]): number[] {
  const periods = new Set<number>(PERIOD_SCHEDULE.map((slot) => slot.period))
  days.forEach((day) => day.rows.forEach((row) => periods.add(row.period)))
  return Array.from(periods).sort((a, b) => a - b)
}

export function WeeklyTimetableTable({ days, today }: WeeklyTimetableTableProps) {
  const periods = collectPeriods(days)

  return (
    <Card>
      <CardHeader>
        <CardTitle className="text-lg text-slate-900">이번 주 시간표</CardTitle>
      </CardHeader>
      <CardContent>
        <Table>
          <TableHeader>
            <TableRow>
              <TableHead className="w-16">교시</TableHead>
              {days.map((day) => (
                <TableHead key={day.date} className={cn(day.date === today && 'text-slate-900')}>
                  {day.weekday} <span className="text-xs text-slate-400">{day.date.slice(5)}</span>
                </TableHead>
              ))}
            </TableRow>
          </TableHeader>
          <TableBody>
            {periods.map((period) => (
              <TableRow key={period}>
                <TableCell className="font-medium text-slate-500">{period}</TableCell>
                {days.map((day) => {
                  const subjects = day.rows.filter((row) => row.period === period).map((row) => row.subject)
                  return (
                    <TableCell key={day.date} className={cn(day.date === today && 'bg-slate-50')}>
                      {subjects.length > 0 ? subjects.join(', ') : <span className="text-slate-300">-</span>}
                    </TableCell>
                  )
                })}
              </TableRow>
            ))}
          </TableBody>
        </Table>
      </CardContent>
    </Card>
  )
}
