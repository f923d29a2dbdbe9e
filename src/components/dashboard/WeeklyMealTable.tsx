import { Card, CardContent, CardHeader, CardTitle } from '@/components/ui/card'
import { Table, TableBody, TableCell, TableHead, TableHeader, TableRow } from '@/components/ui/table'
import { cn } from '@/lib/utils'
import type { MealDay } from '@/types/school'

interface WeeklyMealTableProps {
  meals: MealDay[]
  today: string
}

export function WeeklyMealTable({ meals, today }: WeeklyMealTableProps) {
  return (
    <Card>
      <CardHeader>
        <CardTitle className="text-lg text-slate-900">이번 주 급식</CardTitle>
      </CardHeader>
      <CardContent>
        <Table>
          <TableHeader>
            <TableRow>
              {meals.map((meal) => (
                <TableHead key={meal.date} className={cn(meal.date === today && 'text-slate-900')}>
                  {meal.weekday} <span className="text-xs text-slate-400">{meal.date.slice(5)}</span>
                </TableHead>
              ))}
            </TableRow>
          </TableHeader>
          <TableBody>
            <TableRow>
              {meals.map((meal) => (
                <TableCell key={meal.date} className={cn('min-w-32', meal.date === today && 'bg-slate-50')}>
                  {meal.dishes.length > 0 ? (
                    <ul className="space-y-1 text-xs text-slate-700">
                      {meal.dishes.map((dish, index) => (
                        <li key={`${index}-${dish}`}>{dish}</li>
                      ))}
                    </ul>
                  ) : (
                    <span className="text-xs text-slate-400">-</span>
                  )}
                </TableCell>
              ))}
            </TableRow>
          </TableBody>
        </Table>
      </CardContent>
    </Card>
  )
}
