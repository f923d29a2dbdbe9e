import { UtensilsCrossed } from 'lucide-react'

import { Card, CardContent, CardHeader, CardTitle } from '@/components/ui/card'

interface TodayMealCardProps {
  dishes: string[]
}

export function TodayMealCard({ dishes }: TodayMealCardProps) {
  return (
    <Card className="h-full">
      <CardHeader className="pb-1">
        <div className="flex items-center gap-2">
          <UtensilsCrossed className="h-5 w-5 text-slate-500" />
          <CardTitle className="text-lg text-slate-900">오늘 급식</CardTitle>
        </div>
      </CardHeader>
      <CardContent>
        {dishes.length > 0 ? (
          <ul className="space-y-1.5 text-sm text-slate-700">
            {dishes.map((dish, index) => (
              <li key={`${index}-${dish}`}>{dish}</li>
            ))}
          </ul>
        ) : (
          <p className="text-sm text-slate-400">오늘은 급식 정보가 없습니다.</p>
        )}
      </CardContent>
    </Card>
  )
}
