import { Loader2 } from 'lucide-react'

export default function DashboardLoading() {
  return (
    <div className="flex min-h-[200px] flex-col items-center justify-center gap-3 py-20 text-slate-400">
      <Loader2 className="h-6 w-6 animate-spin" />
      <p className="text-sm">급식과 시간표를 불러오는 중입니다...</p>
    </div>
  )
}
