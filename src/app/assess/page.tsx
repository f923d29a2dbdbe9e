import Link from 'next/link'
import { ArrowLeft, ClipboardList } from 'lucide-react'

import { AssessmentForm } from '@/components/assessments/AssessmentForm'
import { AssessmentTable } from '@/components/assessments/AssessmentTable'
import { Card, CardContent, CardHeader, CardTitle } from '@/components/ui/card'
import { getAssessmentStore } from '@/lib/assessments'

import { createAssessmentAction } from './actions'

export const dynamic = 'force-dynamic'

export default function AssessPage() {
  const assessments = getAssessmentStore().listAll()

  return (
    <main className="mx-auto flex w-full max-w-5xl flex-col gap-6 px-4 py-8">
      <Link
        href="/"
        className="group inline-flex w-fit items-center gap-2 text-sm font-medium text-slate-600 hover:text-slate-900"
      >
        <ArrowLeft className="size-4 transition group-hover:-translate-x-0.5" aria-hidden="true" />
        <span>대시보드로 돌아가기</span>
      </Link>

      <div className="flex items-center gap-2">
        <ClipboardList className="h-6 w-6 text-slate-500" />
        <h1 className="text-2xl font-semibold text-slate-900">수행평가</h1>
      </div>

      <Card>
        <CardHeader>
          <CardTitle className="text-lg text-slate-900">새 수행평가</CardTitle>
        </CardHeader>
        <CardContent>
          <AssessmentForm action={createAssessmentAction} />
        </CardContent>
      </Card>

      <Card>
        <CardHeader>
          <CardTitle className="text-lg text-slate-900">전체 목록 ({assessments.length})</CardTitle>
        </CardHeader>
        <CardContent>
          <AssessmentTable assessments={assessments} />
        </CardContent>
      </Card>
    </main>
  )
}
