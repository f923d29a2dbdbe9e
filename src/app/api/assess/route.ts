import { NextResponse } from 'next/server'

import { getAssessmentStore, toAssessmentPayload } from '@/lib/assessments'

export const dynamic = 'force-dynamic'

export async function GET() {
  try {
    const assessments = getAssessmentStore().listAll()
    return NextResponse.json(assessments.map(toAssessmentPayload))
  } catch (error) {
    console.error('[assessments] list api unexpected error', error)
    return NextResponse.json({ error: '수행평가 목록을 불러오지 못했습니다.' }, { status: 500 })
  }
}
