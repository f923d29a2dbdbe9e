'use server'

import { revalidatePath } from 'next/cache'
import { redirect } from 'next/navigation'

import { getAssessmentStore } from '@/lib/assessments'
import { parseAssessmentForm } from '@/lib/validation/assessment'

const ASSESS_PATH = '/assess'

export async function createAssessmentAction(formData: FormData): Promise<void> {
  const input = parseAssessmentForm(formData)

  // 저장 실패는 요청 실패로 그대로 전달한다
  getAssessmentStore().add(input)

  revalidatePath(ASSESS_PATH)
  redirect(ASSESS_PATH)
}
