import { z } from 'zod'

// 입력값 검증은 하지 않는다. 빠진 필드만 기본값으로 채운다.
const requiredColumnText = z
  .string()
  .nullish()
  .transform((value) => value ?? '')

const optionalColumnText = z
  .string()
  .nullish()
  .transform((value) => value ?? null)

export const assessmentFormSchema = z.object({
  subject: requiredColumnText,
  title: requiredColumnText,
  dueDate: optionalColumnText,
  detail: optionalColumnText,
})

export type AssessmentFormInput = z.infer<typeof assessmentFormSchema>

function readText(formData: FormData, key: string): string | null {
  const value = formData.get(key)
  return typeof value === 'string' ? value : null
}

export function parseAssessmentForm(formData: FormData): AssessmentFormInput {
  return assessmentFormSchema.parse({
    subject: readText(formData, 'subject'),
    title: readText(formData, 'title'),
    dueDate: readText(formData, 'due_date'),
    detail: readText(formData, 'detail'),
  })
}
