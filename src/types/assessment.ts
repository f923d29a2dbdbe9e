export interface AssessmentRecord {
  id: number
  subject: string
  title: string
  dueDate: string | null
  detail: string | null
  createdAt: string
}

export interface NewAssessmentInput {
  subject: string
  title: string
  dueDate: string | null
  detail: string | null
}

/** /api/assess 응답 형식 */
export interface AssessmentPayload {
  id: number
  subject: string
  title: string
  due_date: string | null
  detail: string | null
  created_at: string
}
