import { integer, sqliteTable, text } from 'drizzle-orm/sqlite-core'

/**
 * 수행평가 기록 테이블
 * 생성 후 수정/삭제하지 않는다.
 */
export const assessments = sqliteTable('assessments', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  subject: text('subject').notNull(),
  title: text('title').notNull(),
  dueDate: text('due_date'), // 입력값 그대로 저장 (YYYY-MM-DD 권장, 검증 없음)
  detail: text('detail'),
  createdAt: text('created_at').notNull(),
})

export type AssessmentRow = typeof assessments.$inferSelect

export const CREATE_ASSESSMENTS_TABLE_SQL = `
  CREATE TABLE IF NOT EXISTS assessments (
    id         INTEGER PRIMARY KEY AUTOINCREMENT,
    subject    TEXT NOT NULL,
    title      TEXT NOT NULL,
    due_date   TEXT,
    detail     TEXT,
    created_at TEXT NOT NULL
  )
`
