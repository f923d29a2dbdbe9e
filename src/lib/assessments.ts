import Database from 'better-sqlite3'
import { asc } from 'drizzle-orm'
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3'

import { loadStoreConfig } from '@/lib/config'
import DateUtil from '@/lib/date-util'
import { assessments, CREATE_ASSESSMENTS_TABLE_SQL, type AssessmentRow } from '@/lib/db/schema'
import type { AssessmentPayload, AssessmentRecord, NewAssessmentInput } from '@/types/assessment'

function mapAssessmentRow(row: AssessmentRow): AssessmentRecord {
  return {
    id: row.id,
    subject: row.subject,
    title: row.title,
    dueDate: row.dueDate,
    detail: row.detail,
    createdAt: row.createdAt,
  }
}

export function toAssessmentPayload(record: AssessmentRecord): AssessmentPayload {
  return {
    id: record.id,
    subject: record.subject,
    title: record.title,
    due_date: record.dueDate,
    detail: record.detail,
    created_at: record.createdAt,
  }
}

/**
 * 단일 SQLite 파일에 수행평가를 기록한다. 작업마다 파일을 열고 닫는다.
 */
export class AssessmentStore {
  constructor(readonly databasePath: string) {}

  private withDatabase<T>(task: (db: BetterSQLite3Database, sqlite: Database.Database) => T): T {
    const sqlite = new Database(this.databasePath)
    try {
      return task(drizzle({ client: sqlite }), sqlite)
    } finally {
      sqlite.close()
    }
  }

  init(): void {
    this.withDatabase((_db, sqlite) => {
      sqlite.exec(CREATE_ASSESSMENTS_TABLE_SQL)
    })
  }

  add(input: NewAssessmentInput): void {
    this.withDatabase((db) => {
      db.insert(assessments)
        .values({
          subject: input.subject,
          title: input.title,
          dueDate: input.dueDate,
          detail: input.detail,
          createdAt: DateUtil.toZonedISOString(DateUtil.nowUTC()),
        })
        .run()
    })
  }

  // 마감일은 문자열 그대로 정렬한다 (날짜 해석 없음)
  listAll(): AssessmentRecord[] {
    return this.withDatabase((db) =>
      db.select().from(assessments).orderBy(asc(assessments.dueDate), asc(assessments.id)).all().map(mapAssessmentRow)
    )
  }
}

declare global {
  // eslint-disable-next-line no-var
  var __assessmentStores: Map<string, AssessmentStore> | undefined
}

/**
 * DATABASE_PATH 기준의 저장소. 경로별로 처음 사용할 때 테이블을 만든다.
 */
export function getAssessmentStore(): AssessmentStore {
  const { databasePath } = loadStoreConfig()
  const stores = (globalThis.__assessmentStores ??= new Map<string, AssessmentStore>())

  const existing = stores.get(databasePath)
  if (existing) {
    return existing
  }

  const store = new AssessmentStore(databasePath)
  store.init()
  stores.set(databasePath, store)
  console.info('[assessments] 수행평가 저장소를 준비했습니다.', databasePath)
  return store
}
