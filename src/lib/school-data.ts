import { loadSchoolConfig, type SchoolConfig } from '@/lib/config'
import DateUtil from '@/lib/date-util'
import { NeisClient } from '@/lib/neis'
import type { SchoolIdentity, TimetableEntry } from '@/types/school'

export interface SchoolDataSource {
  getMeal(date: Date): Promise<string[]>
  getTimetable(date: Date): Promise<TimetableEntry[]>
}

export interface ClassroomSettings {
  grade: string
  classLabel: string
  semester: number
}

export interface SchoolContext {
  config: SchoolConfig
  identity: SchoolIdentity
  data: SchoolDataClient
}

/**
 * 학교 식별 코드가 확정된 뒤 만들어지는 조회 클라이언트.
 * 외부 API 실패는 여기서 기록하고 빈 목록으로 대신한다. 대시보드는 항상 렌더링되어야 한다.
 */
export class SchoolDataClient implements SchoolDataSource {
  constructor(
    private readonly neis: NeisClient,
    readonly identity: SchoolIdentity,
    private readonly classroom: ClassroomSettings
  ) {}

  async getMeal(date: Date): Promise<string[]> {
    try {
      return await this.neis.fetchMeal(this.identity, date)
    } catch (error) {
      console.error('[school-data] 급식 정보를 불러오지 못했습니다.', DateUtil.formatISODate(date), error)
      return []
    }
  }

  async getTimetable(date: Date): Promise<TimetableEntry[]> {
    try {
      return await this.neis.fetchTimetable(this.identity, {
        year: date.getUTCFullYear(),
        semester: this.classroom.semester,
        date,
        grade: this.classroom.grade,
        classLabel: this.classroom.classLabel,
      })
    } catch (error) {
      console.error('[school-data] 시간표를 불러오지 못했습니다.', DateUtil.formatISODate(date), error)
      return []
    }
  }
}

export async function createSchoolContext(
  config: SchoolConfig,
  neis: NeisClient = new NeisClient({ apiKey: config.neisApiKey, baseUrl: config.neisApiBaseUrl })
): Promise<SchoolContext> {
  const identity = await neis.resolveSchoolIdentity(config.schoolName)

  return {
    config,
    identity,
    data: new SchoolDataClient(neis, identity, {
      grade: config.grade,
      classLabel: config.classLabel,
      semester: config.semester,
    }),
  }
}

// instrumentation 훅과 라우트 번들이 서로 다른 모듈 인스턴스를 가질 수 있어 globalThis에 보관한다
declare global {
  // eslint-disable-next-line no-var
  var __schoolContext: Promise<SchoolContext> | undefined
}

/**
 * 프로세스당 한 번만 학교 코드를 조회한다. 실패한 결과도 그대로 유지한다 (재시도 없음).
 */
export function getSchoolContext(): Promise<SchoolContext> {
  if (!globalThis.__schoolContext) {
    globalThis.__schoolContext = Promise.resolve().then(() => createSchoolContext(loadSchoolConfig()))
  }
  return globalThis.__schoolContext
}
