import { z } from 'zod'

import { DEFAULT_NEIS_API_BASE_URL } from '@/lib/config'
import DateUtil from '@/lib/date-util'
import {
  mealRowSchema,
  neisBareResultSchema,
  neisHeadSchema,
  schoolInfoRowSchema,
  timetableRowSchema,
} from '@/lib/validation/neis'
import type { SchoolIdentity, TimetableEntry } from '@/types/school'

export const NEIS_SUCCESS_CODE = 'INFO-000'
export const NEIS_NO_DATA_CODE = 'INFO-200'
export const MEAL_DISH_DELIMITER = '<br/>'

const PAGE_SIZE = 100

export type TimetableService = 'elsTimetable' | 'misTimetable' | 'hisTimetable' | 'spsTimetable'

const TIMETABLE_SERVICE_BY_SCHOOL_KIND: Record<string, TimetableService> = {
  초등학교: 'elsTimetable',
  중학교: 'misTimetable',
  고등학교: 'hisTimetable',
  특수학교: 'spsTimetable',
}

type FetchLike = (input: string, init?: RequestInit) => Promise<Response>

export interface NeisClientOptions {
  apiKey?: string | null
  baseUrl?: string
  fetch?: FetchLike
}

export interface TimetableQuery {
  year: number
  semester: number
  date: Date
  grade: string
  classLabel: string
}

export class NeisApiError extends Error {
  constructor(
    message: string,
    readonly code: string | null = null
  ) {
    super(message)
    this.name = 'NeisApiError'
  }
}

/**
 * 급식 DDISH_NM 원문을 메뉴 목록으로 나눈다. 알레르기 표기 "(1.2.)"는 그대로 둔다.
 */
export function splitDishes(raw: string): string[] {
  return raw.split(MEAL_DISH_DELIMITER).map((dish) => dish.trim())
}

export function resolveTimetableService(schoolKind: string | null): TimetableService {
  if (!schoolKind) {
    return 'hisTimetable'
  }
  return TIMETABLE_SERVICE_BY_SCHOOL_KIND[schoolKind] ?? 'hisTimetable'
}

/**
 * NEIS 응답 봉투에서 row 배열을 꺼낸다. INFO-200(데이터 없음)은 빈 배열.
 */
export function parseNeisRows<T extends z.ZodTypeAny>(
  service: string,
  payload: unknown,
  rowSchema: T
): Array<z.output<T>> {
  const envelope = z.record(z.string(), z.unknown()).safeParse(payload)

  if (!envelope.success) {
    throw new NeisApiError(`${service} 응답 형식이 올바르지 않습니다.`)
  }

  const bare = neisBareResultSchema.safeParse(envelope.data)
  if (bare.success && !(service in envelope.data)) {
    const { CODE, MESSAGE } = bare.data.RESULT
    if (CODE === NEIS_NO_DATA_CODE) {
      return []
    }
    throw new NeisApiError(`${service} 요청이 실패했습니다: ${CODE} ${MESSAGE}`.trim(), CODE)
  }

  const section = z
    .tuple([neisHeadSchema, z.object({ row: z.array(z.unknown()) })])
    .safeParse(envelope.data[service])

  if (!section.success) {
    throw new NeisApiError(`${service} 응답 형식이 올바르지 않습니다.`)
  }

  const [head, body] = section.data
  const result = head.head.find((item) => item.RESULT)?.RESULT
  if (result && result.CODE !== NEIS_SUCCESS_CODE) {
    throw new NeisApiError(`${service} 요청이 실패했습니다: ${result.CODE} ${result.MESSAGE}`.trim(), result.CODE)
  }

  const rows = z.array(rowSchema).safeParse(body.row)
  if (!rows.success) {
    throw new NeisApiError(`${service} 응답을 해석하지 못했습니다: ${rows.error.issues[0]?.message ?? ''}`.trim())
  }

  return rows.data
}

export class NeisClient {
  private readonly apiKey: string | null
  private readonly baseUrl: string
  private readonly fetchImpl: FetchLike

  constructor(options: NeisClientOptions = {}) {
    this.apiKey = options.apiKey ?? null
    this.baseUrl = (options.baseUrl ?? DEFAULT_NEIS_API_BASE_URL).replace(/\/+$/, '')
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init))
  }

  buildUrl(service: string, params: Record<string, string>): string {
    const query = new URLSearchParams()
    if (this.apiKey) {
      query.set('KEY', this.apiKey)
    }
    query.set('Type', 'json')
    query.set('pIndex', '1')
    query.set('pSize', String(PAGE_SIZE))
    Object.entries(params).forEach(([key, value]) => {
      query.set(key, value)
    })
    return `${this.baseUrl}/${service}?${query.toString()}`
  }

  // 호출마다 독립된 요청을 보낸다 (세션/커넥션 공유 없음)
  private async request<T extends z.ZodTypeAny>(
    service: string,
    params: Record<string, string>,
    rowSchema: T
  ): Promise<Array<z.output<T>>> {
    const response = await this.fetchImpl(this.buildUrl(service, params), {
      method: 'GET',
      headers: { Accept: 'application/json' },
    })

    if (!response.ok) {
      const errorText = await response.text()
      throw new NeisApiError(`${service} HTTP ${response.status}: ${errorText}`.trim())
    }

    let payload: unknown
    try {
      payload = await response.json()
    } catch (error) {
      throw new NeisApiError(`${service} 응답이 JSON이 아닙니다: ${error instanceof Error ? error.message : String(error)}`)
    }

    return parseNeisRows(service, payload, rowSchema)
  }

  async resolveSchoolIdentity(schoolName: string): Promise<SchoolIdentity> {
    const rows = await this.request('schoolInfo', { SCHUL_NM: schoolName }, schoolInfoRowSchema)
    const row = rows[0]

    if (!row) {
      throw new NeisApiError(`'${schoolName}' 이름의 학교를 찾지 못했습니다.`, NEIS_NO_DATA_CODE)
    }

    return {
      educationOfficeCode: row.ATPT_OFCDC_SC_CODE,
      schoolCode: row.SD_SCHUL_CODE,
      schoolName: row.SCHUL_NM,
      schoolKind: row.SCHUL_KND_SC_NM ?? null,
    }
  }

  async fetchMeal(identity: SchoolIdentity, date: Date): Promise<string[]> {
    const rows = await this.request(
      'mealServiceDietInfo',
      {
        ATPT_OFCDC_SC_CODE: identity.educationOfficeCode,
        SD_SCHUL_CODE: identity.schoolCode,
        MLSV_YMD: DateUtil.formatCompactDate(date),
      },
      mealRowSchema
    )

    const row = rows[0]
    if (!row) {
      return []
    }

    return splitDishes(row.DDISH_NM)
  }

  async fetchTimetable(identity: SchoolIdentity, query: TimetableQuery): Promise<TimetableEntry[]> {
    const rows = await this.request(
      resolveTimetableService(identity.schoolKind),
      {
        ATPT_OFCDC_SC_CODE: identity.educationOfficeCode,
        SD_SCHUL_CODE: identity.schoolCode,
        AY: String(query.year),
        SEM: String(query.semester),
        ALL_TI_YMD: DateUtil.formatCompactDate(query.date),
        GRADE: query.grade,
        CLASS_NM: query.classLabel,
      },
      timetableRowSchema
    )

    return rows
      .map((row) => ({ period: row.PERIO, subject: row.ITRT_CNTNT }))
      .sort((a, b) => a.period - b.period)
  }
}
