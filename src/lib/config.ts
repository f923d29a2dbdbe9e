import { z } from 'zod'

export const DEFAULT_NEIS_API_BASE_URL = 'https://open.neis.go.kr/hub'
export const DEFAULT_DATABASE_PATH = 'data.db'

const requiredText = (name: string) =>
  z
    .string({ required_error: `${name} 환경 변수가 필요합니다.` })
    .trim()
    .min(1, `${name} 환경 변수가 비어 있습니다.`)

const schoolEnvSchema = z.object({
  NEIS_API_KEY: z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? value : null)),
  SCHOOL_NAME: requiredText('SCHOOL_NAME'),
  GRADE: requiredText('GRADE'),
  CLASS: requiredText('CLASS'),
  SEMESTER: z.coerce
    .number({ invalid_type_error: 'SEMESTER는 숫자여야 합니다.' })
    .int('SEMESTER는 정수여야 합니다.')
    .min(1, 'SEMESTER는 1 또는 2여야 합니다.')
    .max(2, 'SEMESTER는 1 또는 2여야 합니다.')
    .default(1),
  NEIS_API_BASE_URL: z.string().trim().url('NEIS_API_BASE_URL 형식이 올바르지 않습니다.').default(DEFAULT_NEIS_API_BASE_URL),
})

const storeEnvSchema = z.object({
  DATABASE_PATH: z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? value : DEFAULT_DATABASE_PATH)),
})

export interface SchoolConfig {
  neisApiKey: string | null
  neisApiBaseUrl: string
  schoolName: string
  grade: string
  classLabel: string
  semester: number
}

export interface StoreConfig {
  databasePath: string
}

type Env = Record<string, string | undefined>

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`설정 값이 올바르지 않습니다: ${issues.join(' ')}`)
    this.name = 'ConfigError'
  }
}

function emptyToUndefined(value: string | undefined): string | undefined {
  return value && value.trim().length > 0 ? value : undefined
}

export function loadSchoolConfig(env: Env = process.env): SchoolConfig {
  const parsed = schoolEnvSchema.safeParse({
    NEIS_API_KEY: env.NEIS_API_KEY,
    SCHOOL_NAME: env.SCHOOL_NAME,
    GRADE: env.GRADE,
    CLASS: env.CLASS,
    SEMESTER: emptyToUndefined(env.SEMESTER),
    NEIS_API_BASE_URL: emptyToUndefined(env.NEIS_API_BASE_URL),
  })

  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => issue.message))
  }

  const data = parsed.data

  if (!data.NEIS_API_KEY) {
    console.warn('[config] NEIS_API_KEY가 설정되지 않았습니다. NEIS 샘플 데이터 한도로만 조회됩니다.')
  }

  return {
    neisApiKey: data.NEIS_API_KEY,
    neisApiBaseUrl: data.NEIS_API_BASE_URL,
    schoolName: data.SCHOOL_NAME,
    grade: data.GRADE,
    classLabel: data.CLASS,
    semester: data.SEMESTER,
  }
}

export function loadStoreConfig(env: Env = process.env): StoreConfig {
  const { DATABASE_PATH } = storeEnvSchema.parse({ DATABASE_PATH: env.DATABASE_PATH })
  return { databasePath: DATABASE_PATH }
}
