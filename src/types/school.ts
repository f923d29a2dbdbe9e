export interface SchoolIdentity {
  /** 시도교육청코드 (ATPT_OFCDC_SC_CODE) */
  educationOfficeCode: string
  /** 행정표준코드 (SD_SCHUL_CODE) */
  schoolCode: string
  schoolName: string
  /** 학교종류명 (예: 고등학교) */
  schoolKind: string | null
}

export interface TimetableEntry {
  period: number
  subject: string
}

export interface MealDay {
  date: string
  weekday: string
  dishes: string[]
}

export interface TimetableDay {
  date: string
  weekday: string
  rows: TimetableEntry[]
}

export interface PeriodSlot {
  period: number
  start: string
  end: string
}

export interface PeriodStatus {
  current: number | null
  next: number | null
}
