import { z } from 'zod'

export const neisResultSchema = z.object({
  CODE: z.string(),
  MESSAGE: z.string().optional().default(''),
})

/** 조회 결과가 없거나 요청이 거부되면 서비스 이름 대신 RESULT만 내려온다. */
export const neisBareResultSchema = z.object({
  RESULT: neisResultSchema,
})

export const neisHeadSchema = z.object({
  head: z.array(
    z.object({
      list_total_count: z.number().optional(),
      RESULT: neisResultSchema.optional(),
    })
  ),
})

const numericText = z
  .preprocess((value) => (typeof value === 'number' ? String(value) : value), z.string().trim())
  .refine((value) => /^\d+$/.test(value), { message: '교시 값이 숫자가 아닙니다.' })
  .transform((value) => Number.parseInt(value, 10))

export const schoolInfoRowSchema = z.object({
  ATPT_OFCDC_SC_CODE: z.string().trim().min(1),
  SD_SCHUL_CODE: z.string().trim().min(1),
  SCHUL_NM: z.string(),
  SCHUL_KND_SC_NM: z.string().nullish(),
})

export const mealRowSchema = z.object({
  MLSV_YMD: z.string().optional(),
  MMEAL_SC_NM: z.string().nullish(),
  DDISH_NM: z.string(),
})

export const timetableRowSchema = z.object({
  ALL_TI_YMD: z.string().optional(),
  PERIO: numericText,
  ITRT_CNTNT: z
    .string()
    .nullish()
    .transform((value) => value ?? ''),
})
