import { getAssessmentStore } from '@/lib/assessments'
import { getSchoolContext, type SchoolContext } from '@/lib/school-data'

/**
 * 서버 시작 시 한 번 실행. 저장소 테이블을 만들고 학교 코드를 확정한다.
 * 학교 코드를 얻지 못하면 예외를 그대로 던진다.
 */
export async function bootstrapServer(): Promise<SchoolContext> {
  getAssessmentStore()

  const context = await getSchoolContext()
  const { identity, config } = context
  console.info(
    '[bootstrap] 학교 정보를 확인했습니다.',
    `${identity.schoolName} (${identity.educationOfficeCode}/${identity.schoolCode})`,
    `${config.grade}학년 ${config.classLabel}반 ${config.semester}학기`
  )
  return context
}
