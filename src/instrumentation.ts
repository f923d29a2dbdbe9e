import { PHASE_PRODUCTION_BUILD } from 'next/constants'

export async function register() {
  if (process.env.NEXT_RUNTIME !== 'nodejs' || process.env.NEXT_PHASE === PHASE_PRODUCTION_BUILD) {
    return
  }

  const { bootstrapServer } = await import('@/lib/bootstrap')

  try {
    await bootstrapServer()
  } catch (error) {
    console.error('[bootstrap] 서버를 시작할 수 없습니다.', error)
    process.exit(1)
  }
}
