import type { Metadata } from "next"

import "./globals.css"

export const metadata: Metadata = {
  title: "학교 대시보드",
  description: "오늘의 급식, 시간표와 수행평가 기록",
}

export default function RootLayout({
  children,
}: Readonly<{
  children: React.ReactNode
}>) {
  return (
    <html lang="ko">
      <body className="bg-slate-50 antialiased">{children}</body>
    </html>
  )
}
