import { Table, TableBody, TableCell, TableHead, TableHeader, TableRow } from '@/components/ui/table'
import type { AssessmentRecord } from '@/types/assessment'

interface AssessmentTableProps {
  assessments: AssessmentRecord[]
}

export function AssessmentTable({ assessments }: AssessmentTableProps) {
  if (assessments.length === 0) {
    return <p className="text-sm text-slate-400">등록된 수행평가가 없습니다.</p>
  }

  return (
    <Table>
      <TableHeader>
        <TableRow>
          <TableHead>마감일</TableHead>
          <TableHead>과목</TableHead>
          <TableHead>제목</TableHead>
          <TableHead>내용</TableHead>
        </TableRow>
      </TableHeader>
      <TableBody>
        {assessments.map((assessment) => (
          <TableRow key={assessment.id}>
            <TableCell className="whitespace-nowrap text-slate-600">{assessment.dueDate || '-'}</TableCell>
            <TableCell className="font-medium text-slate-900">{assessment.subject}</TableCell>
            <TableCell>{assessment.title}</TableCell>
            <TableCell className="whitespace-pre-wrap text-slate-600">{assessment.detail}</TableCell>
          </TableRow>
        ))}
      </TableBody>
    </Table>
  )
}
