import { Button } from '@/components/ui/button'
import { Input } from '@/components/ui/input'
import { Label } from '@/components/ui/label'
import { Textarea } from '@/components/ui/textarea'

interface AssessmentFormProps {
  action: (formData: FormData) => Promise<void>
}

export function AssessmentForm({ action }: AssessmentFormProps) {
  return (
    <form action={action} className="grid gap-4 sm:grid-cols-2">
      <div className="space-y-1.5">
        <Label htmlFor="subject">과목</Label>
        <Input id="subject" name="subject" placeholder="예: 국어" required />
      </div>
      <div className="space-y-1.5">
        <Label htmlFor="title">제목</Label>
        <Input id="title" name="title" placeholder="예: 독서 감상문" required />
      </div>
      <div className="space-y-1.5">
        <Label htmlFor="due_date">마감일</Label>
        <Input id="due_date" name="due_date" type="date" />
      </div>
      <div className="space-y-1.5 sm:col-span-2">
        <Label htmlFor="detail">내용</Label>
        <Textarea id="detail" name="detail" placeholder="평가 범위, 준비물 등" />
      </div>
      <div className="sm:col-span-2">
        <Button type="submit">수행평가 추가</Button>
      </div>
    </form>
  )
}
