import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("next/navigation", () => ({ redirect: vi.fn() }));
vi.mock("next/cache", () => ({ revalidatePath: vi.fn() }));

import { revalidatePath } from "next/cache";
import { redirect } from "next/navigation";

import { createAssessmentAction } from "@/app/assess/actions";
import { getAssessmentStore } from "@/lib/assessments";
import { parseAssessmentForm } from "@/lib/validation/assessment";

import { createTempDatabase, type TempDatabase } from "./helpers/tempDatabase";

function buildForm(fields: Record<string, string>): FormData {
  const formData = new FormData();
  Object.entries(fields).forEach(([key, value]) => formData.append(key, value));
  return formData;
}

describe("parseAssessmentForm", () => {
  it("keeps submitted values as they are", () => {
    expect(
      parseAssessmentForm(buildForm({ subject: "국어", title: " 발표 ", due_date: "2026-11-03", detail: "" }))
    ).toEqual({ subject: "국어", title: " 발표 ", dueDate: "2026-11-03", detail: "" });
  });

  it("fills missing fields instead of rejecting the form", () => {
    expect(parseAssessmentForm(buildForm({ title: "줄넘기" }))).toEqual({
      subject: "",
      title: "줄넘기",
      dueDate: null,
      detail: null,
    });
  });
});

describe("createAssessmentAction", () => {
  let db: TempDatabase;

  beforeEach(() => {
    db = createTempDatabase();
    vi.stubEnv("DATABASE_PATH", db.path);
    vi.spyOn(console, "info").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    vi.mocked(redirect).mockClear();
    vi.mocked(revalidatePath).mockClear();
    db.cleanup();
  });

  it("stores the submitted assessment and redirects to the list", async () => {
    await createAssessmentAction(
      buildForm({ subject: "과학", title: "실험 보고서", due_date: "2026-11-05", detail: "결과 분석 포함" })
    );

    expect(getAssessmentStore().listAll()).toMatchObject([
      { id: 1, subject: "과학", title: "실험 보고서", dueDate: "2026-11-05", detail: "결과 분석 포함" },
    ]);
    expect(revalidatePath).toHaveBeenCalledWith("/assess");
    expect(redirect).toHaveBeenCalledWith("/assess");
  });

  it("stores incomplete submissions without rejecting them", async () => {
    await createAssessmentAction(buildForm({ title: "발표" }));

    expect(getAssessmentStore().listAll()).toMatchObject([
      { subject: "", title: "발표", dueDate: null, detail: null },
    ]);
    expect(redirect).toHaveBeenCalledWith("/assess");
  });

  it("stores blank due date and detail as empty text", async () => {
    await createAssessmentAction(buildForm({ subject: "미술", title: "포트폴리오", due_date: "", detail: "" }));

    expect(getAssessmentStore().listAll()).toMatchObject([
      { subject: "미술", title: "포트폴리오", dueDate: "", detail: "" },
    ]);
  });
});
