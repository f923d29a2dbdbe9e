import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { GET } from "@/app/api/assess/route";
import { getAssessmentStore, toAssessmentPayload } from "@/lib/assessments";

import { createTempDatabase, type TempDatabase } from "./helpers/tempDatabase";

describe("GET /api/assess", () => {
  let db: TempDatabase;

  beforeEach(() => {
    db = createTempDatabase();
    vi.stubEnv("DATABASE_PATH", db.path);
    vi.spyOn(console, "info").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    db.cleanup();
  });

  it("returns an empty array when nothing is stored", async () => {
    const response = await GET();

    expect(response.status).toBe(200);
    await expect(response.json()).resolves.toEqual([]);
  });

  it("returns every record in store order with wire field names", async () => {
    const store = getAssessmentStore();
    store.add({ subject: "국어", title: "감상문", dueDate: "2026-10-30", detail: "3쪽 이내" });
    store.add({ subject: "수학", title: "탐구 보고서", dueDate: "2026-10-27", detail: null });

    const response = await GET();
    const body: unknown = await response.json();

    expect(body).toEqual(store.listAll().map(toAssessmentPayload));
    expect(body).toEqual([
      {
        id: 2,
        subject: "수학",
        title: "탐구 보고서",
        due_date: "2026-10-27",
        detail: null,
        created_at: expect.stringMatching(/\+09:00$/),
      },
      {
        id: 1,
        subject: "국어",
        title: "감상문",
        due_date: "2026-10-30",
        detail: "3쪽 이내",
        created_at: expect.stringMatching(/\+09:00$/),
      },
    ]);
  });

  it("answers 500 when the store cannot be read", async () => {
    vi.stubEnv("DATABASE_PATH", join(db.dir, "missing", "assessments.db"));
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    const response = await GET();

    expect(response.status).toBe(500);
    await expect(response.json()).resolves.toEqual({ error: "수행평가 목록을 불러오지 못했습니다." });
    expect(error).toHaveBeenCalledWith("[assessments] list api unexpected error", expect.any(Error));
  });
});
