import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { bootstrapServer } from "@/lib/bootstrap";
import { NeisApiError } from "@/lib/neis";

import { NO_DATA_BODY, TEST_IDENTITY, jsonResponse, neisBody, schoolInfoRow } from "./helpers/neisFixtures";
import { createTempDatabase, type TempDatabase } from "./helpers/tempDatabase";

describe("bootstrapServer", () => {
  let db: TempDatabase;

  beforeEach(() => {
    db = createTempDatabase();
    globalThis.__schoolContext = undefined;
    vi.stubEnv("DATABASE_PATH", db.path);
    vi.stubEnv("NEIS_API_KEY", "test-key");
    vi.stubEnv("SCHOOL_NAME", "서울예시고등학교");
    vi.stubEnv("GRADE", "2");
    vi.stubEnv("CLASS", "3");
    vi.stubEnv("SEMESTER", "1");
    vi.spyOn(console, "info").mockImplementation(() => {});
  });

  afterEach(() => {
    globalThis.__schoolContext = undefined;
    vi.unstubAllEnvs();
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
    db.cleanup();
  });

  it("prepares the store and resolves the school", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse(neisBody("schoolInfo", [schoolInfoRow()]))));

    const context = await bootstrapServer();

    expect(context.identity).toEqual(TEST_IDENTITY);
    expect(globalThis.__assessmentStores?.has(db.path)).toBe(true);
    expect(console.info).toHaveBeenCalledWith(
      "[bootstrap] 학교 정보를 확인했습니다.",
      "서울예시고등학교 (B10/7010000)",
      "2학년 3반 1학기"
    );
  });

  it("fails when the school cannot be found", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse(NO_DATA_BODY)));

    await expect(bootstrapServer()).rejects.toBeInstanceOf(NeisApiError);
  });
});
