import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

export interface TempDatabase {
  dir: string;
  path: string;
  cleanup: () => void;
}

export function createTempDatabase(): TempDatabase {
  const dir = mkdtempSync(join(tmpdir(), "school-dashboard-"));
  return {
    dir,
    path: join(dir, "assessments.db"),
    cleanup: () => {
      globalThis.__assessmentStores?.clear();
      rmSync(dir, { recursive: true, force: true });
    },
  };
}
