import os from "node:os";
import path from "node:path";

import fse from "fs-extra";
import { afterEach, describe, expect, it } from "vitest";

import { JsonlLogger, logScopeEvent } from "./logger.js";

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs) {
    fse.removeSync(dir);
  }
  tempDirs.length = 0;
});

function makeLogPath(): string {
  const dir = fse.mkdtempSync(path.join(os.tmpdir(), "premerge-scope-logger-"));
  tempDirs.push(dir);
  return path.join(dir, "nested", "events.jsonl");
}

describe("JsonlLogger", () => {
  it("appends one JSON object per event with its context", () => {
    const filePath = makeLogPath();
    const logger = new JsonlLogger(
      filePath,
      { command: "compute" },
      () => new Date("2026-01-02T03:04:05.000Z"),
    );

    logger.log({ type: "scope.start", payload: { file_count: 2 } });
    logScopeEvent(logger, "scope.complete");

    expect(fse.readFileSync(filePath, "utf8")).toBe(
      '{"ts":"2026-01-02T03:04:05.000Z","type":"scope.start","command":"compute","payload":{"file_count":2}}\n' +
        '{"ts":"2026-01-02T03:04:05.000Z","type":"scope.complete","command":"compute"}\n',
    );
  });

  it("ignores events when no logger is configured", () => {
    expect(() => logScopeEvent(undefined, "scope.start", { file_count: 0 })).not.toThrow();
  });
});
