// JSONL event logger.
// Purpose: append structured resolver events to a log file, one JSON object per line.
// Assumes callers pass JSON-serializable payloads.

import path from "node:path";

import fse from "fs-extra";

export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;

export type JsonObject = { [key: string]: JsonValue };

export type LogEvent = {
  type: string;
  payload?: JsonObject;
};

export class JsonlLogger {
  constructor(
    public readonly filePath: string,
    private readonly context: JsonObject = {},
    private readonly now: () => Date = () => new Date(),
  ) {
    fse.ensureDirSync(path.dirname(filePath));
  }

  log(event: LogEvent): void {
    const record: JsonObject = {
      ts: this.now().toISOString(),
      type: event.type,
      ...this.context,
    };
    if (event.payload) {
      record.payload = event.payload;
    }

    fse.appendFileSync(this.filePath, JSON.stringify(record) + "\n", "utf8");
  }
}

export function logScopeEvent(
  logger: JsonlLogger | undefined,
  type: string,
  payload?: JsonObject,
): void {
  logger?.log({ type, payload });
}
