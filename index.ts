#!/usr/bin/env node
import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";

import { main } from "./src/index.js";

export * from "./src/index.js";

// Allow `node dist/index.js` and the npm bin shim to run the CLI directly.
export function isEntryPoint(argvPath: string | undefined, moduleUrl: string): boolean {
  if (!argvPath) {
    return false;
  }
  try {
    return realpathSync(argvPath) === fileURLToPath(moduleUrl);
  } catch {
    // argv[1] without an extension, or pointing nowhere, is not this module.
    return false;
  }
}

if (isEntryPoint(process.argv[1], import.meta.url)) {
  void main(process.argv);
}
