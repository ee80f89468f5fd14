// Platform names.
// Purpose: map host and user-supplied platform names onto the names the exclusion tables use.

import os from "node:os";

import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";

import { isPlatform, PLATFORMS } from "./model/schema.js";

const HOST_PLATFORM_ALIASES: Record<string, string> = {
  Windows_NT: "Windows",
};

export function detectHostPlatform(osType: string = os.type()): string {
  return HOST_PLATFORM_ALIASES[osType] ?? osType;
}

export type PlatformResolution = {
  platform: string;
  recognized: boolean;
};

export function resolvePlatform(
  value: string | undefined,
  opts: { strict?: boolean; osType?: string } = {},
): PlatformResolution {
  const platform = value?.trim() || detectHostPlatform(opts.osType);
  const recognized = isPlatform(platform);

  if (!recognized && opts.strict) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.input,
      title: "Unknown platform.",
      message: `Platform "${platform}" is not one of ${PLATFORMS.join(", ")}.`,
      hint: "Pass one of the listed platforms, or drop --strict-platform to run without exclusions.",
    });
  }

  return { platform, recognized };
}
