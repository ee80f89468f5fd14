import { describe, expect, it } from "vitest";

import { UserFacingError } from "../core/errors.js";

import { detectHostPlatform, resolvePlatform } from "./platform.js";

describe("detectHostPlatform", () => {
  it("maps os.type() names onto table names", () => {
    expect(detectHostPlatform("Windows_NT")).toBe("Windows");
    expect(detectHostPlatform("Darwin")).toBe("Darwin");
    expect(detectHostPlatform("Linux")).toBe("Linux");
  });
});

describe("resolvePlatform", () => {
  it("uses the host platform when none is given", () => {
    expect(resolvePlatform(undefined, { osType: "Linux" })).toEqual({
      platform: "Linux",
      recognized: true,
    });
    expect(resolvePlatform("  ", { osType: "Windows_NT" })).toEqual({
      platform: "Windows",
      recognized: true,
    });
  });

  it("passes unknown platforms through unless strict", () => {
    expect(resolvePlatform("FreeBSD")).toEqual({ platform: "FreeBSD", recognized: false });
    expect(() => resolvePlatform("FreeBSD", { strict: true })).toThrow(UserFacingError);
  });
});
