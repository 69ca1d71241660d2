import { describe, it, expect } from "vitest";
import { detectVerdict } from "../agents/verdict.js";

describe("detectVerdict", () => {
  it("detects a PASS verdict line", () => {
    expect(detectVerdict("All requirements met.\nVERDICT: PASS")).toBe("PASS");
  });

  it("detects a bold FAIL marker", () => {
    expect(detectVerdict("Missing tests. **FAIL**")).toBe("FAIL");
  });

  it("is case-insensitive", () => {
    expect(detectVerdict("verdict: pass")).toBe("PASS");
  });

  it("defaults to FAIL when there is no marker", () => {
    expect(detectVerdict("Looks mostly fine to me.")).toBe("FAIL");
  });

  it("uses the first marker when both appear", () => {
    expect(detectVerdict("VERDICT: PASS\n(an earlier draft said VERDICT: FAIL)")).toBe("PASS");
    expect(detectVerdict("**FAIL** on edge cases, would be **PASS** otherwise")).toBe("FAIL");
  });

  it("ignores the bare words pass and fail in prose", () => {
    expect(detectVerdict("Tests pass locally but the build may fail.")).toBe("FAIL");
  });
});
