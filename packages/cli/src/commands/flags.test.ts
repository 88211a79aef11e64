// pattern: Functional Core

import { describe, expect, it } from "vitest";

import { type FlagSpec, parseArgs } from "./flags.js";

const RM_FLAGS: FlagSpec<"recursive" | "force">[] = [
  { name: "recursive", short: ["r", "R"], long: "recursive" },
  { name: "force", short: ["f"], long: "force" },
];

describe("parseArgs", () => {
  it("should separate flags from operands", () => {
    const result = parseArgs("rm", ["-r", "a", "--force", "b"], RM_FLAGS);

    expect(result.success).toBe(true);
    if (result.success) {
      expect([...result.value.flags].sort()).toEqual(["force", "recursive"]);
      expect(result.value.operands).toEqual(["a", "b"]);
    }
  });

  it("should combine short flags in either order", () => {
    for (const combined of ["-rf", "-fr", "-Rf"]) {
      const result = parseArgs("rm", [combined, "x"], RM_FLAGS);
      expect(result.success && [...result.value.flags].sort()).toEqual([
        "force",
        "recursive",
      ]);
    }
  });

  it("should treat everything after -- as operands", () => {
    const result = parseArgs("rm", ["--", "-r", "--force"], RM_FLAGS);

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.value.flags.size).toBe(0);
      expect(result.value.operands).toEqual(["-r", "--force"]);
    }
  });

  it("should treat a lone dash as an operand", () => {
    const result = parseArgs("rm", ["-"], RM_FLAGS);
    expect(result.success && result.value.operands).toEqual(["-"]);
  });

  it("should reject unknown short flags", () => {
    const result = parseArgs("rm", ["-rx"], RM_FLAGS);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe("rm: unknown option -x");
      expect(result.error.commandName).toBe("rm");
    }
  });

  it("should reject unknown long flags", () => {
    const result = parseArgs("rm", ["--interactive"], RM_FLAGS);
    expect(!result.success && result.error.message).toBe(
      "rm: unknown option --interactive"
    );
  });
});
