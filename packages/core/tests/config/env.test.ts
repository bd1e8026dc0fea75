import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { DEFAULT_CONFLICT_POLICY, WirebindConfig } from "../../src/config/env";

describe("WirebindConfig", () => {
  let previous: string | undefined;

  beforeEach(() => {
    previous = process.env.WIREBIND_ANNOTATION_CONFLICTS;
  });

  afterEach(() => {
    if (previous === undefined) {
      delete process.env.WIREBIND_ANNOTATION_CONFLICTS;
    } else {
      process.env.WIREBIND_ANNOTATION_CONFLICTS = previous;
    }
  });

  describe("getConflictPolicy", () => {
    it("defaults to error when unset", () => {
      // Arrange
      delete process.env.WIREBIND_ANNOTATION_CONFLICTS;

      // Act
      const policy = WirebindConfig.getConflictPolicy();

      // Assert
      expect(policy).toBe("error");
      expect(DEFAULT_CONFLICT_POLICY).toBe("error");
    });

    it.each([
      ["error", "error"],
      ["warn", "warn"],
      ["ignore", "ignore"],
      ["WARN", "warn"],
      [" Ignore ", "ignore"],
    ])("maps %j to %s", (raw, expected) => {
      // Arrange
      process.env.WIREBIND_ANNOTATION_CONFLICTS = raw;

      // Act & Assert
      expect(WirebindConfig.getConflictPolicy()).toBe(expected);
    });

    it.each(["strict", "constructor", "toString", "__proto__"])(
      "falls back to the default for %j",
      (raw) => {
        // Arrange
        process.env.WIREBIND_ANNOTATION_CONFLICTS = raw;

        // Act & Assert
        expect(WirebindConfig.getConflictPolicy()).toBe("error");
      },
    );
  });
});
