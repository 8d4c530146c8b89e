import { describe, it, expect } from "vitest";
import { validatePassword, validateUsername } from "./accounts";

describe("validateUsername", () => {
  it("accepts letters, digits, hyphens and underscores", () => {
    expect(validateUsername("meena_k-01")).toBeNull();
    expect(validateUsername("  abc  ")).toBeNull();
  });

  it("explains what is wrong", () => {
    expect(validateUsername("")).toBe("Username is required.");
    expect(validateUsername("ab")).toBe("Username must be at least 3 characters.");
    expect(validateUsername("a".repeat(31))).toBe("Username must be at most 30 characters.");
    expect(validateUsername("meena k")).toBe(
      "Username can only contain letters, numbers, hyphens, and underscores."
    );
  });
});

describe("validatePassword", () => {
  it("needs six characters", () => {
    expect(validatePassword("")).toBe("Password is required.");
    expect(validatePassword("12345")).toBe("Password must be at least 6 characters.");
    expect(validatePassword("123456")).toBeNull();
  });
});
