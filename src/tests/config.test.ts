import { describe, expect, it } from "vitest";
import { DEFAULT_DECODE_POLICIES, resolveDecodePolicies } from "../config.js";

describe("resolveDecodePolicies", () => {
  it("makes only lenient numbers recoverable by default", () => {
    const policies = resolveDecodePolicies(undefined, {});
    expect(policies).toEqual(DEFAULT_DECODE_POLICIES);
    expect(policies.number).toBe("lenient");
    expect(policies.integer).toBe("strict");
    expect(policies.timestamp).toBe("strict");
    expect(policies.choice).toBe("strict");
  });

  it("reads kind lists from the environment", () => {
    const policies = resolveDecodePolicies(undefined, {
      IMPORT_LENIENT_KINDS: "integer; Timestamp, rating",
      IMPORT_STRICT_KINDS: "number",
    });
    expect(policies.integer).toBe("lenient");
    expect(policies.timestamp).toBe("lenient");
    expect(policies.number).toBe("strict");
    expect(policies.choice).toBe("strict");
  });

  it("lets explicit overrides win over the environment", () => {
    const policies = resolveDecodePolicies({ number: "lenient", choice: "lenient" }, { IMPORT_STRICT_KINDS: "number" });
    expect(policies.number).toBe("lenient");
    expect(policies.choice).toBe("lenient");
  });
});
