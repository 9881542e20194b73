import { describe, expect, test } from "vitest";
import { parseTier, policyDrift, selectPolicy } from "../../services/policy.js";

describe("selectPolicy", () => {
  test("production requires manual sync and a thorough hook", () => {
    const policy = selectPolicy("production")._unsafeUnwrap();

    expect(policy.sync).toEqual({ autoSync: false, selfHeal: false, pruneResources: false });
    expect(policy.hook).toEqual({
      waitSeconds: 30,
      retryAttempts: 5,
      checks: ["health", "content", "replicas"],
    });
  });

  test("dev and staging sync on their own", () => {
    const dev = selectPolicy("dev")._unsafeUnwrap();
    const staging = selectPolicy("staging")._unsafeUnwrap();

    expect(dev.sync).toEqual({ autoSync: true, selfHeal: true, pruneResources: true });
    expect(dev.hook).toEqual({ waitSeconds: 10, retryAttempts: 3, checks: ["health"] });
    expect(staging.sync.autoSync).toBe(true);
    expect(staging.hook).toEqual({ waitSeconds: 15, retryAttempts: 4, checks: ["health"] });
  });

  test("unknown tiers fail closed", () => {
    expect(selectPolicy("qa")._unsafeUnwrapErr()).toEqual({ type: "unknown-tier", tier: "qa" });
    expect(selectPolicy("")._unsafeUnwrapErr().type).toBe("unknown-tier");
  });

  test("accepts tier names regardless of case and padding", () => {
    expect(parseTier(" Production ")._unsafeUnwrap()).toBe("production");
  });

  test("returns a fresh copy every call", () => {
    const first = selectPolicy("production")._unsafeUnwrap();
    first.hook.checks.push("health");
    first.sync.autoSync = true;

    const second = selectPolicy("production")._unsafeUnwrap();
    expect(second.hook.checks).toEqual(["health", "content", "replicas"]);
    expect(second.sync.autoSync).toBe(false);
  });
});

describe("policyDrift", () => {
  test("lists every field that differs from the tier", () => {
    const drift = policyDrift(
      "production-api-service",
      { autoSync: true, selfHeal: false, pruneResources: true },
      { autoSync: false, selfHeal: false, pruneResources: false },
    );

    expect(drift).toEqual([
      { type: "policy-drift", application: "production-api-service", field: "autoSync", declared: true, expected: false },
      { type: "policy-drift", application: "production-api-service", field: "pruneResources", declared: true, expected: false },
    ]);
  });

  test("is empty when the declaration matches", () => {
    const policy = { autoSync: true, selfHeal: true, pruneResources: true };
    expect(policyDrift("dev-demo-app", policy, policy)).toEqual([]);
  });
});
