import { err, ok, type Result } from "neverthrow";
import {
  type EnvironmentTier,
  type Policy,
  type SyncPolicy,
  TIERS,
} from "../types/domain.js";
import type { PolicyDrift, UnknownTier } from "./errors.js";

const POLICY_TABLE: Record<EnvironmentTier, Omit<Policy, "tier">> = {
  dev: {
    sync: { autoSync: true, selfHeal: true, pruneResources: true },
    hook: { waitSeconds: 10, retryAttempts: 3, checks: ["health"] },
  },
  staging: {
    sync: { autoSync: true, selfHeal: true, pruneResources: true },
    hook: { waitSeconds: 15, retryAttempts: 4, checks: ["health"] },
  },
  // manual approval: nothing syncs or heals on its own
  production: {
    sync: { autoSync: false, selfHeal: false, pruneResources: false },
    hook: {
      waitSeconds: 30,
      retryAttempts: 5,
      checks: ["health", "content", "replicas"],
    },
  },
};

export function isTier(value: string): value is EnvironmentTier {
  return (TIERS as readonly string[]).includes(value);
}

export function parseTier(value: string): Result<EnvironmentTier, UnknownTier> {
  const v = value.trim().toLowerCase();
  return isTier(v) ? ok(v) : err({ type: "unknown-tier", tier: value });
}

/**
 * Derive the sync and hook policy for a tier. Fails closed: an unknown tier
 * never falls back to a default policy.
 */
export function selectPolicy(tier: string): Result<Policy, UnknownTier> {
  return parseTier(tier).map((t) => {
    const entry = POLICY_TABLE[t];
    return {
      tier: t,
      sync: { ...entry.sync },
      hook: { ...entry.hook, checks: [...entry.hook.checks] },
    };
  });
}

/**
 * Compare a declared sync policy against the tier policy
 */
export function policyDrift(
  application: string,
  declared: SyncPolicy,
  expected: SyncPolicy,
): PolicyDrift[] {
  const fields: Array<keyof SyncPolicy> = ["autoSync", "selfHeal", "pruneResources"];
  return fields
    .filter((field) => declared[field] !== expected[field])
    .map((field) => ({
      type: "policy-drift",
      application,
      field,
      declared: declared[field],
      expected: expected[field],
    }));
}
