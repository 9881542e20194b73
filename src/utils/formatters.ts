/**
 * Pure formatting utility functions
 */

import type { Policy } from "../types/domain.js";

export type StatusColor = { color?: "green" | "red" | "yellow"; dimColor?: boolean };

/**
 * Get color styling for an Argo CD sync or health status
 */
export function colorFor(status: string): StatusColor {
  const v = (status || "").toLowerCase();
  if (v === "synced" || v === "healthy") return { color: "green" };
  if (v === "outofsync" || v === "degraded" || v === "missing") return { color: "red" };
  if (v === "progressing" || v === "suspended") return { color: "yellow" };
  if (v === "unknown" || v === "not found") return { dimColor: true };
  return {};
}

/**
 * Convert ISO date to human-readable "time since" format
 */
export function humanizeSince(iso?: string, now: number = Date.now()): string {
  if (!iso) return "-";
  const t = new Date(iso).getTime();
  if (!Number.isFinite(t)) return "-";
  const s = Math.max(0, Math.floor((now - t) / 1000));
  if (s < 60) return `${s}s`;
  const m = Math.floor(s / 60);
  if (m < 60) return `${m}m`;
  const h = Math.floor(m / 60);
  if (h < 24) return `${h}h`;
  const d = Math.floor(h / 24);
  return `${d}d`;
}

export function yesNo(value: boolean): string {
  return value ? "yes" : "no";
}

/**
 * One-line summary of what a tier does on sync
 */
export function formatSyncPolicy(policy: Policy): string {
  const { sync } = policy;
  return `auto-sync ${yesNo(sync.autoSync)}, self-heal ${yesNo(sync.selfHeal)}, prune ${yesNo(sync.pruneResources)}`;
}

export function formatHookPolicy(policy: Policy): string {
  const { hook } = policy;
  return `wait ${hook.waitSeconds}s, ${hook.retryAttempts} attempts, checks: ${hook.checks.join(", ")}`;
}

/**
 * Pad cells so columns line up. The last column is never padded.
 */
export function alignColumns(rows: readonly string[][]): string[] {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, i) => {
      widths[i] = Math.max(widths[i] ?? 0, cell.length);
    });
  }
  return rows.map((row) =>
    row
      .map((cell, i) => (i === row.length - 1 ? cell : cell.padEnd(widths[i])))
      .join("  "),
  );
}

export function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? "" : "s"}`;
}
