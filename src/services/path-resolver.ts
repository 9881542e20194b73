import { err, ok, type Result } from "neverthrow";
import type { Application } from "../types/domain.js";
import { isWithin, normalizePath } from "../utils/paths.js";
import type { AmbiguousOwnership } from "./errors.js";

/**
 * Find the application owning a changed path.
 *
 * `null` means no application owns the path, so nothing syncs. Two or more
 * owners is a configuration error and is reported, never broken by
 * precedence.
 */
export function resolve(
  changedPath: string,
  registry: readonly Application[],
): Result<Application | null, AmbiguousOwnership> {
  const path = normalizePath(changedPath);
  if (path === "") return ok(null);

  const owners = registry.filter((app) => isWithin(app.sourcePath, path));
  if (owners.length === 0) return ok(null);
  if (owners.length === 1) return ok(owners[0]);

  return err({
    type: "ambiguous-ownership",
    subject: path,
    claimants: owners.map((a) => a.name).sort(),
  });
}

export type AffectedApplication = {
  application: Application;
  paths: string[];
};

export type ChangeImpact = {
  affected: AffectedApplication[];  // ordered by application name
  unowned: string[];
  errors: AmbiguousOwnership[];
};

/**
 * Resolve a batch of changed paths. Every path is resolved; ambiguities are
 * collected instead of stopping at the first one.
 */
export function resolveChanges(
  changedPaths: readonly string[],
  registry: readonly Application[],
): ChangeImpact {
  const byApp = new Map<string, AffectedApplication>();
  const unowned: string[] = [];
  const errors: AmbiguousOwnership[] = [];
  const seen = new Set<string>();

  for (const raw of changedPaths) {
    const path = normalizePath(raw);
    if (path === "" || seen.has(path)) continue;
    seen.add(path);

    const result = resolve(path, registry);
    if (result.isErr()) {
      errors.push(result.error);
      continue;
    }

    const app = result.value;
    if (!app) {
      unowned.push(path);
      continue;
    }

    const entry = byApp.get(app.name);
    if (entry) entry.paths.push(path);
    else byApp.set(app.name, { application: app, paths: [path] });
  }

  const affected = Array.from(byApp.values()).sort((a, b) =>
    a.application.name.localeCompare(b.application.name),
  );
  return { affected, unowned, errors };
}
