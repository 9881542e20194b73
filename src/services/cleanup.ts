import fs from "node:fs/promises";
import path from "node:path";
import { err, errAsync, ok, ResultAsync, type Result } from "neverthrow";
import { errorCode, errorMessage } from "../utils/error-fields.js";
import { segments, toDirectory } from "../utils/paths.js";
import type { CleanupError } from "./errors.js";
import { log } from "./logger.js";
import type { DefinitionEntry } from "./registry.js";

export type CleanupPlan = {
  application: string;
  namespace: string;
  manifestDir: string;
  // removed only when nothing else is left in it
  environmentDir: string | null;
  // null when the definition file also holds other applications
  definition: string | null;
};

/**
 * What removing an application from the repository touches. A definition
 * in its own `<appsDir>/<name>/` directory takes the directory with it.
 */
export function planCleanup(entry: DefinitionEntry, appsDir: string): CleanupPlan {
  const source = segments(entry.sourcePath);
  const environmentDir = source.length > 1 ? toDirectory(source.slice(0, -1).join("/")) : null;

  let definition: string | null = entry.definitionPath;
  if (entry.definitionPath.includes("#")) {
    definition = null;
  } else {
    const def = segments(entry.definitionPath);
    const ownDir = def.length === segments(appsDir).length + 2 && def[def.length - 2] === entry.name;
    if (ownDir) definition = toDirectory(def.slice(0, -1).join("/"));
  }

  return {
    application: entry.name,
    namespace: entry.destinationNamespace,
    manifestDir: entry.sourcePath,
    environmentDir,
    definition,
  };
}

/**
 * Absolute path of `relative` under `root`, refusing anything that lands
 * outside it.
 */
export function targetUnder(root: string, relative: string): Result<string, CleanupError> {
  const base = path.resolve(root);
  const target = path.resolve(base, ...segments(relative));
  const rel = path.relative(base, target);
  if (rel === "" || rel === ".." || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel)) {
    return err({ type: "remove-failed", path: relative, message: `not inside ${base}` });
  }
  return ok(target);
}

function removeIfPresent(root: string, relative: string): ResultAsync<boolean, CleanupError> {
  const target = targetUnder(root, relative);
  if (target.isErr()) return errAsync(target.error);
  return ResultAsync.fromPromise(
    fs.rm(target.value, { recursive: true }).then(
      () => true,
      (error: unknown) => {
        if (errorCode(error) === "ENOENT") return false;
        throw error;
      },
    ),
    (error): CleanupError => ({ type: "remove-failed", path: relative, message: errorMessage(error) }),
  );
}

function isEmptyDirectory(root: string, relative: string): ResultAsync<boolean, CleanupError> {
  const target = targetUnder(root, relative);
  if (target.isErr()) return errAsync(target.error);
  return ResultAsync.fromPromise(
    fs.readdir(target.value).then(
      (names) => names.length === 0,
      (error: unknown) => {
        if (errorCode(error) === "ENOENT") return false;
        throw error;
      },
    ),
    (error): CleanupError => ({ type: "remove-failed", path: relative, message: errorMessage(error) }),
  );
}

/**
 * Delete an application's files below `root`. Returns the repository-relative
 * paths actually removed, in removal order.
 */
export async function removeApplicationFiles(
  plan: CleanupPlan,
  root: string,
): Promise<Result<string[], CleanupError>> {
  const removed: string[] = [];

  const manifests = await removeIfPresent(root, plan.manifestDir);
  if (manifests.isErr()) return err(manifests.error);
  if (manifests.value) removed.push(plan.manifestDir);

  if (plan.environmentDir) {
    const empty = await isEmptyDirectory(root, plan.environmentDir);
    if (empty.isErr()) return err(empty.error);
    if (empty.value) {
      const env = await removeIfPresent(root, plan.environmentDir);
      if (env.isErr()) return err(env.error);
      if (env.value) removed.push(plan.environmentDir);
    }
  }

  if (plan.definition) {
    const definition = await removeIfPresent(root, plan.definition);
    if (definition.isErr()) return err(definition.error);
    if (definition.value) removed.push(plan.definition);
  }

  log.info("Application files removed", "cleanup", { application: plan.application, removed });
  return ok(removed);
}
