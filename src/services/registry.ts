import { err, ok, type Result } from "neverthrow";
import YAML from "yaml";
import type { ArgoApplication } from "../types/argo.js";
import type { Application, SyncPolicy } from "../types/domain.js";
import {
  applicationName,
  ENVIRONMENT_LABEL,
  identityFromSourcePath,
  TIER_LABEL,
} from "../utils/naming.js";
import { escapesRoot, joinPath, overlaps, segments, toDirectory } from "../utils/paths.js";
import { isArgoApplication, isRecord } from "../utils/validators.js";
import {
  compareValidationErrors,
  type InvalidDefinition,
  type SourceError,
  type ValidationError,
  type ValidationWarning,
} from "./errors.js";
import { log } from "./logger.js";
import { policyDrift, selectPolicy } from "./policy.js";
import type { RegistrySource } from "./registry-source.js";

export type RegistryOptions = {
  appsDir: string;
  requiredManifests: string[];
};

export const DEFAULT_REGISTRY_OPTIONS: RegistryOptions = {
  appsDir: ".argocd",
  requiredManifests: ["deployment.yaml", "service.yaml"],
};

export type RegistryLoad = {
  applications: Application[];
  errors: ValidationError[];
  warnings: ValidationWarning[];
};

/**
 * An Application document that has every field the registry needs, before
 * any semantic check.
 */
export type DefinitionEntry = {
  definitionPath: string;
  name: string;
  sourcePath: string;
  destinationNamespace: string;
  labels: Record<string, string>;
  declaredSync: SyncPolicy;
};

const isYamlFile = (name: string) => name.endsWith(".yaml") || name.endsWith(".yml");

/**
 * Definition files: every YAML file directly under the apps directory or one
 * level below it (`.argocd/<name>/app.yaml`, `apps/<env>/<service>.yaml`).
 */
async function findDefinitionFiles(
  source: RegistrySource,
  appsDir: string,
): Promise<Result<string[], SourceError>> {
  const top = await source.list(appsDir);
  if (top.isErr()) return err(top.error);

  const files: string[] = [];
  for (const entry of top.value) {
    const entryPath = joinPath(appsDir, entry.name);
    if (!entry.directory) {
      if (isYamlFile(entry.name)) files.push(entryPath);
      continue;
    }
    const nested = await source.list(entryPath);
    if (nested.isErr()) return err(nested.error);
    for (const child of nested.value) {
      if (!child.directory && isYamlFile(child.name)) {
        files.push(joinPath(entryPath, child.name));
      }
    }
  }
  return ok(files.sort());
}

function stringRecord(value: unknown): Record<string, string> {
  if (!isRecord(value)) return {};
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(value)) {
    if (typeof v === "string") out[k] = v;
  }
  return out;
}

function declaredSyncPolicy(app: ArgoApplication): SyncPolicy {
  const automated = app.spec?.syncPolicy?.automated;
  if (!automated) return { autoSync: false, selfHeal: false, pruneResources: false };
  return {
    autoSync: true,
    selfHeal: automated.selfHeal === true,
    pruneResources: automated.prune === true,
  };
}

/**
 * Pull the registry fields out of one parsed YAML document. Documents that
 * are not Applications (projects, ApplicationSets) yield `null`.
 */
export function parseDefinition(
  doc: unknown,
  definitionPath: string,
): Result<DefinitionEntry | null, InvalidDefinition> {
  if (!isArgoApplication(doc)) return ok(null);

  const invalid = (reason: string): Result<never, InvalidDefinition> =>
    err({ type: "invalid-definition", definition: definitionPath, reason });

  const name = doc.metadata?.name;
  const path = doc.spec?.source?.path;
  const namespace = doc.spec?.destination?.namespace;
  if (typeof name !== "string" || name === "") return invalid("metadata.name is required");
  if (typeof path !== "string" || segments(path).length === 0) {
    return invalid("spec.source.path is required");
  }
  if (escapesRoot(path)) {
    return invalid("spec.source.path must be relative to the repository root without '..' segments");
  }
  if (typeof namespace !== "string" || namespace === "") {
    return invalid("spec.destination.namespace is required");
  }

  return ok({
    definitionPath,
    name,
    sourcePath: toDirectory(path),
    destinationNamespace: namespace,
    labels: stringRecord(doc.metadata?.labels),
    declaredSync: declaredSyncPolicy(doc),
  });
}

/**
 * Split a definition file into its Application entries.
 */
export function parseDefinitionFile(
  content: string,
  definitionPath: string,
): { entries: DefinitionEntry[]; errors: InvalidDefinition[] } {
  const entries: DefinitionEntry[] = [];
  const errors: InvalidDefinition[] = [];
  const docs = YAML.parseAllDocuments(content);
  const many = docs.length > 1;

  docs.forEach((doc, index) => {
    const id = many ? `${definitionPath}#${index}` : definitionPath;
    if (doc.errors.length > 0) {
      errors.push({ type: "invalid-definition", definition: id, reason: doc.errors[0].message });
      return;
    }
    const parsed = parseDefinition(doc.toJS(), id);
    if (parsed.isErr()) errors.push(parsed.error);
    else if (parsed.value) entries.push(parsed.value);
  });

  return { entries, errors };
}

/**
 * Checks that concern one entry at a time.
 */
async function checkEntry(
  entry: DefinitionEntry,
  source: RegistrySource,
  options: RegistryOptions,
): Promise<{ app: Application | null; errors: ValidationError[] }> {
  const errors: ValidationError[] = [];
  const identity = identityFromSourcePath(entry.sourcePath);
  const service = identity?.service ?? "";
  // a top-level source directory takes its environment from the tier label
  const environment =
    entry.labels[ENVIRONMENT_LABEL] ?? identity?.environment ?? entry.labels[TIER_LABEL] ?? "";
  if (environment === "") {
    errors.push({
      type: "invalid-definition",
      definition: entry.definitionPath,
      reason: `no environment for ${entry.sourcePath}; add a ${ENVIRONMENT_LABEL} label`,
    });
    return { app: null, errors };
  }
  const tier = entry.labels[TIER_LABEL] ?? environment;

  const policy = selectPolicy(tier);
  if (policy.isErr()) {
    errors.push({ ...policy.error, application: entry.name });
  }

  const expected = applicationName(environment, service);
  if (expected !== entry.name) {
    errors.push({ type: "name-mismatch", application: entry.name, expected });
  }

  for (const manifest of options.requiredManifests) {
    if (!(await source.isFile(joinPath(entry.sourcePath, manifest)))) {
      errors.push({
        type: "missing-manifest",
        application: entry.name,
        sourcePath: entry.sourcePath,
        manifest,
      });
    }
  }

  if (policy.isErr() || errors.length > 0) return { app: null, errors };

  return {
    app: {
      name: entry.name,
      environment,
      service,
      sourcePath: entry.sourcePath,
      destinationNamespace: entry.destinationNamespace,
      environmentTier: policy.value.tier,
      syncPolicy: entry.declaredSync,
      hookPolicy: policy.value.hook,
      definitionPath: entry.definitionPath,
    },
    errors,
  };
}

/**
 * Checks across entries. Returns the errors and the indexes of every entry
 * involved in one; those entries are all excluded.
 */
export function crossCheck(entries: readonly DefinitionEntry[]): {
  errors: ValidationError[];
  excluded: Set<number>;
} {
  const errors: ValidationError[] = [];
  const excluded = new Set<number>();

  const group = (key: (e: DefinitionEntry) => string) => {
    const groups = new Map<string, number[]>();
    entries.forEach((e, i) => {
      const k = key(e);
      groups.set(k, [...(groups.get(k) ?? []), i]);
    });
    return Array.from(groups).filter(([, idx]) => idx.length > 1);
  };

  for (const [name, idx] of group((e) => e.name)) {
    idx.forEach((i) => excluded.add(i));
    errors.push({
      type: "duplicate-name",
      name,
      definitions: idx.map((i) => entries[i].definitionPath).sort(),
    });
  }

  for (const [namespace, idx] of group((e) => e.destinationNamespace)) {
    idx.forEach((i) => excluded.add(i));
    errors.push({
      type: "duplicate-namespace",
      namespace,
      applications: idx.map((i) => entries[i].name).sort(),
    });
  }

  for (let i = 0; i < entries.length; i++) {
    for (let j = i + 1; j < entries.length; j++) {
      const a = entries[i];
      const b = entries[j];
      if (!overlaps(a.sourcePath, b.sourcePath)) continue;
      excluded.add(i);
      excluded.add(j);
      errors.push({
        type: "ambiguous-ownership",
        subject: a.sourcePath.length <= b.sourcePath.length ? a.sourcePath : b.sourcePath,
        claimants: [a.name, b.name].sort(),
      });
    }
  }

  return { errors, excluded };
}

/**
 * Validate a set of parsed entries. Pure apart from the manifest existence
 * checks made through `source`.
 */
export async function validateEntries(
  entries: readonly DefinitionEntry[],
  source: RegistrySource,
  options: RegistryOptions,
): Promise<RegistryLoad> {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];
  const applications: Application[] = [];
  const cross = crossCheck(entries);
  errors.push(...cross.errors);

  for (let i = 0; i < entries.length; i++) {
    const checked = await checkEntry(entries[i], source, options);
    errors.push(...checked.errors);
    if (!checked.app || cross.excluded.has(i)) continue;

    applications.push(checked.app);
    const policy = selectPolicy(checked.app.environmentTier);
    if (policy.isOk()) {
      warnings.push(...policyDrift(checked.app.name, checked.app.syncPolicy, policy.value.sync));
    }
  }

  applications.sort((a, b) => a.definitionPath.localeCompare(b.definitionPath));
  errors.sort(compareValidationErrors);
  warnings.sort(
    (a, b) => a.application.localeCompare(b.application) || a.field.localeCompare(b.field),
  );
  return { applications, errors, warnings };
}

/**
 * Find and parse every definition file without validating the entries.
 */
export async function readDefinitions(
  source: RegistrySource,
  appsDir: string,
): Promise<Result<{ files: string[]; entries: DefinitionEntry[]; errors: InvalidDefinition[] }, SourceError>> {
  const files = await findDefinitionFiles(source, appsDir);
  if (files.isErr()) return err(files.error);

  const entries: DefinitionEntry[] = [];
  const errors: InvalidDefinition[] = [];
  for (const file of files.value) {
    const content = await source.readText(file);
    if (content.isErr()) return err(content.error);
    const parsed = parseDefinitionFile(content.value, file);
    entries.push(...parsed.entries);
    errors.push(...parsed.errors);
  }
  return ok({ files: files.value, entries, errors });
}

/**
 * Load and validate every Application definition under the apps directory.
 *
 * Invalid entries are reported and left out of `applications`; they never
 * abort the load. Only a failure to read the repository itself is an `Err`.
 */
export async function loadRegistry(
  source: RegistrySource,
  options: RegistryOptions = DEFAULT_REGISTRY_OPTIONS,
): Promise<Result<RegistryLoad, SourceError>> {
  const definitions = await readDefinitions(source, options.appsDir);
  if (definitions.isErr()) return err(definitions.error);
  const { files, entries } = definitions.value;

  const result = await validateEntries(entries, source, options);
  const errors = [...definitions.value.errors, ...result.errors].sort(compareValidationErrors);

  log.debug("Registry loaded", "registry", {
    definitions: files.length,
    applications: result.applications.length,
    errors: errors.length,
  });

  return ok({ ...result, errors });
}
