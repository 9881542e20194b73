import type { SyncPolicy } from "../types/domain.js";

/**
 * Registry and resolution errors. Each carries a `type` tag so callers can
 * switch over them; none of them is thrown.
 */
export type AmbiguousOwnership = {
  type: "ambiguous-ownership";
  subject: string;       // changed path, or the shorter of two overlapping source paths
  claimants: string[];   // application names, sorted
};

export type UnknownTier = {
  type: "unknown-tier";
  tier: string;
  application?: string;
};

export type MissingManifest = {
  type: "missing-manifest";
  application: string;
  sourcePath: string;
  manifest: string;
};

export type DuplicateName = {
  type: "duplicate-name";
  name: string;
  definitions: string[];
};

export type DuplicateNamespace = {
  type: "duplicate-namespace";
  namespace: string;
  applications: string[];
};

export type NameMismatch = {
  type: "name-mismatch";
  application: string;
  expected: string;
};

export type InvalidDefinition = {
  type: "invalid-definition";
  definition: string;
  reason: string;
};

export type ValidationError =
  | AmbiguousOwnership
  | UnknownTier
  | MissingManifest
  | DuplicateName
  | DuplicateNamespace
  | NameMismatch
  | InvalidDefinition;

export type PolicyDrift = {
  type: "policy-drift";
  application: string;
  field: keyof SyncPolicy;
  declared: boolean;
  expected: boolean;
};

export type ValidationWarning = PolicyDrift;

export type KubectlError =
  | { type: "not-installed"; message: string }
  | { type: "command-failed"; command: string; exitCode?: number; message: string }
  | { type: "parse-failed"; command: string; message: string }
  | { type: "timeout"; message: string };

export type SourceError = { type: "source-failed"; path: string; message: string };

export type GitError = { type: "git-failed"; message: string };

export type ConfigError = {
  type: "config-invalid";
  path: string;
  key?: string;
  message: string;
};

export type ScaffoldError =
  | { type: "invalid-environment"; environment: string; message: string }
  | { type: "environment-exists"; environment: string }
  | { type: "files-exist"; paths: string[] }
  | { type: "invalid-option"; option: string; message: string }
  | { type: "registry-conflict"; errors: ValidationError[] }
  | { type: "write-failed"; path: string; message: string };

export type CleanupError = { type: "remove-failed"; path: string; message: string };

export type PathwiseError =
  | ValidationError
  | ValidationWarning
  | KubectlError
  | SourceError
  | GitError
  | ConfigError
  | ScaffoldError
  | CleanupError;

/**
 * The thing an error is about; used to order error lists deterministically.
 */
export function errorSubject(error: ValidationError): string {
  switch (error.type) {
    case "ambiguous-ownership":
      return error.subject;
    case "unknown-tier":
      return error.application ?? error.tier;
    case "missing-manifest":
      return `${error.application}/${error.manifest}`;
    case "duplicate-name":
      return error.name;
    case "duplicate-namespace":
      return error.namespace;
    case "name-mismatch":
      return error.application;
    case "invalid-definition":
      return error.definition;
  }
}

export function compareValidationErrors(
  a: ValidationError,
  b: ValidationError,
): number {
  if (a.type !== b.type) return a.type.localeCompare(b.type);
  return errorSubject(a).localeCompare(errorSubject(b));
}

/**
 * Get a user-friendly message for any pathwise error
 */
export function getDisplayMessage(error: PathwiseError): string {
  switch (error.type) {
    case "ambiguous-ownership":
      return `Ambiguous ownership of ${error.subject}: claimed by ${error.claimants.join(", ")}`;
    case "unknown-tier":
      return error.application
        ? `Unknown environment tier '${error.tier}' for ${error.application}`
        : `Unknown environment tier '${error.tier}'`;
    case "missing-manifest":
      return `Missing ${error.manifest} under ${error.sourcePath} (${error.application})`;
    case "duplicate-name":
      return `Duplicate application name ${error.name} in ${error.definitions.join(", ")}`;
    case "duplicate-namespace":
      return `Namespace ${error.namespace} shared by ${error.applications.join(", ")}`;
    case "name-mismatch":
      return `Application ${error.application} should be named ${error.expected}`;
    case "invalid-definition":
      return `Invalid definition ${error.definition}: ${error.reason}`;
    case "policy-drift":
      return `${error.application} declares ${error.field}=${error.declared}, tier policy expects ${error.expected}`;
    case "not-installed":
    case "timeout":
    case "git-failed":
      return error.message;
    case "source-failed":
      return `${error.path}: ${error.message}`;
    case "command-failed":
    case "parse-failed":
      return `${error.command}: ${error.message}`;
    case "config-invalid":
      return error.key
        ? `Invalid config ${error.path} (${error.key}): ${error.message}`
        : `Invalid config ${error.path}: ${error.message}`;
    case "invalid-environment":
      return error.message;
    case "environment-exists":
      return `Environment '${error.environment}' already exists`;
    case "files-exist":
      return `Refusing to overwrite ${error.paths.join(", ")}`;
    case "invalid-option":
      return `${error.option}: ${error.message}`;
    case "registry-conflict":
      return error.errors.map(getDisplayMessage).join("; ");
    case "write-failed":
      return `Failed to write ${error.path}: ${error.message}`;
    case "remove-failed":
      return `Failed to remove ${error.path}: ${error.message}`;
  }
}
