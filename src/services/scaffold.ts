import fs from "node:fs/promises";
import path from "node:path";
import { err, ok, ResultAsync, type Result } from "neverthrow";
import YAML from "yaml";
import type { ArgoApplication } from "../types/argo.js";
import type { EnvironmentTier, ServiceType } from "../types/domain.js";
import { errorMessage } from "../utils/error-fields.js";
import { applicationName, TIER_LABEL } from "../utils/naming.js";
import { joinPath, segments } from "../utils/paths.js";
import {
  isPositiveInteger,
  isServiceType,
  isValidEnvironmentName,
  isValidK8sName,
  isValidNamespace,
} from "../utils/validators.js";
import type { ScaffoldError, SourceError, ValidationError } from "./errors.js";
import { log } from "./logger.js";
import { isTier, selectPolicy } from "./policy.js";
import { loadRegistry, type RegistryOptions } from "./registry.js";
import { OverlayRegistrySource, type RegistrySource } from "./registry-source.js";

export type ScaffoldRequest = {
  environment: string;
  replicas?: number;
  serviceType?: string;
  tier?: string;
  autoSync?: boolean;
  selfHeal?: boolean;
  services?: string[];
};

export type ScaffoldSettings = {
  appsDir: string;
  environmentsDir: string;
  argocdNamespace: string;
  repoURL?: string;
  services: string[];
};

export type ScaffoldPlan = {
  environment: string;
  tier: EnvironmentTier;
  replicas: number;
  serviceType: ServiceType;
  autoSync: boolean;
  selfHeal: boolean;
  applications: string[];
  files: Record<string, string>;  // repository-relative path -> content
};

export const PLACEHOLDER_REPO_URL = "https://example.com/gitops.git";
const CONTAINER_PORT = 8080;

/**
 * Tier for a new environment: its own name when that is a tier, production
 * for prod-like names, dev otherwise.
 */
export function defaultTier(environment: string): EnvironmentTier {
  if (isTier(environment)) return environment;
  if (environment.startsWith("prod")) return "production";
  return "dev";
}

function deploymentManifest(
  service: string,
  environment: string,
  replicas: number,
  tier: EnvironmentTier,
): Record<string, unknown> {
  const container: Record<string, unknown> = {
    name: service,
    image: `example/${service}:latest`,
    ports: [{ containerPort: CONTAINER_PORT }],
    env: [{ name: "ENVIRONMENT", value: environment }],
  };
  if (tier === "production") {
    container.resources = {
      requests: { memory: "128Mi", cpu: "100m" },
      limits: { memory: "256Mi", cpu: "200m" },
    };
  }
  return {
    apiVersion: "apps/v1",
    kind: "Deployment",
    metadata: { name: service },
    spec: {
      selector: { matchLabels: { app: service } },
      replicas,
      template: {
        metadata: { labels: { app: service, environment } },
        spec: { containers: [container] },
      },
    },
  };
}

function serviceManifest(service: string, type: ServiceType): Record<string, unknown> {
  return {
    apiVersion: "v1",
    kind: "Service",
    metadata: { name: service },
    spec: {
      selector: { app: service },
      ports: [{ port: CONTAINER_PORT, protocol: "TCP", targetPort: CONTAINER_PORT }],
      type,
    },
  };
}

function applicationManifest(
  name: string,
  sourcePath: string,
  plan: Pick<ScaffoldPlan, "environment" | "tier" | "autoSync" | "selfHeal">,
  settings: ScaffoldSettings,
): ArgoApplication {
  const labels: Record<string, string> = {};
  if (plan.tier !== plan.environment) labels[TIER_LABEL] = plan.tier;

  return {
    apiVersion: "argoproj.io/v1alpha1",
    kind: "Application",
    metadata: {
      name,
      namespace: settings.argocdNamespace,
      ...(Object.keys(labels).length > 0 ? { labels } : {}),
    },
    spec: {
      project: "default",
      source: {
        repoURL: settings.repoURL ?? PLACEHOLDER_REPO_URL,
        targetRevision: "HEAD",
        path: sourcePath,
      },
      destination: {
        server: "https://kubernetes.default.svc",
        namespace: name,
      },
      syncPolicy: {
        syncOptions: ["CreateNamespace=true"],
        ...(plan.autoSync ? { automated: { selfHeal: plan.selfHeal, prune: true } } : {}),
      },
    },
  };
}

/**
 * Build the files for a new environment without touching the repository.
 */
export function planEnvironment(
  request: ScaffoldRequest,
  settings: ScaffoldSettings,
): Result<ScaffoldPlan, ScaffoldError> {
  const environment = request.environment;
  if (!isValidEnvironmentName(environment)) {
    return err({
      type: "invalid-environment",
      environment,
      message:
        "Environment name must contain only lowercase letters, numbers, and hyphens and be 20 characters or less",
    });
  }

  const replicas = request.replicas ?? 2;
  if (!isPositiveInteger(replicas)) {
    return err({ type: "invalid-option", option: "replicas", message: "must be a positive number" });
  }

  const serviceType = request.serviceType ?? "ClusterIP";
  if (!isServiceType(serviceType)) {
    return err({
      type: "invalid-option",
      option: "service-type",
      message: "must be one of: ClusterIP, NodePort, LoadBalancer",
    });
  }

  const policy = selectPolicy(request.tier ?? defaultTier(environment));
  if (policy.isErr()) {
    return err({ type: "invalid-option", option: "tier", message: `unknown tier '${policy.error.tier}'` });
  }

  const services = request.services ?? settings.services;
  // the application name doubles as its namespace
  const badService = services.find(
    (s) => !isValidK8sName(s) || !isValidNamespace(applicationName(environment, s)),
  );
  if (services.length === 0 || badService !== undefined) {
    return err({
      type: "invalid-option",
      option: "services",
      message: badService ? `'${badService}' is not a valid service name` : "at least one service is required",
    });
  }

  const plan: ScaffoldPlan = {
    environment,
    tier: policy.value.tier,
    replicas,
    serviceType,
    autoSync: request.autoSync ?? policy.value.sync.autoSync,
    selfHeal: request.selfHeal ?? policy.value.sync.selfHeal,
    applications: [],
    files: {},
  };

  services.forEach((service, index) => {
    const name = applicationName(environment, service);
    const sourcePath = joinPath(settings.environmentsDir, environment, service);
    // the first service is the one exposed; the rest run one replica fewer
    const serviceReplicas = index === 0 ? replicas : Math.max(1, replicas - 1);
    const exposure = index === 0 ? serviceType : "ClusterIP";

    plan.applications.push(name);
    plan.files[joinPath(sourcePath, "deployment.yaml")] = YAML.stringify(
      deploymentManifest(service, environment, serviceReplicas, plan.tier),
    );
    plan.files[joinPath(sourcePath, "service.yaml")] = YAML.stringify(serviceManifest(service, exposure));
    plan.files[joinPath(settings.appsDir, name, "app.yaml")] = YAML.stringify(
      applicationManifest(name, sourcePath, plan, settings),
    );
  });

  return ok(plan);
}

/**
 * Check a plan against the repository it would be written to: the
 * environment must be new, none of the planned files may exist yet and the
 * merged registry must stay valid for the new applications.
 */
export async function checkPlan(
  plan: ScaffoldPlan,
  source: RegistrySource,
  settings: Pick<ScaffoldSettings, "environmentsDir">,
  registryOptions: RegistryOptions,
): Promise<Result<ScaffoldPlan, ScaffoldError | SourceError>> {
  if (await source.isDirectory(joinPath(settings.environmentsDir, plan.environment))) {
    return err({ type: "environment-exists", environment: plan.environment });
  }

  // the overlay below would hide these
  const existing: string[] = [];
  for (const file of Object.keys(plan.files).sort()) {
    if (await source.isFile(file)) existing.push(file);
  }
  if (existing.length > 0) return err({ type: "files-exist", paths: existing });

  const merged = await loadRegistry(new OverlayRegistrySource(source, plan.files), registryOptions);
  if (merged.isErr()) return err(merged.error);

  const ours = new Set(plan.applications);
  const involvesPlan = (e: ValidationError): boolean => {
    switch (e.type) {
      case "ambiguous-ownership":
        return e.claimants.some((c) => ours.has(c));
      case "duplicate-namespace":
        return e.applications.some((a) => ours.has(a));
      case "duplicate-name":
        return ours.has(e.name);
      case "invalid-definition":
        return Object.keys(plan.files).some((f) => e.definition.startsWith(f));
      default:
        return ours.has(e.application ?? "");
    }
  };
  const conflicts = merged.value.errors.filter(involvesPlan);
  if (conflicts.length > 0) return err({ type: "registry-conflict", errors: conflicts });

  return ok(plan);
}

/**
 * Write a plan below `root`, one file at a time. Returns the
 * repository-relative paths written. When a write fails, the files and
 * directories created so far are removed again.
 */
export function writePlan(plan: ScaffoldPlan, root: string): ResultAsync<string[], ScaffoldError> {
  return new ResultAsync(writeFiles(plan, root)).map((written) => {
    log.info("Environment scaffolded", "scaffold", { environment: plan.environment, files: written.length });
    return written;
  });
}

async function writeFiles(plan: ScaffoldPlan, root: string): Promise<Result<string[], ScaffoldError>> {
  const written: string[] = [];
  const createdDirs: string[] = [];

  for (const [file, content] of Object.entries(plan.files).sort(([a], [b]) => a.localeCompare(b))) {
    const target = path.join(root, ...segments(file));
    try {
      const created = await fs.mkdir(path.dirname(target), { recursive: true });
      if (created !== undefined) createdDirs.push(created);
      await fs.writeFile(target, content, { flag: "wx" });
      written.push(file);
    } catch (error: unknown) {
      const failure: ScaffoldError = { type: "write-failed", path: file, message: errorMessage(error) };
      const undone = await rollback(root, written, createdDirs);
      if (undone.isErr()) {
        log.error("Failed to undo a partial scaffold", "scaffold", { failure, rollback: undone.error });
      }
      return err(failure);
    }
  }
  return ok(written);
}

function rollback(root: string, files: string[], dirs: string[]): ResultAsync<void, ScaffoldError> {
  const removeAll = async () => {
    for (const file of files) {
      await fs.rm(path.join(root, ...segments(file)), { force: true });
    }
    // newest first; each one was created empty by this write
    for (const dir of [...dirs].reverse()) {
      await fs.rm(dir, { recursive: true, force: true });
    }
  };
  return ResultAsync.fromPromise(removeAll(), (error): ScaffoldError => ({
    type: "write-failed",
    path: root,
    message: errorMessage(error),
  }));
}
