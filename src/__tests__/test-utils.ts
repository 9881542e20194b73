/**
 * Test utilities and fixtures. This file has no tests of its own.
 */
import { mkdir, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import type { ReactElement } from "react";
import { vi, type Mock } from "vitest";
import YAML from "yaml";
import { Git } from "../api/git.js";
import { Kubectl } from "../api/kubectl.js";
import type { CommandOutput, CommandRunner } from "../api/runner.js";
import type { Command, CommandContext } from "../commands/types.js";
import { createDefaultConfig } from "../config/pathwise-config.js";
import { MemoryRegistrySource, type RegistrySource } from "../services/registry-source.js";
import type { StatusLogger } from "../services/status-service.js";
import type { Application } from "../types/domain.js";
import type { PathwiseConfig } from "../types/pathwise.js";

export function stripAnsi(text: string | undefined): string {
  return (text ?? "").replace(/\u001b\[[0-9;]*m/g, "");
}

export function createMockStatusLog() {
  return {
    info: vi.fn<StatusLogger["info"]>(),
    success: vi.fn<StatusLogger["success"]>(),
    warn: vi.fn<StatusLogger["warn"]>(),
    error: vi.fn<StatusLogger["error"]>(),
    debug: vi.fn<StatusLogger["debug"]>(),
  };
}

export type DefinitionFixture = {
  name: string;
  path: string;
  namespace?: string;
  labels?: Record<string, string>;
  automated?: { selfHeal: boolean; prune: boolean };
};

/**
 * An Argo CD Application document as it would sit in `.argocd/<name>/app.yaml`
 */
export function appDefinition(fixture: DefinitionFixture): string {
  return YAML.stringify({
    apiVersion: "argoproj.io/v1alpha1",
    kind: "Application",
    metadata: {
      name: fixture.name,
      namespace: "argocd",
      ...(fixture.labels ? { labels: fixture.labels } : {}),
    },
    spec: {
      project: "default",
      source: { repoURL: "https://example.com/gitops.git", path: fixture.path },
      destination: { server: "https://kubernetes.default.svc", namespace: fixture.namespace ?? fixture.name },
      syncPolicy: fixture.automated ? { automated: fixture.automated } : {},
    },
  });
}

const AUTOMATED = { selfHeal: true, prune: true };

export function manifestsFor(dir: string): Record<string, string> {
  return {
    [`${dir}/deployment.yaml`]: "kind: Deployment\n",
    [`${dir}/service.yaml`]: "kind: Service\n",
  };
}

/**
 * A valid repository: dev/demo-app, dev/api-service and
 * production/api-service, each declared the way its tier expects.
 */
export function standardRepo(): Record<string, string> {
  return {
    ".argocd/dev-demo-app/app.yaml": appDefinition({ name: "dev-demo-app", path: "dev/demo-app", automated: AUTOMATED }),
    ".argocd/dev-api-service/app.yaml": appDefinition({ name: "dev-api-service", path: "dev/api-service", automated: AUTOMATED }),
    ".argocd/production-api-service/app.yaml": appDefinition({ name: "production-api-service", path: "production/api-service" }),
    ...manifestsFor("dev/demo-app"),
    ...manifestsFor("dev/api-service"),
    ...manifestsFor("production/api-service"),
  };
}

/**
 * Write repository-relative files below a directory
 */
export async function writeRepo(root: string, files: Record<string, string>): Promise<void> {
  for (const [file, content] of Object.entries(files)) {
    const target = join(root, file);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, content);
  }
}

export function makeApplication(overrides: Partial<Application> & Pick<Application, "name" | "sourcePath">): Application {
  return {
    environment: "dev",
    service: overrides.name.replace(/^dev-/, ""),
    destinationNamespace: overrides.name,
    environmentTier: "dev",
    syncPolicy: { autoSync: true, selfHeal: true, pruneResources: true },
    hookPolicy: { waitSeconds: 10, retryAttempts: 3, checks: ["health"] },
    definitionPath: `.argocd/${overrides.name}/app.yaml`,
    ...overrides,
  };
}

type Reply = Partial<CommandOutput>;

/**
 * A command runner answering from a function of the arguments. Unanswered
 * calls succeed with empty output.
 */
export function createFakeRunner(respond: (file: string, args: string[]) => Reply | undefined = () => undefined) {
  return vi.fn<CommandRunner>(async (file, args) => {
    const reply = respond(file, [...args]) ?? {};
    return { stdout: reply.stdout ?? "", stderr: reply.stderr ?? "", exitCode: reply.exitCode ?? 0 };
  });
}

export type TestContext = CommandContext & {
  statusLog: ReturnType<typeof createMockStatusLog>;
  rendered: ReactElement[];
  printed: string[];
  confirm: Mock<CommandContext["confirm"]>;
  sleep: Mock<CommandContext["sleep"]>;
  exitCode: () => number;
};

export type TestContextOptions = {
  files?: Record<string, string>;
  source?: RegistrySource;
  config?: Partial<PathwiseConfig>;
  root?: string;
  runner?: CommandRunner;
  confirmAnswer?: boolean;
};

export function createTestContext(options: TestContextOptions = {}): TestContext {
  let exitCode = 0;
  const runner = options.runner ?? createFakeRunner();
  const config = { ...createDefaultConfig(), ...options.config };
  const rendered: ReactElement[] = [];
  const printed: string[] = [];

  return {
    settings: { root: options.root ?? "/repo", configPath: null, config },
    statusLog: createMockStatusLog(),
    source: options.source ?? new MemoryRegistrySource(options.files ?? {}),
    kubectl: new Kubectl({
      argocdNamespace: config.argocdNamespace,
      runner,
      sleep: async () => {},
    }),
    git: new Git({ cwd: options.root ?? "/repo", runner }),
    render: async (view) => {
      rendered.push(view);
    },
    print: (text) => {
      printed.push(text);
    },
    confirm: vi.fn<CommandContext["confirm"]>(async () => options.confirmAnswer ?? true),
    sleep: vi.fn<CommandContext["sleep"]>(async () => {}),
    setExitCode: (code) => {
      exitCode = code;
    },
    rendered,
    printed,
    exitCode: () => exitCode,
  };
}

export function createMockCommand(
  overrides: Partial<Omit<Command, "execute">> & { execute?: Mock<Command["execute"]> } = {},
): Command & { execute: Mock<Command["execute"]> } {
  return {
    aliases: [],
    description: "Mock command",
    execute: vi.fn<Command["execute"]>(),
    ...overrides,
  };
}
