import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import YAML from "yaml";
import { AddEnvironmentCommand, CleanupCommand } from "../../commands/environment.js";
import { FsRegistrySource } from "../../services/registry-source.js";
import { createFakeRunner, createTestContext, standardRepo, writeRepo } from "../test-utils.js";

const liveApp = JSON.stringify({ apiVersion: "argoproj.io/v1alpha1", kind: "Application", metadata: { name: "x" } });

const messages = (fn: { mock: { calls: unknown[][] } }) => fn.mock.calls.map((call) => call[0]);

describe("AddEnvironmentCommand", () => {
  test("a dry run only lists the files", async () => {
    const context = createTestContext({ files: standardRepo() });

    await new AddEnvironmentCommand().execute(context, "qa", "--services", "web", "--dry-run");

    expect(messages(context.statusLog.info)).toEqual([
      "Environment 'qa': tier dev, 2 replicas, ClusterIP, auto-sync on, self-heal on",
      "[dry-run] would create .argocd/qa-web/app.yaml",
      "[dry-run] would create qa/web/deployment.yaml",
      "[dry-run] would create qa/web/service.yaml",
    ]);
    expect(context.statusLog.success).not.toHaveBeenCalled();
    expect(context.exitCode()).toBe(0);
  });

  test("sync flags override the tier defaults", async () => {
    const context = createTestContext({ files: standardRepo() });

    await new AddEnvironmentCommand().execute(context, "qa", "--no-auto-sync", "--replicas=1", "--dry-run");

    expect(context.statusLog.info).toHaveBeenNthCalledWith(
      1,
      "Environment 'qa': tier dev, 1 replica, ClusterIP, auto-sync off, self-heal on",
      "scaffold",
    );
  });

  test("refuses an existing environment", async () => {
    const context = createTestContext({ files: standardRepo() });

    await new AddEnvironmentCommand().execute(context, "dev");

    expect(context.statusLog.error).toHaveBeenCalledWith("Environment 'dev' already exists", "scaffold");
    expect(context.exitCode()).toBe(1);
  });

  test("rejects bad options", async () => {
    const context = createTestContext({ files: standardRepo() });

    await new AddEnvironmentCommand().execute(context, "qa", "--replicas", "0");

    expect(context.statusLog.error).toHaveBeenCalledWith("replicas: must be a positive number", "scaffold");
  });

  test("requires a name", async () => {
    const context = createTestContext();

    await new AddEnvironmentCommand().execute(context);

    expect(context.exitCode()).toBe(1);
    expect(context.statusLog.info).not.toHaveBeenCalled();
  });

  describe("writing", () => {
    let root: string;

    beforeEach(async () => {
      root = await mkdtemp(join(tmpdir(), "pathwise-add-env-"));
      await writeRepo(root, standardRepo());
    });

    afterEach(async () => {
      await rm(root, { recursive: true, force: true });
    });

    test("writes the environment into the repository", async () => {
      const context = createTestContext({ root, source: new FsRegistrySource(root) });

      await new AddEnvironmentCommand().execute(context, "staging", "--services=web");

      expect(context.statusLog.success).toHaveBeenCalledWith(
        "Environment 'staging' created with 1 application: staging-web",
        "scaffold",
      );
      expect(messages(context.statusLog.info).slice(1)).toEqual([
        "Created .argocd/staging-web/app.yaml",
        "Created staging/web/deployment.yaml",
        "Created staging/web/service.yaml",
      ]);
      const app = YAML.parse(await readFile(join(root, ".argocd/staging-web/app.yaml"), "utf8"));
      expect(app.spec.source.path).toBe("staging/web");
      expect(app.spec.destination.namespace).toBe("staging-web");
    });
  });
});

describe("CleanupCommand", () => {
  test("requires applications or --all, not both", async () => {
    const usage = "Usage: cleanup <app...> | --all [--dry-run] [--force] [--apps-only] [--manifests-only]";

    const none = createTestContext({ files: standardRepo() });
    await new CleanupCommand().execute(none);
    expect(none.statusLog.error).toHaveBeenCalledWith(usage, undefined);

    const both = createTestContext({ files: standardRepo() });
    await new CleanupCommand().execute(both, "--all", "dev-demo-app");
    expect(both.statusLog.error).toHaveBeenCalledWith(usage, undefined);
  });

  test("--apps-only and --manifests-only exclude each other", async () => {
    const context = createTestContext({ files: standardRepo() });

    await new CleanupCommand().execute(context, "dev-demo-app", "--apps-only", "--manifests-only");

    expect(context.statusLog.error).toHaveBeenCalledWith("--apps-only and --manifests-only cannot be combined", undefined);
  });

  test("unknown applications are an error", async () => {
    const context = createTestContext({ files: standardRepo() });

    await new CleanupCommand().execute(context, "dev-nope");

    expect(context.statusLog.error).toHaveBeenCalledWith("Application 'dev-nope' not found in .argocd", "cleanup");
    expect(context.exitCode()).toBe(1);
  });

  test("a dry run changes nothing", async () => {
    const runner = createFakeRunner((_, args) => (args[1] === "applications.argoproj.io" ? { stdout: liveApp } : undefined));
    const context = createTestContext({ files: standardRepo(), runner });

    await new CleanupCommand().execute(context, "dev-demo-app", "--dry-run");

    expect(context.confirm).not.toHaveBeenCalled();
    expect(messages(context.statusLog.info)).toEqual([
      "[dry-run] would delete Argo CD application dev-demo-app",
      "[dry-run] would delete dev/demo-app/",
      "[dry-run] would delete .argocd/dev-demo-app/",
    ]);
    expect(runner.mock.calls.map(([, args]) => args[0])).toEqual(["get"]);
    expect(context.statusLog.success).not.toHaveBeenCalled();
  });

  test("declining the confirmation cancels", async () => {
    const runner = createFakeRunner();
    const context = createTestContext({ files: standardRepo(), runner, confirmAnswer: false });

    await new CleanupCommand().execute(context, "dev-demo-app");

    expect(context.confirm).toHaveBeenCalledWith("Delete dev-demo-app and all their resources?");
    expect(context.statusLog.info).toHaveBeenCalledWith("Operation cancelled", "cleanup");
    expect(runner).not.toHaveBeenCalled();
  });

  test("--all --apps-only --force skips the files and the prompt", async () => {
    const context = createTestContext({ files: standardRepo() });

    await new CleanupCommand().execute(context, "--all", "--apps-only", "-f");

    expect(context.confirm).not.toHaveBeenCalled();
    expect(messages(context.statusLog.warn)).toEqual([
      "Argo CD application dev-api-service not found",
      "Argo CD application dev-demo-app not found",
      "Argo CD application production-api-service not found",
    ]);
    expect(messages(context.statusLog.success)).toEqual([
      "Application 'dev-api-service' cleaned up",
      "Application 'dev-demo-app' cleaned up",
      "Application 'production-api-service' cleaned up",
    ]);
  });

  test("--all asks once for every application", async () => {
    const context = createTestContext({ files: standardRepo(), confirmAnswer: false });

    await new CleanupCommand().execute(context, "--all");

    expect(context.confirm).toHaveBeenCalledWith("Delete ALL 3 applications and their resources?");
  });

  test("a namespace that keeps terminating is a warning", async () => {
    const runner = createFakeRunner((_, args) => {
      if (args[1] === "applications.argoproj.io") return { stdout: liveApp };
      if (args[1] === "namespace") return { stdout: "namespace/dev-demo-app" };
      return undefined;
    });
    const context = createTestContext({ files: standardRepo(), runner });

    await new CleanupCommand().execute(context, "dev-demo-app", "--apps-only", "--force");

    expect(context.statusLog.warn).toHaveBeenCalledWith(
      "Namespace dev-demo-app still terminating after 60s; it may need manual cleanup",
      "cleanup",
    );
    expect(context.statusLog.success).toHaveBeenLastCalledWith("Application 'dev-demo-app' cleaned up", "cleanup");
  });

  describe("in a repository", () => {
    let root: string;

    beforeEach(async () => {
      root = await mkdtemp(join(tmpdir(), "pathwise-cleanup-cmd-"));
      await writeRepo(root, standardRepo());
    });

    afterEach(async () => {
      await rm(root, { recursive: true, force: true });
    });

    test("deletes the application, its namespace and its files", async () => {
      const runner = createFakeRunner((_, args) =>
        args[0] === "get" && args[1] === "applications.argoproj.io" ? { stdout: liveApp } : undefined,
      );
      const context = createTestContext({ root, source: new FsRegistrySource(root), runner });

      await new CleanupCommand().execute(context, "dev-demo-app");

      expect(messages(context.statusLog.success)).toEqual([
        "Deleted Argo CD application dev-demo-app",
        "Namespace dev-demo-app cleaned up",
        "Deleted dev/demo-app/",
        "Deleted .argocd/dev-demo-app/",
        "Application 'dev-demo-app' cleaned up",
      ]);
      expect(runner).toHaveBeenCalledWith("kubectl", [
        "delete",
        "applications.argoproj.io",
        "dev-demo-app",
        "-n",
        "argocd",
        "--ignore-not-found",
      ]);
      expect(await new FsRegistrySource(root).isDirectory("dev/demo-app")).toBe(false);
      expect(await new FsRegistrySource(root).isDirectory("dev/api-service")).toBe(true);
    });
  });
});
