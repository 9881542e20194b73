import { describe, expect, test } from "vitest";
import { errAsync } from "neverthrow";
import YAML from "yaml";
import { HookCommand, ListCommand, PolicyCommand, ValidateCommand } from "../../commands/inspect.js";
import type { SourceError } from "../../services/errors.js";
import type { RegistrySource } from "../../services/registry-source.js";
import type { Application } from "../../types/domain.js";
import { appDefinition, createTestContext, standardRepo } from "../test-utils.js";

const brokenRepo = () => ({
  ...standardRepo(),
  ".argocd/dev-broken/app.yaml": appDefinition({ name: "dev-broken", path: "dev/broken" }),
  "dev/broken/deployment.yaml": "kind: Deployment\n",
});

describe("ValidateCommand", () => {
  test("a valid repository passes", async () => {
    const context = createTestContext({ files: standardRepo() });

    await new ValidateCommand().execute(context);

    expect(context.rendered[0].props.load.errors).toEqual([]);
    expect(context.exitCode()).toBe(0);
  });

  test("errors fail the run", async () => {
    const context = createTestContext({ files: brokenRepo() });

    await new ValidateCommand().execute(context);

    expect(context.rendered[0].props.load.errors).toEqual([
      { type: "missing-manifest", application: "dev-broken", sourcePath: "dev/broken/", manifest: "service.yaml" },
    ]);
    expect(context.exitCode()).toBe(1);
  });

  test("reports an unreadable repository", async () => {
    const denied: SourceError = { type: "source-failed", path: ".argocd", message: "permission denied" };
    const source: RegistrySource = {
      list: () => errAsync(denied),
      readText: () => errAsync(denied),
      isFile: async () => false,
      isDirectory: async () => false,
    };
    const context = createTestContext({ source });

    await new ValidateCommand().execute(context);

    expect(context.statusLog.error).toHaveBeenCalledWith(".argocd: permission denied", "registry");
    expect(context.exitCode()).toBe(1);
    expect(context.rendered).toEqual([]);
  });
});

describe("ListCommand", () => {
  test("lists valid applications in definition order", async () => {
    const context = createTestContext({ files: standardRepo() });

    await new ListCommand().execute(context);

    const apps: Application[] = context.rendered[0].props.applications;
    expect(apps.map((a) => a.name)).toEqual(["dev-api-service", "dev-demo-app", "production-api-service"]);
    expect(context.statusLog.warn).not.toHaveBeenCalled();
  });

  test("warns about excluded definitions", async () => {
    const context = createTestContext({ files: brokenRepo() });

    await new ListCommand().execute(context);

    expect(context.statusLog.warn).toHaveBeenCalledWith("1 definition(s) excluded; run validate for details", "list");
    expect(context.exitCode()).toBe(0);
  });
});

describe("PolicyCommand", () => {
  test("renders the policy of a tier", async () => {
    const context = createTestContext();

    await new PolicyCommand().execute(context, "production");

    expect(context.rendered[0].props.policy).toEqual({
      tier: "production",
      sync: { autoSync: false, selfHeal: false, pruneResources: false },
      hook: { waitSeconds: 30, retryAttempts: 5, checks: ["health", "content", "replicas"] },
    });
  });

  test("rejects an unknown tier", async () => {
    const context = createTestContext();

    await new PolicyCommand().execute(context, "qa");

    expect(context.statusLog.error).toHaveBeenCalledWith("Unknown environment tier 'qa'", "policy");
    expect(context.exitCode()).toBe(1);
  });

  test("requires a tier", async () => {
    const context = createTestContext();

    await new PolicyCommand().execute(context);

    expect(context.statusLog.error).toHaveBeenCalledWith("Usage: policy <tier>", undefined);
  });
});

describe("HookCommand", () => {
  test("prints the validation Job of a production application", async () => {
    const context = createTestContext({ files: standardRepo() });

    await new HookCommand().execute(context, "production-api-service");

    const job = YAML.parse(context.printed[0]);
    expect(job.metadata.name).toBe("production-api-service-validation");
    expect(job.metadata.namespace).toBe("production-api-service");
    expect(job.metadata.annotations["argocd.argoproj.io/hook"]).toBe("PostSync");
    expect(job.spec.template.spec.containers[0].image).toBe("curlimages/curl:8.5.0");
    expect(job.spec.template.spec.containers[0].env).toContainEqual({ name: "CHECKS", value: "health,content,replicas" });
  });

  test("applies the target overrides", async () => {
    const context = createTestContext({ files: standardRepo() });

    await new HookCommand().execute(
      context,
      "dev-demo-app",
      "--image",
      "busybox:1.36",
      "--target-service=frontend",
      "--target-port",
      "3000",
    );

    const job = YAML.parse(context.printed[0]);
    const container = job.spec.template.spec.containers[0];
    expect(job.metadata.name).toBe("dev-demo-app-post-sync");
    expect(container.image).toBe("busybox:1.36");
    expect(container.env).toContainEqual({ name: "TARGET_SERVICE", value: "frontend" });
    expect(container.env).toContainEqual({ name: "TARGET_PORT", value: "3000" });
  });

  test("rejects a bad port before loading anything", async () => {
    const context = createTestContext({ files: standardRepo() });

    await new HookCommand().execute(context, "dev-demo-app", "--target-port", "http");

    expect(context.statusLog.error).toHaveBeenCalledWith("target-port: must be a positive number", undefined);
    expect(context.printed).toEqual([]);
  });

  test("only valid applications have a hook", async () => {
    const context = createTestContext({ files: brokenRepo() });

    await new HookCommand().execute(context, "dev-broken");

    expect(context.statusLog.error).toHaveBeenCalledWith(
      "Application 'dev-broken' is not a valid registered application",
      "hook",
    );
    expect(context.exitCode()).toBe(1);
  });
});
