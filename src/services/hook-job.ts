import YAML from "yaml";
import type { JobManifest } from "../types/argo.js";
import type { Application } from "../types/domain.js";
import { hookJobName } from "../utils/naming.js";

export type HookJobOptions = {
  image: string;
  targetService?: string;  // defaults to the application's service
  targetPort?: number;
};

export const HOOK_ANNOTATIONS = {
  "argocd.argoproj.io/hook": "PostSync",
  "argocd.argoproj.io/hook-delete-policy": "BeforeHookCreation",
} as const;

// Shell run by the hook container; reads its parameters from the environment.
const CHECK_SCRIPT = [
  'echo "Waiting ${WAIT_SECONDS}s for ${TARGET_SERVICE} to settle"',
  "sleep \"$WAIT_SECONDS\"",
  "url=\"http://${TARGET_SERVICE}:${TARGET_PORT}/\"",
  "for check in $(echo \"$CHECKS\" | tr ',' ' '); do",
  "  attempt=1",
  "  until [ \"$attempt\" -gt \"$RETRY_ATTEMPTS\" ]; do",
  "    case \"$check\" in",
  "      health) curl -fsS -o /dev/null \"$url\" && break ;;",
  "      content) curl -fsS \"$url\" | grep -q . && break ;;",
  "      replicas) for i in 1 2 3; do curl -fsS -o /dev/null \"$url\" || exit 1; done && break ;;",
  "    esac",
  "    attempt=$((attempt + 1))",
  "    sleep 5",
  "  done",
  "  [ \"$attempt\" -le \"$RETRY_ATTEMPTS\" ] || { echo \"check $check failed\"; exit 1; }",
  "  echo \"check $check passed\"",
  "done",
].join("\n");

/**
 * Post-sync validation Job for one application, scoped to its destination
 * namespace and parameterised by its hook policy.
 */
export function renderHookJob(app: Application, options: HookJobOptions): JobManifest {
  const { hookPolicy } = app;
  const production = app.environmentTier === "production";
  const name = hookJobName(app.name, production);
  const labels = {
    "app.kubernetes.io/managed-by": "pathwise",
    "pathwise.io/application": app.name,
  };

  return {
    apiVersion: "batch/v1",
    kind: "Job",
    metadata: {
      name,
      namespace: app.destinationNamespace,
      labels,
      annotations: { ...HOOK_ANNOTATIONS },
    },
    spec: {
      backoffLimit: Math.max(0, hookPolicy.retryAttempts - 1),
      // every attempt of every check may wait, plus the initial settle time
      activeDeadlineSeconds:
        hookPolicy.waitSeconds + hookPolicy.retryAttempts * hookPolicy.checks.length * 10 + 60,
      template: {
        metadata: { labels },
        spec: {
          restartPolicy: "Never",
          containers: [
            {
              name: "validate",
              image: options.image,
              command: ["/bin/sh", "-c"],
              args: [CHECK_SCRIPT],
              env: [
                { name: "WAIT_SECONDS", value: String(hookPolicy.waitSeconds) },
                { name: "RETRY_ATTEMPTS", value: String(hookPolicy.retryAttempts) },
                { name: "CHECKS", value: hookPolicy.checks.join(",") },
                { name: "TARGET_SERVICE", value: options.targetService ?? app.service },
                { name: "TARGET_PORT", value: String(options.targetPort ?? 8080) },
              ],
            },
          ],
        },
      },
    },
  };
}

export function hookJobToYaml(job: JobManifest): string {
  return YAML.stringify(job);
}
