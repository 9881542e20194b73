// Minimal Argo CD / Kubernetes shapes (only fields we read or write)

export type ArgoDestination = {
  name?: string;
  namespace?: string;
  server?: string;
};

export type ArgoSource = {
  repoURL?: string;
  targetRevision?: string;
  path?: string;
};

export type ArgoSyncPolicy = {
  automated?: { selfHeal?: boolean; prune?: boolean } | null;
  syncOptions?: string[];
};

export type ArgoApplication = {
  apiVersion?: string;
  kind?: string;
  metadata?: {
    name?: string;
    namespace?: string;
    labels?: Record<string, string>;
    annotations?: Record<string, string>;
  };
  spec?: {
    project?: string;
    source?: ArgoSource;
    destination?: ArgoDestination;
    syncPolicy?: ArgoSyncPolicy;
  };
  status?: {
    sync?: { status?: string; revision?: string };
    health?: { status?: string };
    operationState?: { phase?: string; finishedAt?: string };
    reconciledAt?: string;
  };
};

export type EnvVar = { name: string; value: string };

export type JobManifest = {
  apiVersion: 'batch/v1';
  kind: 'Job';
  metadata: {
    name: string;
    namespace: string;
    labels: Record<string, string>;
    annotations: Record<string, string>;
  };
  spec: {
    backoffLimit: number;
    activeDeadlineSeconds: number;
    template: {
      metadata: { labels: Record<string, string> };
      spec: {
        restartPolicy: 'Never';
        containers: Array<{
          name: string;
          image: string;
          command: string[];
          args: string[];
          env: EnvVar[];
        }>;
      };
    };
  };
};
