// Domain types used across the app (stable)

export const TIERS = ['dev', 'staging', 'production'] as const;

export type EnvironmentTier = typeof TIERS[number];

export type SyncPolicy = {
  autoSync: boolean;
  selfHeal: boolean;
  pruneResources: boolean;
};

export type HookCheck = 'health' | 'content' | 'replicas';

export type HookPolicy = {
  waitSeconds: number;
  retryAttempts: number;
  checks: HookCheck[];  // run in order
};

export type Policy = {
  tier: EnvironmentTier;
  sync: SyncPolicy;
  hook: HookPolicy;
};

export type Application = {
  name: string;                 // {environment}-{service}
  environment: string;
  service: string;
  sourcePath: string;           // normalised, always ends with '/'
  destinationNamespace: string;
  environmentTier: EnvironmentTier;
  syncPolicy: SyncPolicy;       // as declared in the definition
  hookPolicy: HookPolicy;       // derived from the tier
  definitionPath: string;       // repository-relative
};

export type ServiceType = 'ClusterIP' | 'NodePort' | 'LoadBalancer';
