export type PathwiseConfig = {
  version: 1;
  appsDir: string;
  environmentsDir: string;
  requiredManifests: string[];
  argocdNamespace: string;
  kubeContext?: string;
  repoURL?: string;
  services: string[];
  hookImage: string;
};

// Resolved once per invocation and handed to every command
export type RuntimeSettings = {
  root: string;
  configPath: string | null;
  config: PathwiseConfig;
};
