import { segments } from "./paths.js";

export const ENVIRONMENT_LABEL = "pathwise.io/environment";
export const TIER_LABEL = "pathwise.io/tier";

export function applicationName(environment: string, service: string): string {
  return `${environment}-${service}`;
}

/**
 * Derive environment and service from a source directory:
 * 'environments/dev/demo-app/' and 'dev/demo-app/' both give dev + demo-app.
 * Paths with a single segment have no environment.
 */
export function identityFromSourcePath(
  sourcePath: string,
): { environment?: string; service: string } | null {
  const parts = segments(sourcePath);
  if (parts.length === 0) return null;
  const service = parts[parts.length - 1];
  const environment = parts.length >= 2 ? parts[parts.length - 2] : undefined;
  return { environment, service };
}

/**
 * Hook Job name; production hooks validate more and carry a distinct name.
 */
export function hookJobName(appName: string, production: boolean): string {
  return production ? `${appName}-validation` : `${appName}-post-sync`;
}
