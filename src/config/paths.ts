import path from 'node:path';

export const CONFIG_FILE_NAME = 'pathwise.yaml';

/**
 * Where to look for the config file: an explicit --config wins, then
 * $PATHWISE_CONFIG, then pathwise.yaml at the repository root.
 */
export function resolveConfigPath(root: string, explicit?: string): {path: string; explicit: boolean} {
  if (explicit) return {path: path.resolve(root, explicit), explicit: true};
  const fromEnv = process.env.PATHWISE_CONFIG;
  if (fromEnv) return {path: path.resolve(root, fromEnv), explicit: true};
  return {path: path.join(root, CONFIG_FILE_NAME), explicit: false};
}

export function resolveRoot(root?: string): string {
  return path.resolve(root ?? process.cwd());
}
