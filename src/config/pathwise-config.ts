import fs from 'node:fs/promises';
import YAML from 'yaml';
import { err, ok, ResultAsync, type Result } from 'neverthrow';
import type { PathwiseConfig } from '../types/pathwise.js';
import type { ConfigError } from '../services/errors.js';
import { isRecord } from '../utils/validators.js';
import { errorCode, errorMessage } from '../utils/error-fields.js';

export function createDefaultConfig(): PathwiseConfig {
  return {
    version: 1,
    appsDir: '.argocd',
    environmentsDir: '',
    requiredManifests: ['deployment.yaml', 'service.yaml'],
    argocdNamespace: 'argocd',
    services: ['demo-app', 'api-service'],
    hookImage: 'curlimages/curl:8.5.0',
  };
}

function stringList(value: unknown): string[] | null {
  if (!Array.isArray(value)) return null;
  const out: string[] = [];
  for (const v of value) {
    if (typeof v !== 'string' || v.trim() === '') return null;
    out.push(v);
  }
  return out;
}

/**
 * Merge a parsed config document over the defaults, rejecting wrongly typed
 * keys. Unknown keys are ignored.
 */
export function parsePathwiseConfig(raw: unknown, path: string): Result<PathwiseConfig, ConfigError> {
  const invalid = (message: string, key?: string): Result<never, ConfigError> =>
    err({ type: 'config-invalid', path, key, message });

  const config = createDefaultConfig();
  if (raw === null || raw === undefined) return ok(config);
  if (!isRecord(raw)) return invalid('expected a mapping at the top level');

  // Validate version
  if (raw.version !== 1) return invalid(`unsupported version ${String(raw.version)}`, 'version');

  for (const key of ['appsDir', 'environmentsDir', 'argocdNamespace', 'kubeContext', 'repoURL', 'hookImage'] as const) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value !== 'string') return invalid('expected a string', key);
    config[key] = value;
  }
  if (config.appsDir.trim() === '') return invalid('must not be empty', 'appsDir');

  for (const key of ['requiredManifests', 'services'] as const) {
    const value = raw[key];
    if (value === undefined) continue;
    const list = stringList(value);
    if (!list) return invalid('expected a list of non-empty strings', key);
    config[key] = list;
  }

  return ok(config);
}

function isMissingFile(error: unknown): boolean {
  return errorCode(error) === 'ENOENT';
}

/**
 * Read the config file. A missing file means defaults unless the path was
 * given explicitly.
 */
export function readPathwiseConfig(path: string, explicit = false): ResultAsync<PathwiseConfig, ConfigError> {
  return ResultAsync.fromPromise(
    fs.readFile(path, 'utf8').catch((error: unknown): null => {
      if (isMissingFile(error) && !explicit) return null;
      throw error;
    }),
    (error): ConfigError => ({
      type: 'config-invalid',
      path,
      message: isMissingFile(error) ? 'file not found' : errorMessage(error),
    }),
  ).andThen((txt): Result<PathwiseConfig, ConfigError> => {
    if (txt === null) return ok(createDefaultConfig());
    let parsed: unknown;
    try {
      parsed = YAML.parse(txt);
    } catch (error) {
      return err({
        type: 'config-invalid',
        path,
        message: errorMessage(error),
      });
    }
    return parsePathwiseConfig(parsed, path);
  });
}
