import { readFileSync } from 'node:fs';

let cached: string | undefined;

/**
 * Version from the package.json next to the sources (or to dist/)
 */
export function getVersion(): string {
  if (cached) return cached;
  try {
    const raw: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'));
    const version = typeof raw === 'object' && raw !== null && 'version' in raw ? raw.version : undefined;
    cached = typeof version === 'string' ? version : '0.0.0';
  } catch {
    cached = '0.0.0';
  }
  return cached;
}
