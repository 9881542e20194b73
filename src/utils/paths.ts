/**
 * Repository-relative path helpers.
 *
 * All paths handled by the resolver and the registry are POSIX style,
 * relative to the repository root, without leading './' or '/'.
 */

/**
 * Normalize a repository-relative path: backslashes become slashes, leading
 * './' and '/' are dropped, repeated slashes collapse and '.' segments go.
 * A trailing slash is preserved.
 */
export function normalizePath(input: string): string {
  const unified = input.trim().replace(/\\/g, "/");
  const trailing = unified.endsWith("/");
  const segments = unified.split("/").filter((s) => s !== "" && s !== ".");
  if (segments.length === 0) return "";
  const joined = segments.join("/");
  return trailing ? `${joined}/` : joined;
}

/**
 * True for a path that can leave the directory it is taken relative to:
 * absolute paths and any path with a '..' segment.
 */
export function escapesRoot(input: string): boolean {
  const unified = input.trim().replace(/\\/g, "/");
  if (unified.startsWith("/") || /^[A-Za-z]:/.test(unified)) return true;
  return unified.split("/").includes("..");
}

/**
 * Normalize a directory path so it always ends with exactly one '/'.
 */
export function toDirectory(input: string): string {
  const p = normalizePath(input);
  if (p === "") return "";
  return p.endsWith("/") ? p : `${p}/`;
}

export function segments(path: string): string[] {
  return normalizePath(path).split("/").filter(Boolean);
}

/**
 * Segment-aware prefix test: 'dev/demo-app/' owns 'dev/demo-app/x.yaml' and
 * 'dev/demo-app' itself, never 'dev/demo-app-extra/x.yaml'.
 */
export function isWithin(directory: string, path: string): boolean {
  const dir = segments(directory);
  const target = segments(path);
  if (dir.length === 0 || dir.length > target.length) return false;
  return dir.every((seg, i) => seg === target[i]);
}

/**
 * Two directories overlap when either one contains the other.
 */
export function overlaps(a: string, b: string): boolean {
  return isWithin(a, b) || isWithin(b, a);
}

export function joinPath(...parts: string[]): string {
  return normalizePath(parts.filter((p) => p !== "").join("/"));
}
