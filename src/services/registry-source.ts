import { type Dirent, promises as fs } from "node:fs";
import path from "node:path";
import { errAsync, okAsync, ResultAsync } from "neverthrow";
import { errorCode, errorMessage } from "../utils/error-fields.js";
import { normalizePath, segments } from "../utils/paths.js";
import type { SourceError } from "./errors.js";

/**
 * Read-only view of a GitOps repository. Paths are repository-relative.
 */
export interface RegistrySource {
  /** Entry names directly under a directory; empty when it does not exist */
  list(dir: string): ResultAsync<DirEntry[], SourceError>;
  readText(file: string): ResultAsync<string, SourceError>;
  isFile(file: string): Promise<boolean>;
  isDirectory(dir: string): Promise<boolean>;
}

export type DirEntry = { name: string; directory: boolean };

export class FsRegistrySource implements RegistrySource {
  constructor(private readonly root: string) {}

  private abs(relative: string): string {
    return path.join(this.root, ...segments(relative));
  }

  list(dir: string): ResultAsync<DirEntry[], SourceError> {
    return ResultAsync.fromPromise(
      fs.readdir(this.abs(dir), { withFileTypes: true }).catch((error: unknown): Dirent[] => {
        const code = errorCode(error);
        if (code === "ENOENT" || code === "ENOTDIR") return [];
        throw error;
      }),
      (error) => ({ type: "source-failed" as const, path: dir, message: errorMessage(error) }),
    ).map((entries) =>
      entries
        .map((e) => ({ name: e.name, directory: e.isDirectory() }))
        .sort((a, b) => a.name.localeCompare(b.name)),
    );
  }

  readText(file: string): ResultAsync<string, SourceError> {
    return ResultAsync.fromPromise(
      fs.readFile(this.abs(file), "utf8"),
      (error) => ({ type: "source-failed" as const, path: file, message: errorMessage(error) }),
    );
  }

  async isFile(file: string): Promise<boolean> {
    try {
      return (await fs.stat(this.abs(file))).isFile();
    } catch {
      return false;
    }
  }

  async isDirectory(dir: string): Promise<boolean> {
    try {
      return (await fs.stat(this.abs(dir))).isDirectory();
    } catch {
      return false;
    }
  }
}

/**
 * In-memory repository keyed by repository-relative file path. Directories
 * exist implicitly through the files below them.
 */
export class MemoryRegistrySource implements RegistrySource {
  private readonly files: Map<string, string>;

  constructor(files: Record<string, string> = {}) {
    this.files = new Map(
      Object.entries(files).map(([p, content]) => [normalizePath(p), content]),
    );
  }

  list(dir: string): ResultAsync<DirEntry[], SourceError> {
    const prefix = segments(dir);
    const found = new Map<string, boolean>();
    for (const file of this.files.keys()) {
      const parts = segments(file);
      if (parts.length <= prefix.length) continue;
      if (!prefix.every((seg, i) => parts[i] === seg)) continue;
      const name = parts[prefix.length];
      const directory = parts.length > prefix.length + 1;
      found.set(name, (found.get(name) ?? false) || directory);
    }
    const entries = Array.from(found, ([name, directory]) => ({ name, directory }));
    return okAsync(entries.sort((a, b) => a.name.localeCompare(b.name)));
  }

  readText(file: string): ResultAsync<string, SourceError> {
    const content = this.files.get(normalizePath(file));
    if (content === undefined) {
      return errAsync({ type: "source-failed", path: file, message: "no such file" });
    }
    return okAsync(content);
  }

  async isFile(file: string): Promise<boolean> {
    return this.files.has(normalizePath(file));
  }

  async isDirectory(dir: string): Promise<boolean> {
    const prefix = segments(dir);
    if (prefix.length === 0) return true;
    for (const file of this.files.keys()) {
      const parts = segments(file);
      if (parts.length > prefix.length && prefix.every((seg, i) => parts[i] === seg)) {
        return true;
      }
    }
    return false;
  }
}

/**
 * Layer extra files over another source, e.g. a scaffold plan over the
 * repository it will be written into.
 */
export class OverlayRegistrySource implements RegistrySource {
  private readonly overlay: MemoryRegistrySource;

  constructor(private readonly base: RegistrySource, files: Record<string, string>) {
    this.overlay = new MemoryRegistrySource(files);
  }

  list(dir: string): ResultAsync<DirEntry[], SourceError> {
    return ResultAsync.combine([this.base.list(dir), this.overlay.list(dir)]).map(
      ([base, extra]) => {
        const merged = new Map<string, boolean>();
        for (const e of [...base, ...extra]) {
          merged.set(e.name, (merged.get(e.name) ?? false) || e.directory);
        }
        return Array.from(merged, ([name, directory]) => ({ name, directory })).sort(
          (a, b) => a.name.localeCompare(b.name),
        );
      },
    );
  }

  readText(file: string): ResultAsync<string, SourceError> {
    return this.overlay.readText(file).orElse(() => this.base.readText(file));
  }

  async isFile(file: string): Promise<boolean> {
    return (await this.overlay.isFile(file)) || this.base.isFile(file);
  }

  async isDirectory(dir: string): Promise<boolean> {
    return (await this.overlay.isDirectory(dir)) || this.base.isDirectory(dir);
  }
}
