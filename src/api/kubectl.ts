import { err, ok, type Result } from 'neverthrow';
import type { ArgoApplication } from '../types/argo.js';
import type { KubectlError } from '../services/errors.js';
import { log } from '../services/logger.js';
import { isArgoApplication } from '../utils/validators.js';
import { execaRunner, sleep, type CommandRunner } from './runner.js';

export type KubectlOptions = {
  argocdNamespace: string;
  context?: string;
  runner?: CommandRunner;
  sleep?: (ms: number) => Promise<void>;
};

export type WaitOptions = {
  timeoutMs?: number;
  intervalMs?: number;
};

export type ApplicationWaitOptions = WaitOptions & {
  // called after every poll that has not found them all yet
  onPoll?: (found: number, total: number) => void;
};

const NOT_INSTALLED = 127;

/**
 * Thin kubectl wrapper for the Argo CD objects and namespaces pathwise reads
 * and changes. Every call honours the configured context.
 */
export class Kubectl {
  private readonly runner: CommandRunner;
  private readonly wait: (ms: number) => Promise<void>;

  constructor(private readonly options: KubectlOptions) {
    this.runner = options.runner ?? execaRunner;
    this.wait = options.sleep ?? sleep;
  }

  private async run(args: string[]): Promise<Result<string, KubectlError>> {
    const full = this.options.context ? ['--context', this.options.context, ...args] : args;
    const command = `kubectl ${args.join(' ')}`;
    log.debug(command, 'kubectl');

    const out = await this.runner('kubectl', full);
    if (out.exitCode === NOT_INSTALLED) {
      return err({ type: 'not-installed', message: 'kubectl is not installed or not in PATH' });
    }
    if (out.exitCode !== 0) {
      log.warn(`${command} exited with ${out.exitCode}`, 'kubectl', { stderr: out.stderr });
      return err({ type: 'command-failed', command, exitCode: out.exitCode, message: out.stderr.trim() || `exit code ${out.exitCode}` });
    }
    return ok(out.stdout);
  }

  /**
   * The live Application object, or `null` when Argo CD does not know it.
   */
  async getApplication(name: string): Promise<Result<ArgoApplication | null, KubectlError>> {
    const args = ['get', 'applications.argoproj.io', name, '-n', this.options.argocdNamespace, '-o', 'json', '--ignore-not-found'];
    const out = await this.run(args);
    if (out.isErr()) return err(out.error);
    if (out.value.trim() === '') return ok(null);

    const command = `kubectl get application ${name}`;
    let parsed: unknown;
    try {
      parsed = JSON.parse(out.value);
    } catch {
      return err({ type: 'parse-failed', command, message: 'output is not JSON' });
    }
    if (!isArgoApplication(parsed)) {
      return err({ type: 'parse-failed', command, message: 'output is not an Application' });
    }
    return ok(parsed);
  }

  async applicationExists(name: string): Promise<Result<boolean, KubectlError>> {
    return (await this.getApplication(name)).map((app) => app !== null);
  }

  async namespaceExists(namespace: string): Promise<Result<boolean, KubectlError>> {
    const out = await this.run(['get', 'namespace', namespace, '--ignore-not-found', '-o', 'name']);
    return out.map((text) => text.trim() !== '');
  }

  /**
   * Number of resources `kubectl get all` reports in a namespace.
   */
  async countResources(namespace: string): Promise<Result<number, KubectlError>> {
    const out = await this.run(['get', 'all', '-n', namespace, '--no-headers', '--ignore-not-found']);
    return out.map((text) => text.split('\n').filter((line) => line.trim() !== '').length);
  }

  /**
   * Ask Argo CD for a sync by writing an operation onto the Application.
   */
  async triggerSync(name: string, opts: { prune?: boolean } = {}): Promise<Result<void, KubectlError>> {
    const patch = {
      operation: {
        initiatedBy: { username: 'pathwise' },
        sync: {
          prune: opts.prune === true,
          syncStrategy: { apply: { force: true } },
        },
      },
    };
    const out = await this.run([
      'patch', 'applications.argoproj.io', name,
      '-n', this.options.argocdNamespace,
      '--type', 'merge',
      '--patch', JSON.stringify(patch),
    ]);
    return out.map(() => undefined);
  }

  /**
   * `kubectl apply -f` one manifest file. Returns kubectl's summary lines.
   */
  async apply(file: string): Promise<Result<string[], KubectlError>> {
    const out = await this.run(['apply', '-f', file]);
    return out.map((text) => text.split('\n').map((line) => line.trim()).filter((line) => line !== ''));
  }

  async deleteApplication(name: string): Promise<Result<void, KubectlError>> {
    const out = await this.run(['delete', 'applications.argoproj.io', name, '-n', this.options.argocdNamespace, '--ignore-not-found']);
    return out.map(() => undefined);
  }

  async deleteNamespace(namespace: string): Promise<Result<void, KubectlError>> {
    const out = await this.run(['delete', 'namespace', namespace, '--ignore-not-found', '--wait=false']);
    return out.map(() => undefined);
  }

  /**
   * Poll until a namespace is gone. Namespaces with finalizers can take a
   * while to terminate.
   */
  async waitForNamespaceGone(namespace: string, opts: WaitOptions = {}): Promise<Result<void, KubectlError>> {
    const timeoutMs = opts.timeoutMs ?? 60_000;
    const intervalMs = opts.intervalMs ?? 2_000;

    for (let waited = 0; ; waited += intervalMs) {
      const exists = await this.namespaceExists(namespace);
      if (exists.isErr()) return err(exists.error);
      if (!exists.value) return ok(undefined);
      if (waited >= timeoutMs) {
        return err({ type: 'timeout', message: `Namespace ${namespace} still terminating after ${Math.round(timeoutMs / 1000)}s` });
      }
      await this.wait(intervalMs);
    }
  }

  /**
   * Poll until Argo CD knows every named application.
   */
  async waitForApplications(names: readonly string[], opts: ApplicationWaitOptions = {}): Promise<Result<void, KubectlError>> {
    const timeoutMs = opts.timeoutMs ?? 150_000;
    const intervalMs = opts.intervalMs ?? 5_000;

    for (let waited = 0; ; waited += intervalMs) {
      let found = 0;
      for (const name of names) {
        const exists = await this.applicationExists(name);
        if (exists.isErr()) return err(exists.error);
        if (exists.value) found++;
      }
      if (found === names.length) return ok(undefined);
      if (waited >= timeoutMs) {
        return err({ type: 'timeout', message: `Found ${found}/${names.length} applications after ${Math.round(timeoutMs / 1000)}s` });
      }
      opts.onPoll?.(found, names.length);
      await this.wait(intervalMs);
    }
  }
}
