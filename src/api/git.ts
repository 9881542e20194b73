import { err, ok, type Result } from 'neverthrow';
import type { GitError } from '../services/errors.js';
import { log } from '../services/logger.js';
import { execaRunner, type CommandRunner } from './runner.js';

export type GitOptions = {
  cwd: string;
  runner?: CommandRunner;
};

export class Git {
  private readonly runner: CommandRunner;

  constructor(private readonly options: GitOptions) {
    this.runner = options.runner ?? execaRunner;
  }

  /**
   * Files changed on `head` since it diverged from `base`.
   */
  async changedFiles(base: string, head = 'HEAD'): Promise<Result<string[], GitError>> {
    const range = `${base}...${head}`;
    const out = await this.runner('git', ['diff', '--name-only', range], { cwd: this.options.cwd });
    if (out.exitCode === 127) {
      return err({ type: 'git-failed', message: 'git is not installed or not in PATH' });
    }
    if (out.exitCode !== 0) {
      return err({ type: 'git-failed', message: `git diff ${range}: ${out.stderr.trim() || `exit code ${out.exitCode}`}` });
    }
    const files = out.stdout.split('\n').map((line) => line.trim()).filter((line) => line !== '');
    log.debug(`git diff ${range}`, 'git', { files: files.length });
    return ok(files);
  }
}
