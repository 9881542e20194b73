import { execa } from 'execa';
import { errorCode, errorMessage, numberField, stringField } from '../utils/error-fields.js';

export type CommandOutput = {
  stdout: string;
  stderr: string;
  exitCode: number;
};

/**
 * Runs an external program and reports how it exited. Never rejects for a
 * non-zero exit; callers decide what a failure means.
 */
export type CommandRunner = (file: string, args: readonly string[], options?: { cwd?: string }) => Promise<CommandOutput>;

export const execaRunner: CommandRunner = async (file, args, options) => {
  try {
    const { stdout, stderr } = await execa(file, [...args], { cwd: options?.cwd });
    return { stdout, stderr, exitCode: 0 };
  } catch (error: unknown) {
    if (errorCode(error) === 'ENOENT') {
      return { stdout: '', stderr: `${file}: command not found`, exitCode: 127 };
    }
    return {
      stdout: stringField(error, 'stdout'),
      stderr: stringField(error, 'stderr') || errorMessage(error),
      exitCode: numberField(error, 'exitCode') ?? 1,
    };
  }
};

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));
