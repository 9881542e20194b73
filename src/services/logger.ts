import { promises as fs } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import pino from 'pino';
import { ResultAsync, okAsync } from 'neverthrow';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LoggerError = { message: string };

export const SESSION_PREFIX = 'pathwise-session-';
const KEEP_SESSIONS = 5;

export interface SessionLogOptions {
  sessionId?: string;
  level?: LogLevel;
  directory?: string;
  keepSessions?: number;
}

/**
 * One pathwise run, logged as JSON lines to
 * `<directory>/pathwise-session-<id>.log`.
 */
export class SessionLog {
  readonly sessionId: string;
  readonly filePath: string;
  private readonly directory: string;
  private readonly pinoLogger: pino.Logger;

  constructor(options: SessionLogOptions = {}) {
    this.sessionId = options.sessionId ?? sessionIdFor(new Date());
    this.directory = options.directory ?? tmpdir();
    this.filePath = join(this.directory, `${SESSION_PREFIX}${this.sessionId}.log`);
    this.pinoLogger = pino(
      {
        level: options.level ?? 'debug',
        base: { session: this.sessionId },
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      pino.destination({ dest: this.filePath, sync: false }),
    );
  }

  write(level: LogLevel, message: string, context?: string, data?: unknown): void {
    this.pinoLogger[level]({ context, data }, message);
  }

  /**
   * Session log files in the log directory, newest first
   */
  sessions(): ResultAsync<string[], LoggerError> {
    return ResultAsync.fromPromise(fs.readdir(this.directory), () => ({
      message: `Failed to read log directory ${this.directory}`,
    })).map((files) =>
      files
        .filter((f) => f.startsWith(SESSION_PREFIX) && f.endsWith('.log'))
        .sort((a, b) => b.localeCompare(a)),
    );
  }

  /**
   * Delete all but the newest `keep` session files
   */
  prune(keep = KEEP_SESSIONS): ResultAsync<string[], LoggerError> {
    return this.sessions().andThen((files) => {
      const stale = files.slice(keep);
      if (stale.length === 0) return okAsync<string[], LoggerError>([]);
      return ResultAsync.combine(
        stale.map((file) =>
          ResultAsync.fromPromise(fs.unlink(join(this.directory, file)), () => ({
            message: `Failed to delete old log file ${file}`,
          })).map(() => file),
        ),
      );
    });
  }

  flush(): ResultAsync<void, LoggerError> {
    return ResultAsync.fromPromise(
      new Promise<void>((resolve, reject) => {
        this.pinoLogger.flush((error) => (error ? reject(error) : resolve()));
      }),
      (error) => ({ message: error instanceof Error ? error.message : 'Failed to flush log' }),
    );
  }
}

// 2024-05-01T10:00:00.000Z -> 2024-05-01-10-00-00-000
function sessionIdFor(date: Date): string {
  return date.toISOString().replace('Z', '').replace(/[T:.]/g, '-');
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

let current: SessionLog | null = null;

/**
 * Open the session log for this run. `$PATHWISE_LOG_LEVEL` sets the level.
 * Old sessions are pruned in the background.
 */
export function initializeLogger(options: SessionLogOptions = {}): ResultAsync<SessionLog, LoggerError> {
  const envLevel = process.env.PATHWISE_LOG_LEVEL;
  const level = options.level ?? (isLogLevel(envLevel) ? envLevel : 'debug');

  return ResultAsync.fromThrowable(
    async () => new SessionLog({ ...options, level }),
    (error) => ({ message: error instanceof Error ? error.message : 'Logger initialization failed' }),
  )().map((session) => {
    current = session;
    void session.prune(options.keepSessions).mapErr((error) => {
      session.write('warn', 'Failed to prune old log sessions', 'logger', error);
    });
    return session;
  });
}

export function getLogger(): SessionLog | null {
  return current;
}

// No-ops until initializeLogger has run
export const log = {
  debug: (message: string, context?: string, data?: unknown) => current?.write('debug', message, context, data),
  info: (message: string, context?: string, data?: unknown) => current?.write('info', message, context, data),
  warn: (message: string, context?: string, data?: unknown) => current?.write('warn', message, context, data),
  error: (message: string, context?: string, data?: unknown) => current?.write('error', message, context, data),
};
