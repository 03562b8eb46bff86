/**
 * Session Log
 * Levelled lines written to `<dataDir>/debug-logs/session-<id>.log`, with `latest` pointing at
 * the current session. Off until a run asks for it; warn and error lines are echoed to the console.
 *
 * Scoped loggers carry a prefix and bound context, so the engine can log once per tick with
 * `log.with({ tick })` instead of repeating the tick in every call.
 */

import { createWriteStream, type WriteStream } from 'fs';
import { lstat, mkdir, readdir, rm, stat, symlink, unlink } from 'fs/promises';
import { homedir } from 'os';
import { join } from 'path';
import type { LogLevel } from '@colonysim/types';

export type LogContext = Record<string, unknown>;

export interface LoggerConfig {
  level: LogLevel;
  logDir?: string;
  /** Sessions older than this are deleted when a new one opens. */
  retentionDays?: number;
  sessionId?: string;
  enabled?: boolean;
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const DAY_MS = 24 * 60 * 60 * 1000;

const defaultLogDir = () => join(homedir(), '.colonysim', 'debug-logs');

function newSessionId(): string {
  const stamp = new Date().toISOString().replace(/[:.]/g, '-').slice(0, 19);
  return `${stamp}-${Math.random().toString(36).slice(2, 8)}`;
}

// ---------------------------------------------------------------------------
// Logger
// ---------------------------------------------------------------------------

export class Logger {
  private threshold: number;
  private logDir: string;
  private retentionDays: number;
  private sessionFile: string;
  private enabled: boolean;
  private stream: WriteStream | null = null;
  private opened = false;

  constructor(config: LoggerConfig) {
    this.threshold = SEVERITY[config.level];
    this.logDir = config.logDir ?? defaultLogDir();
    this.retentionDays = config.retentionDays ?? 7;
    this.sessionFile = join(this.logDir, `session-${config.sessionId ?? newSessionId()}.log`);
    this.enabled = config.enabled ?? true;
  }

  async open(): Promise<void> {
    if (this.opened || !this.enabled) return;
    this.opened = true;

    await mkdir(this.logDir, { recursive: true });

    const stream = createWriteStream(this.sessionFile, { flags: 'a' });
    stream.on('error', (err) => this.detach(stream, err));
    this.stream = stream;

    await this.linkLatest();
    await this.pruneSessions();
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this.enabled && SEVERITY[level] >= this.threshold;
  }

  child(scope: string, context: LogContext = {}): ScopedLogger {
    return new ScopedLogger(this, scope, context);
  }

  record(level: LogLevel, scope: string, message: string, context: LogContext): void {
    if (!this.isLevelEnabled(level)) return;

    const data = Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : '';
    const line = `[${new Date().toISOString()}] ${level.toUpperCase().padEnd(5)} [${scope}] ${message}${data}`;

    if (level === 'warn') {
      console.warn(line);
    } else if (level === 'error') {
      console.error(line);
    }
    this.stream?.write(line + '\n');
  }

  /** Flush and release the session file. Resolves once the stream has closed. */
  async close(): Promise<void> {
    const stream = this.stream;
    if (!stream) return;
    this.stream = null;
    await new Promise<void>((resolve) => {
      stream.once('close', () => resolve());
      stream.end();
    });
  }

  /** A session file that cannot be written turns file output off; the run carries on. */
  private detach(stream: WriteStream, err: Error): void {
    if (this.stream !== stream) return;
    this.stream = null;
    console.warn(`Debug log disabled, cannot write ${this.sessionFile}: ${err.message}`);
  }

  private async linkLatest(): Promise<void> {
    const latest = join(this.logDir, 'latest');

    const existing = await lstat(latest).catch(() => null);
    if (existing?.isSymbolicLink()) await rm(latest);

    await symlink(this.sessionFile, latest).catch((err: unknown) => {
      console.warn(`Could not link latest log: ${err instanceof Error ? err.message : String(err)}`);
    });
  }

  private async pruneSessions(): Promise<void> {
    const cutoff = Date.now() - this.retentionDays * DAY_MS;

    for (const file of await readdir(this.logDir)) {
      if (!file.startsWith('session-') || !file.endsWith('.log')) continue;
      const path = join(this.logDir, file);
      if (path === this.sessionFile) continue;

      const info = await stat(path).catch(() => null);
      if (info && info.mtime.getTime() < cutoff) await unlink(path);
    }
  }
}

// ---------------------------------------------------------------------------
// Scoped Logger
// ---------------------------------------------------------------------------

export class ScopedLogger {
  constructor(
    private readonly logger: Logger,
    private readonly scope: string,
    private readonly context: LogContext,
  ) {}

  debug(message: string, data?: LogContext): void {
    this.logger.record('debug', this.scope, message, { ...this.context, ...data });
  }

  info(message: string, data?: LogContext): void {
    this.logger.record('info', this.scope, message, { ...this.context, ...data });
  }

  warn(message: string, data?: LogContext): void {
    this.logger.record('warn', this.scope, message, { ...this.context, ...data });
  }

  error(message: string, data?: LogContext): void {
    this.logger.record('error', this.scope, message, { ...this.context, ...data });
  }

  /** Same scope, with more fields bound to every line. */
  with(context: LogContext): ScopedLogger {
    return new ScopedLogger(this.logger, this.scope, { ...this.context, ...context });
  }

  child(scope: string): ScopedLogger {
    return new ScopedLogger(this.logger, `${this.scope}:${scope}`, this.context);
  }
}

// ---------------------------------------------------------------------------
// Process-wide Logger
// ---------------------------------------------------------------------------

let current: Logger | null = null;

export function getLogger(): Logger {
  if (!current) {
    current = new Logger({ level: 'info', enabled: false });
  }
  return current;
}

export interface InitLoggerOptions {
  level?: LogLevel;
  dataDir?: string;
  sessionId?: string;
}

export async function initLogger(options: InitLoggerOptions = {}): Promise<Logger> {
  await current?.close();

  current = new Logger({
    level: options.level ?? 'info',
    logDir: options.dataDir ? join(options.dataDir, 'debug-logs') : defaultLogDir(),
    sessionId: options.sessionId,
  });
  await current.open();
  return current;
}

/** Close the session file and fall back to the disabled logger. */
export async function closeLogger(): Promise<void> {
  const logger = current;
  current = null;
  await logger?.close();
}
