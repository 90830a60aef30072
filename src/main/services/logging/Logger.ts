import fs from 'node:fs';
import path from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  ts: string;
  level: LogLevel;
  message: string;
  meta?: unknown;
}

export interface AppLogger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}

export interface LogReader {
  readonly path: string;
  entries(limit?: number): LogEntry[];
}

interface LoggerOptions {
  mirrorFilePath?: string | null;
  maxBytes?: number;
}

const LOG_FILE_NAME = '3dse.log';
const DEFAULT_MAX_BYTES = 2 * 1024 * 1024;

export class Logger implements AppLogger, LogReader {
  private readonly filePath: string;
  private readonly mirrorFilePath: string | null;
  private readonly maxBytes: number;

  constructor(baseDir: string, options?: LoggerOptions) {
    const logDir = path.join(baseDir, 'logs');
    fs.mkdirSync(logDir, { recursive: true });
    this.filePath = path.join(logDir, LOG_FILE_NAME);
    this.maxBytes = normalizeMaxBytes(options?.maxBytes);
    this.mirrorFilePath = normalizeMirrorPath(options?.mirrorFilePath);
    if (this.mirrorFilePath) {
      fs.mkdirSync(path.dirname(this.mirrorFilePath), { recursive: true });
    }
  }

  get path(): string {
    return this.filePath;
  }

  debug(message: string, meta?: unknown): void {
    this.write('debug', message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.write('info', message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.write('warn', message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.write('error', message, meta);
  }

  entries(limit?: number): LogEntry[] {
    const files = [`${this.filePath}.1`, this.filePath];
    const entries: LogEntry[] = [];

    for (const file of files) {
      if (!fs.existsSync(file)) {
        continue;
      }

      const lines = fs.readFileSync(file, 'utf-8').split('\n');
      for (const raw of lines) {
        const line = raw.trim();
        if (line) {
          entries.push(parseLogLine(line));
        }
      }
    }

    if (typeof limit !== 'number' || !Number.isFinite(limit) || limit <= 0 || entries.length <= limit) {
      return entries;
    }

    return entries.slice(-Math.trunc(limit));
  }

  private write(level: LogLevel, message: string, meta?: unknown): void {
    const line = JSON.stringify({
      ts: new Date().toISOString(),
      level,
      message,
      meta
    });

    this.rotateIfNeeded();
    fs.appendFileSync(this.filePath, `${line}\n`);
    if (this.mirrorFilePath) {
      try {
        fs.appendFileSync(this.mirrorFilePath, `${line}\n`);
      } catch {
        // espelho de debug e opcional; o arquivo principal ja recebeu a linha
      }
    }
  }

  private rotateIfNeeded(): void {
    if (!fs.existsSync(this.filePath)) {
      return;
    }

    if (fs.statSync(this.filePath).size < this.maxBytes) {
      return;
    }

    const rotated = `${this.filePath}.1`;
    fs.rmSync(rotated, { force: true });
    fs.renameSync(this.filePath, rotated);
  }
}

function parseLogLine(line: string): LogEntry {
  try {
    const parsed: unknown = JSON.parse(line);
    if (!isRecord(parsed)) {
      return fallbackEntry(line);
    }

    return {
      ts: typeof parsed.ts === 'string' ? parsed.ts : new Date().toISOString(),
      level: isLogLevel(parsed.level) ? parsed.level : 'info',
      message: typeof parsed.message === 'string' ? parsed.message : line,
      meta: parsed.meta
    };
  } catch {
    return fallbackEntry(line);
  }
}

function fallbackEntry(line: string): LogEntry {
  return {
    ts: new Date().toISOString(),
    level: 'info',
    message: line
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isLogLevel(value: unknown): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

function normalizeMaxBytes(value: number | undefined): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    return DEFAULT_MAX_BYTES;
  }

  return Math.trunc(value);
}

function normalizeMirrorPath(value: string | null | undefined): string | null {
  if (typeof value !== 'string') {
    return null;
  }
  const normalized = value.trim();
  return normalized ? normalized : null;
}
