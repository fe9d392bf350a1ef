import crypto from 'crypto';
import fs from 'fs';
import path from 'path';
import { getRuntimeConfig, type LogLevel } from '../config/runtimeConfig';

export interface LogRecord {
  ts: string; // ISO timestamp
  level: LogLevel;
  evt: string; // short event key
  data?: unknown;
}

/** Narrow logging surface every component takes by injection. */
export interface Logger {
  debug(evt: string, data?: unknown): void;
  info(evt: string, data?: unknown): void;
  warn(evt: string, data?: unknown): void;
  error(evt: string, data?: unknown): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
  /** Append-only log file, opened lazily on first write. */
  file?: string;
  /** Defaults to process.stderr; stdout is left to the protocol channel. */
  stream?: NodeJS.WritableStream;
  /** Fixed fields merged into every record's data (e.g. component name). */
  bindings?: Record<string, unknown>;
}

const LEVEL_RANK: Record<LogLevel, number> = { error: 0, warn: 1, info: 2, debug: 3 };

// Simple correlation id helper (one per logical request / tool invocation)
export function newCorrelationId(){ return crypto.randomBytes(8).toString('hex'); }

export function formatRecord(rec: LogRecord, json: boolean): string {
  if(json) return JSON.stringify(rec);
  const parts = [rec.ts, rec.level.toUpperCase(), rec.evt];
  if(rec.data !== undefined) parts.push(JSON.stringify(rec.data));
  return parts.join(' ');
}

class StructuredLogger implements Logger {
  private fileHandle: fs.WriteStream | null = null;
  private fileFailed = false;

  constructor(private readonly opts: Required<Pick<LoggerOptions,'level'|'json'>> & Omit<LoggerOptions,'level'|'json'>){}

  debug(evt: string, data?: unknown){ this.emit('debug', evt, data); }
  info(evt: string, data?: unknown){ this.emit('info', evt, data); }
  warn(evt: string, data?: unknown){ this.emit('warn', evt, data); }
  error(evt: string, data?: unknown){ this.emit('error', evt, data); }

  private emit(level: LogLevel, evt: string, data?: unknown){
    if(LEVEL_RANK[level] > LEVEL_RANK[this.opts.level]) return;
    const merged = this.opts.bindings ? { ...this.opts.bindings, ...(isRecord(data) ? data : data === undefined ? {} : { value: data }) } : data;
    const line = formatRecord({ ts: new Date().toISOString(), level, evt, data: merged }, this.opts.json);
    (this.opts.stream ?? process.stderr).write(line + '\n');
    const handle = this.ensureFile();
    if(handle && !handle.destroyed){
      handle.write(line + '\n');
    }
  }

  private ensureFile(): fs.WriteStream | null {
    const file = this.opts.file;
    if(!file || this.fileFailed) return null;
    if(this.fileHandle) return this.fileHandle;
    try {
      const dir = path.dirname(file);
      if(!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
      this.fileHandle = fs.createWriteStream(file, { flags: 'a', encoding: 'utf8' });
      this.fileHandle.on('error', err => {
        this.fileFailed = true;
        this.fileHandle = null;
        process.stderr.write(`[logger] file logging disabled (${file}): ${err.message}\n`);
      });
      return this.fileHandle;
    } catch(err){
      // Fall back to stderr only if the file cannot be opened
      this.fileFailed = true;
      process.stderr.write(`[logger] Failed to initialize file logging to ${file}: ${err instanceof Error ? err.message : String(err)}\n`);
      return null;
    }
  }
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const cfg = getRuntimeConfig().logging;
  return new StructuredLogger({
    ...options,
    level: options.level ?? cfg.level,
    json: options.json ?? cfg.json,
    file: options.file ?? cfg.file,
  });
}

/** Derive a logger that tags every record with the given fields. */
export function childLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  const wrap = (data: unknown) => ({ ...bindings, ...(isRecord(data) ? data : data === undefined ? {} : { value: data }) });
  return {
    debug: (evt, data) => parent.debug(evt, wrap(data)),
    info: (evt, data) => parent.info(evt, wrap(data)),
    warn: (evt, data) => parent.warn(evt, wrap(data)),
    error: (evt, data) => parent.error(evt, wrap(data)),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/** In-memory logger used by tests and diagnostics. */
export class MemoryLogger implements Logger {
  readonly records: { level: LogLevel; evt: string; data?: unknown }[] = [];
  debug(evt: string, data?: unknown){ this.records.push({ level: 'debug', evt, data }); }
  info(evt: string, data?: unknown){ this.records.push({ level: 'info', evt, data }); }
  warn(evt: string, data?: unknown){ this.records.push({ level: 'warn', evt, data }); }
  error(evt: string, data?: unknown){ this.records.push({ level: 'error', evt, data }); }
  events(level?: LogLevel): string[] {
    return this.records.filter(r => !level || r.level === level).map(r => r.evt);
  }
}
