import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import * as path from 'path';
import type { FetchLike } from '../src/utils/http';
import type { LogContext, Logger, LogLevel } from '../src/utils/logger';

export const FIXTURES_DIR = path.join(__dirname, 'fixtures');

export function fixture(name: string): string {
  return readFileSync(path.join(FIXTURES_DIR, name), 'utf8');
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context?: LogContext;
}

/** Logger that records every call instead of printing it. */
export class CapturingLogger implements Logger {
  readonly entries: LogEntry[] = [];

  debug(message: string, context?: LogContext): void {
    this.entries.push({ level: 'debug', message, context });
  }

  info(message: string, context?: LogContext): void {
    this.entries.push({ level: 'info', message, context });
  }

  warn(message: string, context?: LogContext): void {
    this.entries.push({ level: 'warn', message, context });
  }

  error(message: string, context?: LogContext): void {
    this.entries.push({ level: 'error', message, context });
  }

  messages(level: LogLevel): string[] {
    return this.entries.filter(entry => entry.level === level).map(entry => entry.message);
  }
}

export interface FakeRoute {
  match: (url: string) => boolean;
  status?: number;
  body: string;
}

/**
 * In-process stand-in for fetch. Each request is answered by the first route
 * whose matcher accepts the URL; unmatched URLs reject like a network error.
 */
export function fakeFetch(routes: FakeRoute[]): { fetchImpl: FetchLike; calls: string[] } {
  const calls: string[] = [];
  const fetchImpl: FetchLike = async (url) => {
    calls.push(url);
    const route = routes.find(candidate => candidate.match(url));
    if (!route) {
      throw new TypeError(`fetch failed: no route for ${url}`);
    }
    return new Response(route.body, { status: route.status ?? 200 });
  };
  return { fetchImpl, calls };
}

export function makeTempDir(): string {
  return mkdtempSync(path.join(tmpdir(), 'variant-annotator-'));
}

export function removeTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

export function writeFile(dir: string, name: string, content: string): string {
  const filePath = path.join(dir, name);
  writeFileSync(filePath, content);
  return filePath;
}
