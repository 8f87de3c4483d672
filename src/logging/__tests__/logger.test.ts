import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';

import { Logger, JsonTransport, FileTransport, createLogger, isLogLevel, type LogEntry } from '../logger.js';

function capture(level: LogEntry['level'] = 'debug'): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = new Logger({ level, transports: [{ write: (entry) => entries.push(entry) }] });
  return { logger, entries };
}

describe('Logger', () => {
  it('drops entries below its level', () => {
    const { logger, entries } = capture('warn');
    logger.info('ignored');
    logger.warn('kept');
    expect(entries.map((e) => e.message)).toEqual(['kept']);
  });

  it('records data and error details', () => {
    const { logger, entries } = capture();
    logger.error('failed', { id: 7 }, new TypeError('bad type'));
    expect(entries[0]).toMatchObject({
      level: 'error',
      message: 'failed',
      data: { id: 7 },
      error: { name: 'TypeError', message: 'bad type' },
    });
  });

  it('describes non-Error throwables', () => {
    const { logger, entries } = capture();
    logger.warn('odd', undefined, 'plain string');
    expect(entries[0].error).toEqual({ name: 'NonError', message: 'plain string' });
  });

  it('joins nested child components', () => {
    const { logger, entries } = capture();
    logger.child('runtime').child('hooks').info('hello');
    expect(entries[0].component).toBe('runtime:hooks');
  });

  it('changes level at runtime', () => {
    const { logger, entries } = capture('info');
    logger.setLevel('error');
    expect(logger.getLevel()).toBe('error');
    logger.warn('ignored');
    expect(entries).toHaveLength(0);
  });

  it('keeps logging when a transport throws', () => {
    const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const entries: LogEntry[] = [];
    const logger = new Logger({
      transports: [
        {
          write: () => {
            throw new Error('disk full');
          },
        },
        { write: (entry) => entries.push(entry) },
      ],
    });
    logger.info('still here');
    expect(entries).toHaveLength(1);
    expect(stderr).toHaveBeenCalledWith('[logger] transport failed: Error: disk full\n');
    stderr.mockRestore();
  });
});

describe('isLogLevel', () => {
  it('accepts known levels only', () => {
    expect(isLogLevel('fatal')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});

describe('file transports', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cuemark-log-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('JsonTransport writes one JSON object per line', () => {
    const file = path.join(dir, 'nested', 'log.jsonl');
    const logger = new Logger({ transports: [new JsonTransport({ filePath: file })], component: 'test' });
    logger.info('first');
    logger.info('second', { n: 2 });

    const lines = fs.readFileSync(file, 'utf-8').trim().split('\n');
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[1])).toMatchObject({ level: 'info', message: 'second', component: 'test', data: { n: 2 } });
  });

  it('FileTransport writes plain lines', () => {
    const file = path.join(dir, 'log.txt');
    const logger = new Logger({ transports: [new FileTransport({ filePath: file })], component: 'hooks' });
    logger.warn('slow', { ms: 5 });

    const line = fs.readFileSync(file, 'utf-8').trim();
    expect(line).toMatch(/^\[[^\]]+\] \[WARN\] \[hooks\] slow \{"ms":5\}$/);
  });

  it('createLogger adds a file transport matching the format', () => {
    vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const file = path.join(dir, 'app.jsonl');
    const logger = createLogger({ level: 'warn', format: 'json', file }, 'cuemark');
    logger.info('ignored');
    logger.warn('written');

    expect(logger.getLevel()).toBe('warn');
    const entry: unknown = JSON.parse(fs.readFileSync(file, 'utf-8').trim());
    expect(entry).toMatchObject({ level: 'warn', message: 'written', component: 'cuemark' });
  });
});

describe('createLogger console format', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes JSON lines to stdout when the format is json and no file is set', () => {
    const stdout = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const logger = createLogger({ level: 'info', format: 'json' }, 'cuemark');
    logger.info('hello', { n: 1 });

    expect(stdout).toHaveBeenCalledTimes(1);
    const entry: unknown = JSON.parse(String(stdout.mock.calls[0][0]));
    expect(entry).toMatchObject({ level: 'info', message: 'hello', component: 'cuemark', data: { n: 1 } });
  });

  it('sends json error entries to stderr', () => {
    vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    createLogger({ level: 'info', format: 'json' }).error('broke');

    const entry: unknown = JSON.parse(String(stderr.mock.calls[0][0]));
    expect(entry).toMatchObject({ level: 'error', message: 'broke' });
  });

  it('writes readable lines when the format is pretty', () => {
    const stdout = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    createLogger({ level: 'info', format: 'pretty' }).info('hello');

    const line = String(stdout.mock.calls[0][0]);
    expect(line.endsWith('hello\n')).toBe(true);
    expect(line.startsWith('{')).toBe(false);
  });
});
