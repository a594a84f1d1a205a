import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { getLogFilePath, initLogger, logDebug, logError, logInfo, logWarn, shutdownLogger } from '../src/main/logger';
import { makeTempDir, removeDir } from './helpers';

const LINE = /^\[\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\] /;

describe('logger', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    shutdownLogger();
    removeDir(dir);
  });

  function readLines(): string[] {
    return fs.readFileSync(getLogFilePath(), 'utf8').trimEnd().split('\n');
  }

  it('writes nothing before initialization', () => {
    logInfo('EARLY', 'too early');
    expect(getLogFilePath()).toBe('');
  });

  it('appends formatted lines to credvault.log', () => {
    const logDir = path.join(dir, 'logs');
    initLogger({ logDir, level: 'info' });
    logInfo('TEST_INFO', 'hello', { count: 2 });
    logWarn('TEST_WARN', 'careful');

    expect(getLogFilePath()).toBe(path.join(logDir, 'credvault.log'));
    const lines = readLines();
    expect(lines).toHaveLength(3);
    expect(lines[0]).toMatch(LINE);
    expect(lines[0].replace(LINE, '')).toBe(`[INFO] LOGGER_INIT logger initialized ${JSON.stringify({ logFilePath: getLogFilePath() })}`);
    expect(lines[1].replace(LINE, '')).toBe('[INFO] TEST_INFO hello {"count":2}');
    expect(lines[2].replace(LINE, '')).toBe('[WARN] TEST_WARN careful');
  });

  it('filters by level', () => {
    initLogger({ logDir: dir, level: 'warn' });
    logDebug('TEST_DEBUG', 'hidden');
    logInfo('TEST_INFO', 'hidden');
    logWarn('TEST_WARN', 'shown');

    expect(readLines().map(l => l.replace(LINE, ''))).toEqual(['[WARN] TEST_WARN shown']);
  });

  it('writes the error after the message line', () => {
    initLogger({ logDir: dir, level: 'error', fileName: 'errors.log' });
    logError('TEST_ERROR', 'failed', new Error('boom'), { id: 7 });

    const lines = readLines();
    expect(lines[0].replace(LINE, '')).toBe('[ERROR] TEST_ERROR failed {"id":7}');
    expect(lines[1]).toBe('Error: boom');
  });
});
