import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Logger, LogLevel, parseLogLevel, readLogTail } from '../src/common/logger';

describe('parseLogLevel', () => {
  it.each([
    ['debug', LogLevel.DEBUG],
    ['INFO', LogLevel.INFO],
    ['warning', LogLevel.WARN],
    [' Error ', LogLevel.ERROR],
    ['CRITICAL', LogLevel.CRITICAL]
  ])('reads %p', (name, level) => {
    expect(parseLogLevel(name)).toBe(level);
  });

  it('falls back for unknown names', () => {
    expect(parseLogLevel('verbose')).toBe(LogLevel.INFO);
    expect(parseLogLevel('verbose', LogLevel.WARN)).toBe(LogLevel.WARN);
  });
});

describe('Logger', () => {
  let dir: string;
  let logFile: string;
  let out: jest.SpyInstance;
  let err: jest.SpyInstance;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'kiosk-logger-'));
    logFile = path.join(dir, 'logs', 'monitor.log');
    out = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    err = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    out.mockRestore();
    err.mockRestore();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('writes formatted lines to the file and skips levels below the minimum', () => {
    const logger = new Logger('monitor', logFile, LogLevel.INFO);

    logger.debug('hidden');
    logger.info('App started');

    const lines = readLogTail(logFile, 10);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[INFO\] \[monitor\] App started$/);
  });

  it('sends warnings and above to stderr', () => {
    const logger = new Logger('monitor', null, LogLevel.DEBUG);

    logger.info('fine');
    logger.warn('careful');

    expect(out).toHaveBeenCalledTimes(1);
    expect(err).toHaveBeenCalledTimes(1);
    expect(String(err.mock.calls[0][0])).toContain('[WARN] [monitor] careful');
  });

  it('prefixes child components and shares the file', () => {
    const logger = new Logger('monitor', logFile, LogLevel.INFO);

    logger.child('adb').info('Connected');

    expect(readLogTail(logFile, 1)[0]).toContain('[monitor:adb] Connected');
  });

  it('appends data and error messages', () => {
    const logger = new Logger('monitor', logFile, LogLevel.INFO);

    logger.error('Fix failed', new Error('device gone'), { kind: 'app_crash' });

    const content = fs.readFileSync(logFile, 'utf-8');
    expect(content).toContain('"kind": "app_crash"');
    expect(content).toContain('  Error: device gone');
  });

  it('returns the last lines of its file', () => {
    const logger = new Logger('monitor', logFile, LogLevel.INFO);
    ['one', 'two', 'three'].forEach(message => logger.info(message));

    const recent = logger.getRecentLogs(2);
    expect(recent).toHaveLength(2);
    expect(recent[1]).toContain('three');
  });

  it('reads nothing without a file', () => {
    expect(readLogTail(null, 5)).toEqual([]);
    expect(readLogTail(path.join(dir, 'absent.log'), 5)).toEqual([]);
  });
});
