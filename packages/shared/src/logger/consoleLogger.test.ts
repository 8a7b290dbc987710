import { ConsoleLogger } from './consoleLogger';
import type { ScanStarted } from '../types/events';

describe('ConsoleLogger', () => {
  const event: ScanStarted = {
    schemaVersion: 1,
    timestamp: '2026-02-18T00:00:00.000Z',
    runId: 'scan-1',
    type: 'ScanStarted',
    payload: { rootDir: '/work/demo', maxTokens: 100, isTokenCalculation: false },
  };

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('logs events as JSON at debug level', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    const logger = new ConsoleLogger({ level: 'debug' });

    logger.log(event);
    expect(logSpy).toHaveBeenCalledWith(JSON.stringify(event));
  });

  it('keeps structured events quiet at the default level', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});

    const logger = new ConsoleLogger();
    logger.log(event);
    logger.debug('d');

    expect(logSpy).not.toHaveBeenCalled();
    expect(debugSpy).not.toHaveBeenCalled();
  });

  it('writes debug/info/warn and handles error branches', () => {
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    const logger = new ConsoleLogger({ level: 'debug' });

    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error(new Error('boom'));
    logger.error(new Error('boom'), 'msg');

    expect(debugSpy).toHaveBeenCalledWith('d');
    expect(infoSpy).toHaveBeenCalledWith('i');
    expect(warnSpy).toHaveBeenCalledWith('w');
    expect(errorSpy).toHaveBeenCalledWith(expect.any(Error));
    expect(errorSpy).toHaveBeenCalledWith('msg', expect.any(Error));
  });

  it('drops messages below the warn threshold', () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const logger = new ConsoleLogger({ level: 'warn' });
    logger.info('hidden');
    logger.warn('shown');

    expect(infoSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledWith('shown');
  });

  it('scopes child loggers with prefixes and merges bindings', () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const logger = new ConsoleLogger();
    logger.child({}).info('no-prefix');
    expect(infoSpy).toHaveBeenCalledWith('no-prefix');

    logger.child({ a: 1 }).child({ b: 'x' }).info('hello');
    expect(infoSpy).toHaveBeenCalledWith('[a=1 b=x] hello');

    logger.child({ project: 'demo' }).warn('warn');
    expect(warnSpy).toHaveBeenCalledWith('[project=demo] warn');
  });
});
