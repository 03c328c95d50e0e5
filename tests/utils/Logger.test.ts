import winston from 'winston';
import { createLogger } from '../../src/utils/Logger.js';

describe('createLogger', () => {
  it('logs at info to a single console transport by default', () => {
    const logger = createLogger({ env: {} });

    expect(logger.level).toBe('info');
    expect(logger.transports).toHaveLength(1);
    expect(logger.transports[0]).toBeInstanceOf(winston.transports.Console);
  });

  it('sends every level to stderr', () => {
    const logger = createLogger({ env: {} });
    const consoleTransport = logger.transports[0] as winston.transports.ConsoleTransportInstance;

    expect(consoleTransport.stderrLevels).toEqual({
      error: true,
      warn: true,
      info: true,
      verbose: true,
      debug: true,
      silly: true,
    });
  });

  it('takes the level from P4TEST_LOG_LEVEL', () => {
    expect(createLogger({ env: { P4TEST_LOG_LEVEL: 'debug' } }).level).toBe('debug');
  });
});
