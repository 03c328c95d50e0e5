import type { Logger } from 'winston';

export type MockLogger = Logger & {
  info: jest.Mock;
  error: jest.Mock;
  warn: jest.Mock;
  verbose: jest.Mock;
  debug: jest.Mock;
};

export function createMockLogger(): MockLogger {
  const mock = {
    level: 'info',
    info: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
    verbose: jest.fn(),
    debug: jest.fn(),
  };
  return mock as unknown as MockLogger;
}
