import winston from 'winston';

export interface LoggerOptions {
  env?: Record<string, string | undefined>;
}

/**
 * Creates the console logger shared by the command-line programs.
 *
 * Every level goes to stderr: stdout belongs to the invoked compiler, and the
 * calling harness only reads our exit status.
 */
export function createLogger(options: LoggerOptions = {}): winston.Logger {
  const env = options.env ?? process.env;

  const transports: winston.transport[] = [
    new winston.transports.Console({
      stderrLevels: ['error', 'warn', 'info', 'verbose', 'debug', 'silly'],
      format: winston.format.combine(winston.format.colorize(), winston.format.simple()),
    }),
  ];

  // Optional file logging controlled by env
  const isFileLogEnabled = env.P4TEST_LOG_ENABLE === 'true' || env.P4TEST_LOG_ENABLE === '1';
  if (isFileLogEnabled) {
    transports.push(
      new winston.transports.File({
        filename: env.P4TEST_LOG_FILE || 'p4test-runner.log',
        format: winston.format.json(),
      }),
    );
  }

  return winston.createLogger({
    level: env.P4TEST_LOG_LEVEL || 'info',
    format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
    transports,
  });
}
