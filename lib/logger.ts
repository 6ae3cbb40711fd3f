import pino from 'pino';

const LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
type LogLevel = (typeof LEVELS)[number];

function envLevel(value: string | undefined): LogLevel {
  const found = LEVELS.find((l) => l === value);
  return found ?? 'info';
}

// Reports go to files and the final summary to stdout, so logs stay on stderr.
const logger = pino(
  {
    name: 'cdn-usage-reporter',
    level: envLevel(process.env.LOG_LEVEL),
    base: undefined,
  },
  pino.destination({ dest: 2, sync: true }),
);

export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}

export default logger;
