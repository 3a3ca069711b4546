/**
 * Component-scoped diagnostic logger.
 *
 * Everything goes to stderr so the group report and spinner on stdout stay
 * clean. The level comes from LOG_LEVEL at startup and `--verbose` later.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m',  // gray
  info: '\x1b[36m',   // cyan
  warn: '\x1b[33m',   // yellow
  error: '\x1b[31m',  // red
};

const RESET = '\x1b[0m';

const LEVELS: ReadonlySet<string> = new Set(Object.keys(LEVEL_PRIORITY));

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LEVELS.has(value);
}

const envLevel = process.env.LOG_LEVEL;
let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export type Logger = Record<LogLevel, (message: string, data?: unknown) => void>;

export function createLogger(component: string): Logger {
  const write = (level: LogLevel) => (message: string, data?: unknown) => {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[currentLevel]) return;

    const timestamp = new Date().toISOString().substring(11, 23);
    const tag = `${LEVEL_COLORS[level]}${level.toUpperCase().padEnd(5)}${RESET}`;
    const suffix = data === undefined ? '' : ` ${formatData(data)}`;
    console.error(`${timestamp} ${tag} [${component}] ${message}${suffix}`);
  };

  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
  };
}

function formatData(data: unknown): string {
  if (data instanceof Error) return data.message;
  if (typeof data === 'string') return data;
  try {
    return JSON.stringify(data);
  } catch {
    return String(data);
  }
}
