export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type Logger = {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  time: (label: string) => void;
  timeEnd: (label: string) => void;
  child: (scope: string) => Logger;
};

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 };

function ts(): string {
  // ISO without ms is noisy; keep ms for tracing
  return new Date().toISOString();
}

function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
}

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

export function createLogger(scope: string, minLevel: LogLevel = 'info'): Logger {
  const prefix = () => `[${ts()}] [${scope}]`;
  const timers = new Map<string, number>();

  const mk = (level: Exclude<LogLevel, 'silent'>) => (...args: unknown[]) => {
    if (!shouldLog(level, minLevel)) return;
    const fn = level === 'debug' ? console.debug : level === 'info' ? console.log : level === 'warn' ? console.warn : console.error;
    fn(prefix(), ...args);
  };

  return {
    debug: mk('debug'),
    info: mk('info'),
    warn: mk('warn'),
    error: mk('error'),
    time: (label: string) => {
      if (!shouldLog('debug', minLevel)) return;
      timers.set(label, Date.now());
    },
    timeEnd: (label: string) => {
      const started = timers.get(label);
      if (started === undefined) return;
      timers.delete(label);
      console.debug(prefix(), `${label}: ${Date.now() - started}ms`);
    },
    child: (child: string) => createLogger(`${scope}:${child}`, minLevel),
  };
}
