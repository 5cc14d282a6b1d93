const LEVELS = { debug: 0, info: 1, warn: 2, error: 3 } as const;
type Level = keyof typeof LEVELS;

function isLevel(value: string): value is Level {
  return value in LEVELS;
}

function getThreshold(): number {
  const env = (process.env.LOG_LEVEL ?? 'info').toLowerCase();
  return isLevel(env) ? LEVELS[env] : LEVELS.info;
}

/** JSON.stringify cannot encode bigint; amounts are logged as decimal strings */
function replacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

export interface Logger {
  debug(msg: string, data?: unknown): void;
  info(msg: string, data?: unknown): void;
  warn(msg: string, data?: unknown): void;
  error(msg: string, data?: unknown): void;
}

export function createLogger(namespace: string): Logger {
  const write = (level: Level, msg: string, data?: unknown) => {
    if (LEVELS[level] < getThreshold()) return;
    const entry: Record<string, unknown> = {
      ts: new Date().toISOString(),
      level,
      ns: namespace,
      msg,
    };
    if (data !== undefined) entry.data = data;
    const line = JSON.stringify(entry, replacer);
    if (level === 'error') process.stderr.write(line + '\n');
    else process.stdout.write(line + '\n');
  };

  return {
    debug: (msg, data?) => write('debug', msg, data),
    info: (msg, data?) => write('info', msg, data),
    warn: (msg, data?) => write('warn', msg, data),
    error: (msg, data?) => write('error', msg, data),
  };
}
