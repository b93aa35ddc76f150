import pino from 'pino';

const DEFAULT_LEVEL = 'info';

let root: pino.Logger | undefined;

export function generateCorrelationId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
}

/** Falls back to `info` for anything pino does not know, including an unset value. */
export function resolveLogLevel(value: string | undefined): string {
  if (value === undefined || value === '') {
    return DEFAULT_LEVEL;
  }
  return value === 'silent' || value in pino.levels.values ? value : DEFAULT_LEVEL;
}

function getRootLogger(): pino.Logger {
  if (root) {
    return root;
  }

  const requested = process.env.LOG_LEVEL;
  const level = resolveLogLevel(requested);

  root = pino({
    name: 'law-firm-backend',
    level,
    // Replaces pid/hostname; every line of one process shares the correlation id
    base: { correlationId: generateCorrelationId() },
    timestamp: pino.stdTimeFunctions.isoTime,
    transport:
      process.env.NODE_ENV === 'development'
        ? {
            target: 'pino-pretty',
            options: { colorize: true, translateTime: 'HH:MM:ss Z' },
          }
        : undefined,
  });

  if (requested && level !== requested) {
    root.warn({ requested, level }, 'Unknown LOG_LEVEL, using default');
  }
  return root;
}

export function createLogger(context: Record<string, unknown> = {}): pino.Logger {
  return getRootLogger().child(context);
}
