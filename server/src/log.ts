import { pino, stdTimeFunctions, type DestinationStream } from 'pino';

const level = process.env.LOG_LEVEL ?? (process.env.NODE_TEST_CONTEXT ? 'silent' : 'info');

const levelLabels: Record<number, string> = {
  10: 'TRACE',
  20: 'DEBUG',
  30: 'INFO',
  40: 'WARN',
  50: 'ERROR',
  60: 'FATAL'
};

const CORE_KEYS = new Set(['level', 'time', 'msg', 'err']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function formatTime(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return new Date(value).toISOString();
  return '';
}

function formatBindings(entry: Record<string, unknown>): string {
  const parts: string[] = [];
  for (const [key, value] of Object.entries(entry)) {
    if (CORE_KEYS.has(key) || value === undefined) continue;
    parts.push(`${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`);
  }
  return parts.length > 0 ? ` (${parts.join(' ')})` : '';
}

function formatError(err: unknown): string {
  if (!isRecord(err)) return '';
  if (typeof err.stack === 'string') return err.stack;
  if (typeof err.message === 'string') return err.message;
  return '';
}

const destination: DestinationStream = {
  write(chunk) {
    const raw = typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString();
    let target: NodeJS.WritableStream = process.stdout;
    let output = raw.trimEnd();
    try {
      const entry: unknown = JSON.parse(raw);
      if (isRecord(entry) && typeof entry.msg === 'string') {
        const numericLevel = typeof entry.level === 'number' ? entry.level : 0;
        if (numericLevel >= 40) {
          target = process.stderr;
        }
        const prefixParts = [formatTime(entry.time), levelLabels[numericLevel] ?? ''].filter(Boolean);
        const prefix = prefixParts.length > 0 ? `[${prefixParts.join(' ')}] ` : '';
        output = `${prefix}${entry.msg}${formatBindings(entry)}`;
        const stack = formatError(entry.err);
        if (stack) {
          output += `\n${stack}`;
        }
      }
    } catch {
      // Not JSON: print the raw line.
    }
    if (!output.endsWith('\n')) {
      output += '\n';
    }
    target.write(output);
    return true;
  }
};

export const logger = pino(
  {
    level,
    base: undefined,
    timestamp: stdTimeFunctions.isoTime
  },
  destination
);

export type Logger = typeof logger;

export function componentLogger(component: string, bindings: Record<string, unknown> = {}): Logger {
  return logger.child({ component, ...bindings });
}
