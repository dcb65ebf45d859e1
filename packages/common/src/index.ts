import { randomUUID } from 'node:crypto';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

type EmitLevel = Exclude<LogLevel, 'silent'>;

export interface Logger {
  debug: (message: string, meta?: Record<string, JsonValue>) => void;
  info: (message: string, meta?: Record<string, JsonValue>) => void;
  warn: (message: string, meta?: Record<string, JsonValue>) => void;
  error: (message: string, meta?: Record<string, JsonValue>) => void;
}

export interface JsonLoggerOptions {
  level?: LogLevel;
  write?: (line: string) => void;
}

const rank = (level: LogLevel): number => LOG_LEVELS.indexOf(level);

export const isLogLevel = (value: string): value is LogLevel => LOG_LEVELS.some((level) => level === value);

export const createJsonLogger = ({
  level = 'info',
  write = (line) => process.stdout.write(line)
}: JsonLoggerOptions = {}): Logger => {
  const emit = (entryLevel: EmitLevel, message: string, meta?: Record<string, JsonValue>) => {
    if (rank(entryLevel) > rank(level)) {
      return;
    }
    const payload = {
      ts: new Date().toISOString(),
      level: entryLevel,
      message,
      ...(meta ? { meta } : {})
    };
    write(`${JSON.stringify(payload)}\n`);
  };

  return {
    debug: (message, meta) => emit('debug', message, meta),
    info: (message, meta) => emit('info', message, meta),
    warn: (message, meta) => emit('warn', message, meta),
    error: (message, meta) => emit('error', message, meta)
  };
};

export const ensureRequestId = (value?: string): string => value && value.length > 0 ? value : randomUUID();

export const nowIso = (): string => new Date().toISOString();

export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));
