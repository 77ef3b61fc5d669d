// src/log/Logger.ts

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'] as const;

/** Destino das mensagens; por padrão o console. */
export interface LogSink {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  child(scope: string): Logger;
}

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

// info vai sem prefixo: é a saída "normal" da CLI (ex.: o relatório do save)
const PREFIX: Record<Exclude<LogLevel, 'silent'>, string> = {
  debug: 'DEBUG',
  info: '',
  warn: 'WARNING',
  error: 'ERROR',
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((l) => l === value);
}

export function createLogger(level: LogLevel = 'info', sink: LogSink = console, scope = ''): Logger {
  const emit = (lvl: Exclude<LogLevel, 'silent'>, message: string) => {
    if (RANK[lvl] < RANK[level]) return;
    const parts = [PREFIX[lvl] && `${PREFIX[lvl]}:`, lvl === 'debug' && scope ? `[${scope}]` : '', message];
    sink[lvl](parts.filter(Boolean).join(' '));
  };

  return {
    debug: (m) => emit('debug', m),
    info: (m) => emit('info', m),
    warn: (m) => emit('warn', m),
    error: (m) => emit('error', m),
    child: (child) => createLogger(level, sink, scope ? `${scope}:${child}` : child),
  };
}

/** Logger mudo (padrão dos componentes quando ninguém injeta um). */
export const silentLogger: Logger = createLogger('silent');
