export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(msg: string, fields?: LogFields): void;
  info(msg: string, fields?: LogFields): void;
  warn(msg: string, fields?: LogFields): void;
  error(msg: string, fields?: LogFields): void;
  child(scope: string): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LoggerOptions {
  level?: LogLevel;
  scope?: string;
  // stdout belongs to the MCP stdio transport, so lines go to stderr
  write?: (line: string) => void;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info';
  const write = options.write ?? ((line: string) => process.stderr.write(`${line}\n`));

  function log(entryLevel: LogLevel, msg: string, fields?: LogFields) {
    if (LEVEL_ORDER[entryLevel] < LEVEL_ORDER[level]) return;
    write(
      JSON.stringify({
        level: entryLevel,
        msg,
        ts: new Date().toISOString(),
        ...(options.scope ? { scope: options.scope } : {}),
        ...fields,
      }),
    );
  }

  return {
    debug: (msg, fields) => log('debug', msg, fields),
    info: (msg, fields) => log('info', msg, fields),
    warn: (msg, fields) => log('warn', msg, fields),
    error: (msg, fields) => log('error', msg, fields),
    child: (scope) =>
      createLogger({
        level,
        write,
        scope: options.scope ? `${options.scope}.${scope}` : scope,
      }),
  };
}

export const silentLogger: Logger = createLogger({ write: () => {} });
