/**
 * Console logging with a bracketed scope prefix and trailing key=value fields,
 * e.g. `[forward:detection] attempt 2/7 outcome=retry elapsed_ms=45012`.
 */

export type LogFields = Record<string, string | number | boolean | null | undefined>;

export type Logger = {
  info: (message: string, fields?: LogFields) => void;
  warn: (message: string, fields?: LogFields) => void;
  error: (message: string, fields?: LogFields) => void;
  debug: (message: string, fields?: LogFields) => void;
  child: (scope: string) => Logger;
};

function formatValue(value: string | number | boolean | null): string {
  if (typeof value === 'string') {
    return /[\s"=]/.test(value) || value === '' ? JSON.stringify(value) : value;
  }
  return String(value);
}

export function formatFields(fields: LogFields | undefined): string {
  if (!fields) return '';
  const parts: string[] = [];
  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) continue;
    parts.push(`${key}=${formatValue(value)}`);
  }
  return parts.length ? ` ${parts.join(' ')}` : '';
}

export function createLogger(scope: string, options: { debug?: boolean } = {}): Logger {
  const debugEnabled = options.debug ?? false;
  const line = (message: string, fields?: LogFields) => `[${scope}] ${message}${formatFields(fields)}`;

  return {
    info: (message, fields) => console.log(line(message, fields)),
    warn: (message, fields) => console.warn(line(message, fields)),
    error: (message, fields) => console.error(line(message, fields)),
    debug: (message, fields) => {
      if (debugEnabled) console.log(line(message, fields));
    },
    child: (child) => createLogger(`${scope}:${child}`, options),
  };
}

/** Logger that drops everything; handy for one-off tools and tests. */
export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined,
  child: () => silentLogger,
};
