/**
 * Namespaced console logger with sensitive data redaction.
 * Carrier auth tokens and generation API keys must never reach the logs.
 */

/** Fields that should be redacted from logs */
const SENSITIVE_FIELDS = new Set([
  'apikey',
  'api_key',
  'token',
  'auth_token',
  'authtoken',
  'password',
  'secret',
  'authorization',
  'signature',
  'credential',
  'credentials',
  'access_token',
]);

/**
 * Recursively redacts sensitive fields from an object.
 * Creates a deep copy to avoid modifying the original.
 */
export function redactSensitive(value: unknown): unknown {
  if (value === null || value === undefined || typeof value !== 'object') {
    return value;
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactSensitive(item));
  }

  const result: Record<string, unknown> = {};
  for (const [key, val] of Object.entries(value)) {
    if (SENSITIVE_FIELDS.has(key.toLowerCase())) {
      result[key] = '[REDACTED]';
    } else {
      result[key] = redactSensitive(val);
    }
  }
  return result;
}

export interface Logger {
  namespace: string;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}

export function createLogger(namespace: string): Logger {
  const formatMessage = (level: string, message: string, data?: Record<string, unknown>): string => {
    const timestamp = new Date().toISOString();
    const prefix = `[${timestamp}] [${level}] [${namespace}]`;
    if (data) {
      return `${prefix} ${message} ${JSON.stringify(redactSensitive(data))}`;
    }
    return `${prefix} ${message}`;
  };

  return {
    namespace,
    info(message, data) {
      console.info(formatMessage('INFO', message, data));
    },
    warn(message, data) {
      console.warn(formatMessage('WARN', message, data));
    },
    error(message, data) {
      console.error(formatMessage('ERROR', message, data));
    },
    debug(message, data) {
      if (process.env.LOG_LEVEL === 'debug') {
        console.debug(formatMessage('DEBUG', message, data));
      }
    },
  };
}

/** Error message for logging, whatever was thrown. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
