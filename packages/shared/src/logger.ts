import path from 'path';
import pino from 'pino';

export type Logger = pino.Logger;

let baseLogger: pino.Logger | null = null;

function getBaseLogger(): pino.Logger {
  if (baseLogger) return baseLogger;
  // Lazy init so LOG_LEVEL/LOG_FILE are read after the service has run dotenv.config()
  const isProd = process.env.NODE_ENV === 'production';
  const logPath = process.env.LOG_FILE || path.join(process.cwd(), 'customer-sync.log');
  const logLevel = process.env.LOG_LEVEL || (isProd ? 'info' : 'debug');
  const targets: pino.TransportTargetOptions[] = [
    !isProd
      ? {
          target: 'pino-pretty',
          level: logLevel,
          options: { colorize: true, translateTime: 'SYS:standard', destination: 1 },
        }
      : { target: 'pino/file', level: logLevel, options: { destination: 1 } },
    {
      target: 'pino/file',
      level: logLevel,
      options: { destination: logPath, append: true, mkdir: true },
    },
  ];
  baseLogger = pino({ level: logLevel }, pino.transport({ targets }));
  return baseLogger;
}

/**
 * Create a child logger with a service name and optional tag ('crm' for the CRM sync service).
 */
export function createLogger(name: string, tag?: string): Logger {
  const bindings: Record<string, string> = { service: name };
  if (tag) bindings.tag = tag;
  return getBaseLogger().child(bindings);
}

/** Flush pending log lines; call before process.exit. */
export function flushLogger(): void {
  baseLogger?.flush();
}
