import pino from 'pino';
import { existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';

const LOG_DIR = join(homedir(), '.uplift', 'logs');

function ensureLogDir(): void {
  if (!existsSync(LOG_DIR)) {
    mkdirSync(LOG_DIR, { recursive: true });
  }
}

export interface LoggerOptions {
  verbose?: boolean;
  level?: string;
}

export function createLogger(name: string = 'uplift', options: LoggerOptions = {}): pino.Logger {
  const level = options.level ?? 'info';

  if (options.verbose) {
    return pino({
      name,
      level: options.level ?? 'debug',
      transport: {
        target: 'pino-pretty',
        options: { colorize: true },
      },
    });
  }

  ensureLogDir();

  return pino({
    name,
    level,
    transport: {
      target: 'pino/file',
      options: { destination: join(LOG_DIR, 'uplift.log'), mkdir: true },
    },
  });
}

let _logger: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (!_logger) {
    _logger = createLogger();
  }
  return _logger;
}

export function setLogger(logger: pino.Logger): void {
  _logger = logger;
}

/** Child logger tagged with a subsystem name. */
export function getSubsystemLogger(subsystem: string): pino.Logger {
  return getLogger().child({ subsystem });
}

export function getLogDir(): string {
  return LOG_DIR;
}
