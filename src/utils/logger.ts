import { pino, destination, multistream, type Logger, type DestinationStream, type Level } from 'pino';
import { z } from 'zod';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);
export type UtilLogLevel = z.infer<typeof LogLevelSchema>;

const parsedLevel = LogLevelSchema.safeParse(process.env['LOG_LEVEL']);
const logLevel: UtilLogLevel = parsedLevel.success ? parsedLevel.data : 'warn';

const defaultLogDir = path.join(os.homedir(), '.iface-errors', 'logs');
const logDir = process.env['IFACE_ERRORS_LOG_DIR'] ?? defaultLogDir;
const logToFile = process.env['IFACE_ERRORS_LOG_FILE'] === 'true';

let fileLoggingActive = false;
let resolvedLogPath = '';

if (logToFile) {
  try {
    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true });
    }
    fileLoggingActive = true;
  } catch (err) {
    process.stderr.write(`Log directory ${logDir} unavailable, logging to stderr only: ${String(err)}\n`);
  }
}

function getLogFilePath(): string {
  const date = new Date().toISOString().split('T')[0];
  return path.join(logDir, `iface-errors-${date}.log`);
}

// stdout carries the report, so logs go to stderr. Stream levels stay open;
// the logger level does the filtering.
const streams: Array<{ stream: DestinationStream; level: Level }> = [
  { stream: process.stderr, level: 'trace' },
];

if (fileLoggingActive) {
  resolvedLogPath = getLogFilePath();
  streams.push({
    stream: destination({
      dest: resolvedLogPath,
      sync: false,
      mkdir: true,
    }),
    level: 'trace',
  });
}

export const logger: Logger = pino(
  {
    level: logLevel,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: () => `,"time":"${new Date().toISOString()}"`,
  },
  multistream(streams)
);

logger.debug({
  event: 'logger_initialized',
  logFile: fileLoggingActive ? resolvedLogPath : 'stderr only',
  logDir,
  nodeVersion: process.version,
  pid: process.pid,
}, 'Interface error analyzer logging active');

export function createChildLogger(module: string): Logger {
  return logger.child({ module });
}

export function getCurrentLogFile(): string | undefined {
  return fileLoggingActive ? resolvedLogPath : undefined;
}
