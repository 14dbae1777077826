import winston from 'winston';
import path from 'path';
import type { RepairEntry } from '../core/types.js';

/**
 * Evaluation Logging
 *
 * Loaders and the runner log through winston; the scoring core never logs.
 * Outside test runs every entry also lands in `$SGDT_LOG_DIR/evaluation.log`
 * and errors in `errors.log`. Console output is silent under Vitest unless
 * LOG_LEVEL is set.
 */

const TIMESTAMP = 'YYYY-MM-DD HH:mm:ss';
const MAX_LOG_BYTES = 5 * 1024 * 1024;
const MAX_LOG_FILES = 5;

const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: TIMESTAMP }),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: TIMESTAMP }),
  winston.format.printf(({ timestamp, level, message, component, ...metadata }) => {
    const extra = Object.keys(metadata).length > 0 ? ` ${JSON.stringify(metadata)}` : '';
    return `${timestamp} [${level}] ${component}: ${message}${extra}`;
  })
);

function logFile(name: string, level?: string) {
  return new winston.transports.File({
    filename: path.join(process.env.SGDT_LOG_DIR || 'logs', name),
    maxsize: MAX_LOG_BYTES,
    maxFiles: MAX_LOG_FILES,
    ...(level ? { level } : {}),
  });
}

/**
 * Logger for one loader or runner; entries carry `component`
 */
export function createLogger(component: string): winston.Logger {
  const underTest = process.env.VITEST !== undefined;
  const logger = winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    format: fileFormat,
    defaultMeta: { component },
    transports: [new winston.transports.Console({ format: consoleFormat, silent: underTest && !process.env.LOG_LEVEL })],
  });

  if (!underTest) {
    logger.add(logFile('evaluation.log'));
    logger.add(logFile('errors.log', 'error'));
  }
  return logger;
}

/** `code@path` per repair, in repair order */
export function formatRepairs(repairs: readonly RepairEntry[]): string[] {
  return repairs.map((repair) => `${repair.code}@${repair.path}`);
}

/**
 * Per-run logger: every entry carries the run id, and per-sample entries
 * the gold item id.
 */
export class RunLogger {
  private logger: winston.Logger;

  constructor(
    readonly runId: string,
    component = 'EvaluationRunner'
  ) {
    this.logger = createLogger(component).child({ runId });
  }

  started(metadata: object) {
    this.logger.info('Evaluation started', metadata);
  }

  completed(metadata: object) {
    this.logger.info('Evaluation completed', metadata);
  }

  sampleRepaired(itemId: string, repairs: readonly RepairEntry[]) {
    this.logger.debug('Prediction repaired', { itemId, repairs: formatRepairs(repairs) });
  }

  /** A sample whose scoring threw; the run goes on with it scored as empty */
  sampleFailed(itemId: string, error: unknown) {
    const detail = error instanceof Error ? { error: error.message, stack: error.stack } : { error: String(error) };
    this.logger.error('Sample evaluation failed', { itemId, ...detail });
  }
}
