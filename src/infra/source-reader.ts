import { readFile } from 'fs/promises';
import { text as readStreamText } from 'stream/consumers';
import type { Readable } from 'stream';
import { createChildLogger } from '../utils/logger.js';
import { metrics } from '../utils/metrics.js';
import {
  SourceUnavailableError,
  SourceUnreadableError,
  isSourceError,
  toError,
} from '../utils/errors.js';
import { analyzeInterfaceText, emptyReport, type AnalyzeOptions } from '../core/error-analyzer.js';
import type { InterfaceErrorReport } from '../types/report.js';

const logger = createChildLogger('source-reader');

export const STDIN_PATH = '-';

const UNAVAILABLE_CODES = new Set(['ENOENT', 'ENOTDIR', 'EISDIR', 'EACCES', 'EPERM']);

export interface SourceReadOptions {
  stdin?: Readable | undefined;
}

export type SourceLoadResult =
  | { status: 'ok'; path: string; text: string }
  | { status: 'unavailable'; path: string; error: SourceUnavailableError }
  | { status: 'unreadable'; path: string; error: SourceUnreadableError };

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/**
 * Reads the whole input source as UTF-8 text. `-` reads stdin.
 *
 * @throws SourceUnavailableError when the file is missing or cannot be opened
 * @throws SourceUnreadableError on any other read failure
 */
export async function readInterfaceSource(
  path: string,
  options: SourceReadOptions = {}
): Promise<string> {
  try {
    if (path === STDIN_PATH) {
      return await readStreamText(options.stdin ?? process.stdin);
    }
    return await readFile(path, 'utf-8');
  } catch (err) {
    const cause = toError(err);
    const code = errnoCode(err);
    if (code !== undefined && UNAVAILABLE_CODES.has(code)) {
      throw new SourceUnavailableError(path, { cause, context: { errno: code } });
    }
    throw new SourceUnreadableError(path, { cause, context: { errno: code } });
  }
}

/**
 * Like {@link readInterfaceSource}, but never throws: read failures are
 * logged and returned as an `unavailable` or `unreadable` result.
 */
export async function loadInterfaceSource(
  path: string,
  options: SourceReadOptions = {}
): Promise<SourceLoadResult> {
  try {
    const text = await readInterfaceSource(path, options);
    logger.debug({ path, bytes: Buffer.byteLength(text) }, 'Interface source loaded');
    return { status: 'ok', path, text };
  } catch (err) {
    if (!isSourceError(err)) throw err;

    logger.error({ path, code: err.code, cause: err.cause?.message }, err.message);
    if (err instanceof SourceUnavailableError) {
      metrics.recordSourceFailure('unavailable');
      return { status: 'unavailable', path, error: err };
    }
    metrics.recordSourceFailure('unreadable');
    return { status: 'unreadable', path, error: err };
  }
}

export async function analyzeInterfaceSource(
  path: string,
  options: AnalyzeOptions & SourceReadOptions = {}
): Promise<InterfaceErrorReport> {
  const loaded = await loadInterfaceSource(path, options);
  if (loaded.status !== 'ok') {
    return emptyReport(
      { path, status: loaded.status, error: loaded.error.message },
      options
    );
  }
  return analyzeInterfaceText(loaded.text, {
    ...options,
    source: { path, status: 'ok' },
  });
}
