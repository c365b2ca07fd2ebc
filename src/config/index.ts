import { z } from 'zod';
import * as os from 'os';
import * as path from 'path';
import { ConfigurationError } from '../utils/errors.js';

export const DEFAULT_INPUT_PATH = path.join(os.homedir(), 'int_error', 'int_error.txt');

export const ReportFormatSchema = z.enum(['text', 'json']);
export type ReportFormat = z.infer<typeof ReportFormatSchema>;

export const ConfigSchema = z.object({
  input: z.object({
    defaultPath: z.string().min(1).default(DEFAULT_INPUT_PATH),
  }),
  report: z.object({
    topErrorCrcLimit: z.coerce.number().int().positive().default(10),
    topOutputErrorLimit: z.coerce.number().int().positive().default(5),
    format: ReportFormatSchema.default('text'),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

type Env = Record<string, string | undefined>;

export function loadConfigFromEnv(env: Env = process.env): Config {
  const result = ConfigSchema.safeParse({
    input: {
      defaultPath: nonEmpty(env['IFACE_ERRORS_INPUT']),
    },
    report: {
      topErrorCrcLimit: nonEmpty(env['IFACE_ERRORS_TOP_ERROR_CRC']),
      topOutputErrorLimit: nonEmpty(env['IFACE_ERRORS_TOP_OUTPUT']),
      format: nonEmpty(env['IFACE_ERRORS_FORMAT']),
    },
  });

  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, {
      cause: result.error,
      context: { issues },
    });
  }
  return result.data;
}

function nonEmpty(value: string | undefined): string | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return value.trim();
}
