import { z } from 'zod';
import { ReportFormatSchema } from '../config/index.js';
import { InvalidArgumentError } from '../utils/errors.js';

export const CliOptionsSchema = z.object({
  help: z.boolean().default(false),
  inputPath: z.string().min(1).optional(),
  format: ReportFormatSchema.optional(),
});
export type CliOptions = z.infer<typeof CliOptionsSchema>;

export const USAGE = `
Usage: iface-errors [file] [--format text|json]

Ranks interfaces in "show interface" output by (input errors + CRC) and
output error ratios. Interfaces below 100k packets/sec in both directions
are skipped as test ports. Use "-" as the file to read stdin.

Options:
  -f, --format <text|json>   Report format (default: text)
  -h, --help                 Show this help

Environment:
  IFACE_ERRORS_INPUT           Input file used when none is given
  IFACE_ERRORS_FORMAT          Default report format
  IFACE_ERRORS_TOP_ERROR_CRC   Size of the error+CRC top list (default 10)
  IFACE_ERRORS_TOP_OUTPUT      Size of the output error top list (default 5)
  LOG_LEVEL                    trace|debug|info|warn|error|fatal|silent (default warn)
  IFACE_ERRORS_LOG_FILE        "true" to also log to a dated file
  IFACE_ERRORS_LOG_DIR         Directory for log files
`;

/**
 * @throws InvalidArgumentError on unknown flags, a missing flag value or
 * more than one input file
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  const raw: { help?: boolean; inputPath?: string; format?: string } = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    if (arg === '-h' || arg === '--help') {
      raw.help = true;
    } else if (arg === '-f' || arg === '--format') {
      const value = argv[++i];
      if (value === undefined) {
        throw new InvalidArgumentError(`Missing value for ${arg}`);
      }
      raw.format = value;
    } else if (arg.startsWith('--format=')) {
      raw.format = arg.slice('--format='.length);
    } else if (arg.startsWith('-') && arg !== '-') {
      throw new InvalidArgumentError(`Unknown option: ${arg}`, { context: { arg } });
    } else if (raw.inputPath === undefined) {
      raw.inputPath = arg;
    } else {
      throw new InvalidArgumentError(`Unexpected argument: ${arg}`, { context: { arg } });
    }
  }

  const result = CliOptionsSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new InvalidArgumentError(`Invalid arguments: ${issues.join('; ')}`, {
      cause: result.error,
    });
  }
  return result.data;
}
