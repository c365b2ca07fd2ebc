#!/usr/bin/env node
import { loadConfigFromEnv } from './config/index.js';
import { parseCliArgs, USAGE, type CliOptions } from './cli/options.js';
import { analyzeInterfaceSource } from './infra/source-reader.js';
import { renderJsonReport, renderTextReport } from './render/text-report.js';
import { AnalyzerError } from './utils/errors.js';
import { createChildLogger } from './utils/logger.js';
import { metrics } from './utils/metrics.js';

const logger = createChildLogger('cli');

async function main(): Promise<void> {
  let options: CliOptions;
  try {
    options = parseCliArgs(process.argv.slice(2));
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    console.error(USAGE);
    process.exit(1);
  }

  if (options.help) {
    console.log(USAGE);
    return;
  }

  const config = loadConfigFromEnv();
  const inputPath = options.inputPath ?? config.input.defaultPath;
  const format = options.format ?? config.report.format;

  logger.debug({ inputPath, format }, 'Starting interface error analysis');

  // Read failures degrade to an empty report; the exit status stays 0 and
  // report.source.status tells the two cases apart.
  const report = await analyzeInterfaceSource(inputPath, {
    topErrorCrcLimit: config.report.topErrorCrcLimit,
    topOutputErrorLimit: config.report.topOutputErrorLimit,
  });

  if (format === 'json') {
    console.log(renderJsonReport(report));
  } else {
    console.log(renderTextReport(report).join('\n'));
  }

  metrics.logSummary();
}

main().catch((err: unknown) => {
  const details = err instanceof AnalyzerError ? err.toJSON() : undefined;
  logger.fatal({ err, details }, 'Unexpected error');
  console.error(`Unexpected error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
