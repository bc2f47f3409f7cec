/**
 * Convert command - loads config, converts the script and reports the ledger
 */

import { readFile, writeFile } from 'fs/promises';
import chalk from 'chalk';
import { blockingWarnings, transpile } from '../../lib/transpiler';
import { loadConfig } from '../../utils/loadConfig';
import { Logger } from '../../utils/logger';
import { ConvertOptions, ConvertOptionsSchema, PartialTranspilerConfig } from '../../types/config';
import { ConversionResult, QualityScore, Severity } from '../../types/sql';

const SEVERITY_COLORS: Record<Severity, typeof chalk.red> = {
  info: chalk.cyan,
  warning: chalk.yellow,
  error: chalk.red
};

// Commander passes camelCased flags; only the ones given are set
function cliOverrides(options: ConvertOptions): PartialTranspilerConfig {
  const overrides: PartialTranspilerConfig = {};
  if (options.source) overrides.source = options.source;
  if (options.target) overrides.target = options.target;
  if (options.format !== undefined) overrides.format = options.format;
  if (options.score !== undefined) overrides.score = options.score;
  if (options.failOn) overrides.failOn = options.failOn;
  if (options.json !== undefined) overrides.json = options.json;
  if (options.verbose) overrides.logLevel = 'debug';
  return overrides;
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString('utf-8');
}

function describeScore(score: QualityScore): string {
  return `${score.valid}/${score.total} (${score.score}%)`;
}

/**
 * Human-readable ledger: one line per warning, then counts
 */
export function renderReport(result: ConversionResult): string[] {
  const lines: string[] = [];

  for (const warning of result.warnings) {
    const color = SEVERITY_COLORS[warning.severity];
    lines.push(`${color(warning.severity.toUpperCase())} [${warning.kind}] ${warning.message}`);
    if (warning.suggestion) {
      lines.push(`  → ${warning.suggestion}`);
    }
  }

  const count = (severity: Severity) => result.warnings.filter(warning => warning.severity === severity).length;
  lines.push(
    `${result.appliedRules.length} rule(s) applied, ${count('error')} error(s), ${count('warning')} warning(s), ${count('info')} info`
  );

  const metadata = result.metadata;
  if (metadata?.inputQuality && metadata.outputQuality) {
    lines.push(`Quality: input ${describeScore(metadata.inputQuality)}, output ${describeScore(metadata.outputQuality)}`);
  }

  return lines;
}

export async function convertCommand(file: string | undefined, opts: unknown): Promise<void> {
  const parsed = ConvertOptionsSchema.safeParse(opts);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    new Logger().error(`Invalid options: ${issues}`);
    process.exitCode = 1;
    return;
  }

  const options = parsed.data;
  const { config, errors } = await loadConfig(options.config, cliOverrides(options));
  const logger = new Logger(config.logLevel);

  if (errors.length > 0) {
    for (const err of errors) {
      logger.error(`Could not load config file ${err.path}`, err.error);
    }
    process.exitCode = 1;
    return;
  }

  if (config.source === config.target) {
    logger.warn(`Source and target are both ${config.source}; the input is returned unchanged`);
  }

  let sql: string;
  try {
    sql = file ? await readFile(file, 'utf-8') : await readStdin();
  } catch (error) {
    logger.error(`Could not read ${file ?? 'stdin'}`, error);
    process.exitCode = 1;
    return;
  }

  logger.debug(`Converting ${file ?? 'stdin'} from ${config.source} to ${config.target}`);
  const result = transpile(
    sql,
    config.source,
    config.target,
    { format: config.format, score: config.score, failOn: config.failOn },
    logger
  );

  if (config.json) {
    process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
  } else if (result.sql !== undefined) {
    if (options.output) {
      await writeFile(options.output, `${result.sql}\n`, 'utf-8');
      logger.info(`Wrote ${options.output}`);
    } else {
      process.stdout.write(`${result.sql}\n`);
    }
  }

  if (!config.json) {
    for (const line of renderReport(result)) {
      console.error(line);
    }
  }

  if (!result.success) {
    const gated = blockingWarnings(result.warnings, config.failOn).length > 0;
    if (!gated) {
      for (const message of result.errors ?? []) {
        logger.error(message);
      }
    }
    process.exitCode = gated ? 2 : 1;
  }
}
