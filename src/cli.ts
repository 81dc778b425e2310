#!/usr/bin/env node

import { Command, CommanderError, Option } from 'commander';
import { TOOL_NAME, VERSION } from './version';
import { DEFAULT_NAMING_CONVENTION, type MemberNamingConvention } from './archive/memberSelector';
import { extractPrimaryKeysFromArchive } from './core/extractPrimaryKeysFromArchive';
import { describeError } from './errors';
import { serializePrimaryKeys, writePrimaryKeysFile } from './keys/writeKeysJson';
import { writeReportFile, type ReportFormat } from './report/writeReport';
import { buildMemberInventory, serializeMemberInventory, writeMemberInventoryFile } from './scan/inventory';
import { createLogger, type Logger } from './util/logger';

type OutputSinks = {
  /** Defaults to a console logger at info level (debug when verbose). */
  logger?: Logger;
  /** Receives the JSON document when no output file is given; defaults to stdout. */
  stdout?: (text: string) => void;
};

export type ExtractCliOptions = OutputSinks & {
  archive: string;
  output?: string;
  verbose: boolean;
  extension?: string;
  report?: string;
  reportFormat?: ReportFormat;
};

export type MembersCliOptions = OutputSinks & {
  archive: string;
  out?: string;
  verbose: boolean;
  extension?: string;
};

function writeStdout(text: string): void {
  process.stdout.write(text);
}

function namingConvention(extension: string | undefined): MemberNamingConvention {
  const ext = extension && extension.trim() !== '' ? extension.trim() : DEFAULT_NAMING_CONVENTION.extension;
  return { ...DEFAULT_NAMING_CONVENTION, extension: ext };
}

function cliLogger(opts: OutputSinks & { verbose: boolean }): Logger {
  return opts.logger ?? createLogger({ level: opts.verbose ? 'debug' : 'info' });
}

/** Returns the process exit code: 0 on success (zero matches included), 1 on failure. */
export async function runExtract(opts: ExtractCliOptions): Promise<number> {
  const logger = cliLogger(opts);
  try {
    const { keys, report } = await extractPrimaryKeysFromArchive(opts.archive, {
      convention: namingConvention(opts.extension),
      logger,
      trackReport: Boolean(opts.report),
    });

    if (opts.output) {
      await writePrimaryKeysFile(opts.output, keys);
      logger.info(`Results saved to ${opts.output}`);
    } else {
      (opts.stdout ?? writeStdout)(serializePrimaryKeys(keys));
    }

    if (opts.report && report) {
      await writeReportFile(opts.report, report, opts.reportFormat ?? 'md');
      logger.info(`Report saved to ${opts.report}`);
    }
    return 0;
  } catch (e: unknown) {
    logger.error(`Error: ${describeError(e)}`);
    return 1;
  }
}

export async function runMembers(opts: MembersCliOptions): Promise<number> {
  const logger = cliLogger(opts);
  try {
    const inv = await buildMemberInventory(opts.archive, namingConvention(opts.extension));
    if (opts.out) {
      await writeMemberInventoryFile(opts.out, inv);
      logger.info(`Inventory saved to ${opts.out}`);
    } else {
      (opts.stdout ?? writeStdout)(serializeMemberInventory(inv));
    }
    logger.debug(`${inv.members.length} qualifying member(s), ${inv.skipped.length} skipped`);
    return 0;
  } catch (e: unknown) {
    logger.error(`Error: ${describeError(e)}`);
    return 1;
  }
}

type ExtractRawOptions = {
  output?: string;
  verbose?: boolean;
  extension?: string;
  report?: string;
  reportFormat?: ReportFormat;
};

type MembersRawOptions = {
  out?: string;
  verbose?: boolean;
  extension?: string;
};

export async function main(argv: string[], sinks: OutputSinks = {}): Promise<number> {
  const program = new Command();
  let exitCode = 0;

  program
    .name(TOOL_NAME)
    .description('Extract primary keys from YANG files in a ZIP archive.')
    .version(VERSION)
    .exitOverride()
    .argument('<archive>', 'Path to the ZIP file containing YANG files')
    .option('-o, --output <file>', 'Output file path (JSON format)')
    .option('-v, --verbose', 'Enable verbose output', false)
    .option('--extension <ext>', 'Schema file extension', DEFAULT_NAMING_CONVENTION.extension)
    .option('--report <file>', 'Optional extraction report path')
    .addOption(new Option('--report-format <format>', 'Report format').choices(['md', 'json']).default('md'))
    .action(async (archive: string, raw: ExtractRawOptions) => {
      exitCode = await runExtract({
        archive,
        output: raw.output,
        verbose: Boolean(raw.verbose),
        extension: raw.extension,
        report: raw.report,
        reportFormat: raw.reportFormat,
        ...sinks,
      });
    });

  program
    .command('members')
    .description('List the archive members that follow the <version>-<name> naming convention.')
    .argument('<archive>', 'Path to the ZIP file')
    .option('--out <file>', 'Output JSON file (default: stdout)')
    .option('-v, --verbose', 'Enable verbose output', false)
    .option('--extension <ext>', 'Schema file extension', DEFAULT_NAMING_CONVENTION.extension)
    .action(async (archive: string, raw: MembersRawOptions) => {
      exitCode = await runMembers({
        archive,
        out: raw.out,
        verbose: Boolean(raw.verbose),
        extension: raw.extension,
        ...sinks,
      });
    });

  try {
    await program.parseAsync(argv);
    return exitCode;
  } catch (e: unknown) {
    // --help and --version also surface here, with exit code 0.
    if (e instanceof CommanderError) return e.exitCode === 0 ? 0 : 2;
    // eslint-disable-next-line no-console
    console.error(describeError(e));
    return 2;
  }
}

// Run CLI only when executed directly (not when imported in tests)
if (require.main === module) {
  main(process.argv).then(
    (code) => {
      process.exitCode = code;
    },
    (e: unknown) => {
      // eslint-disable-next-line no-console
      console.error(describeError(e));
      process.exitCode = 2;
    },
  );
}
