#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { parseArgs } from 'node:util';
import { AppModule } from './app.module';
import { LedgerUpdaterService } from './holdings/ledger-updater.service';
import { SnapshotExporterService } from './holdings/snapshot-exporter.service';

export const USAGE = `Usage: holdings-ledger <command> [options]

Commands:
  update-holdings   Refresh market values in Holdings.md
  export-holdings   Export Holdings.md to a JSON snapshot

Options:
  -f, --file <path>     Ledger file (default: HOLDINGS_PATH or discovery)
  -o, --output <path>   Snapshot file (default: SNAPSHOT_OUTPUT)
  -h, --help            Show this help
`;

const COMMANDS = ['update-holdings', 'export-holdings'] as const;
type Command = (typeof COMMANDS)[number];

export interface CliArguments {
  command?: Command;
  file?: string;
  output?: string;
  help: boolean;
}

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some((command) => command === value);
}

/** @throws TypeError on unknown options (from parseArgs) */
export function parseCliArguments(argv: string[]): CliArguments {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      file: { type: 'string', short: 'f' },
      output: { type: 'string', short: 'o' },
      help: { type: 'boolean', short: 'h' },
    },
  });
  const [first] = positionals;
  return {
    command: isCommand(first) ? first : undefined,
    file: values.file,
    output: values.output,
    help: values.help ?? false,
  };
}

/** Resolves to the process exit code. */
export async function runCli(argv: string[]): Promise<number> {
  const logger = new Logger('Cli');

  let args: CliArguments;
  try {
    args = parseCliArguments(argv);
  } catch (error: unknown) {
    logger.error(error instanceof Error ? error.message : String(error));
    process.stderr.write(USAGE);
    return 1;
  }
  if (args.help || !args.command) {
    process.stderr.write(USAGE);
    return args.help ? 0 : 1;
  }

  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['log', 'warn', 'error'],
    abortOnError: false,
  });
  try {
    if (args.command === 'update-holdings') {
      const result = await app.get(LedgerUpdaterService).run(args.file);
      logger.log(`Run ${result.runId}: ${result.rowsRewritten} rows updated in ${result.path}`);
    } else {
      await app.get(SnapshotExporterService).export(args.output, args.file);
    }
    return 0;
  } catch (error: unknown) {
    logger.error(error instanceof Error ? error.message : String(error));
    return 1;
  } finally {
    await app.close();
  }
}

if (require.main === module) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      Logger.error(error instanceof Error ? error.message : String(error), 'Cli');
      process.exitCode = 1;
    });
}
