import * as path from 'path';
import { readSumFile, scanSumFiles } from './files/sumFiles.js';
import { groupCasts } from './sum/index.js';
import { log } from './utils/log.js';

type CliCommand = 'scan' | 'read';

interface CliArgs {
  command: CliCommand;
  target?: string;
  emptyCols: string[];
  casts: boolean;
}

function parseArgs(command: CliCommand, argv: string[]): CliArgs {
  const out: CliArgs = { command, emptyCols: [], casts: false };
  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg === undefined) continue;
    if (arg === '--empty-col') {
      const label = argv[++index];
      if (label === undefined) throw new Error('--empty-col needs a header label');
      out.emptyCols.push(label);
    } else if (arg === '--casts' && command === 'read') out.casts = true;
    else if (arg === '--help' || arg === '-h') throw new Error('help');
    else if (arg.startsWith('-')) throw new Error(`Unknown arg: ${arg}`);
    else if (out.target === undefined) out.target = arg;
    else throw new Error(`Unexpected extra argument: ${arg}`);
  }
  return out;
}

export function usage(): string {
  return [
    'Usage:',
    '  sumfile-mcp                                   start the MCP server on stdio',
    '  sumfile-mcp scan <dir> [--empty-col LABEL]...',
    '  sumfile-mcp read <file> [--empty-col LABEL]... [--casts]',
  ].join('\n');
}

function writeJson(value: unknown): void {
  process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
}

export function isCliCommand(value: string | undefined): value is CliCommand {
  return value === 'scan' || value === 'read';
}

export async function runCli(command: CliCommand, argv: string[]): Promise<void> {
  let args: CliArgs;
  try {
    args = parseArgs(command, argv);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    if (message === 'help') {
      console.error(usage());
      return;
    }
    throw new Error(`${message}\n${usage()}`);
  }
  if (args.target === undefined) {
    throw new Error(`Missing path for ${command}.\n${usage()}`);
  }

  const target = path.resolve(args.target);
  const options = { emptyCols: args.emptyCols };

  if (args.command === 'scan') {
    const report = scanSumFiles(target, options);
    writeJson(report);
    log.info('Scan complete:', JSON.stringify({ root: target, ok: report.ok_count, errors: report.error_count }));
    for (const failure of report.files) {
      if (failure.status === 'error') log.warn(`${failure.path}: ${failure.code}: ${failure.message}`);
    }
    if (report.error_count > 0) process.exitCode = 1;
    return;
  }

  const { rows } = readSumFile(target, options);
  writeJson(args.casts ? groupCasts(rows) : [...rows]);
}
