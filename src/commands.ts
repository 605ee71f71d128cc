/**
 * pngstash command implementations: argument parsing and the four
 * subcommands. `cli.ts` is the executable wrapper around `runCli`.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import {
  hideMessageInFile,
  removeMessageFromFile,
  revealMessageFromFile,
  listChunksInFile,
} from './node.js';
import type { FileMessageOptions } from './node.js';
import { ChunkType } from './png/chunk-type.js';
import { DEFAULT_MESSAGE_CHUNK_TYPE } from './operations/message.js';
import type { ChunkSummary } from './types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// ─── Helpers ──────────────────────────────────────────────────────────────────

function getVersion(): string {
  const pkgPath = join(__dirname, '..', 'package.json');
  const pkg = JSON.parse(readFileSync(pkgPath, 'utf-8')) as { version: string };
  return pkg.version;
}

export function formatSize(bytes: number): string {
  if (bytes >= 1_000_000) return `${(bytes / 1_000_000).toFixed(1)} MB`;
  if (bytes >= 1_000) return `${(bytes / 1_000).toFixed(1)} KB`;
  return `${bytes} B`;
}

export function formatChunk(s: ChunkSummary): string {
  const flags = [
    s.critical ? 'critical' : 'ancillary',
    s.public ? 'public' : 'private',
    s.safeToCopy ? 'safe-to-copy' : 'unsafe-to-copy',
  ];
  if (!s.reservedBitValid) flags.push('reserved-bit-set');
  const crc = s.crc.toString(16).padStart(8, '0');
  return `  ${s.type}  ${String(s.length).padStart(10)} B  crc 0x${crc}  ${flags.join(', ')}`;
}

// ─── Help text ────────────────────────────────────────────────────────────────

export const HELP = `
pngstash <command> <file> [args] [options]

Hide, reveal and remove messages stored in PNG chunks.

COMMANDS
  encode <file> <message>     Store a message in a new chunk before IEND
  decode <file>               Print the message stored in the file
  remove <file>               Remove the message chunk
  print <file>                List every chunk in the file

OPTIONS
  -t, --type <code>           Chunk type code (default: "${DEFAULT_MESSAGE_CHUNK_TYPE}")
  -o, --output <path>         Output file (encode, remove)
  -i, --in-place              Overwrite the input file (encode, remove)
  -s, --suffix <suffix>       Output suffix (encode, remove; default: "-stash" / "-unstash")
  --json                      Print chunk list as JSON (print)
  -q, --quiet                 Suppress success output (encode, remove)
  -h, --help                  Show this help
  -v, --version               Show version
`.trim();

// ─── Argument parser ──────────────────────────────────────────────────────────

export type Command = 'encode' | 'decode' | 'remove' | 'print';

const COMMANDS: readonly Command[] = ['encode', 'decode', 'remove', 'print'];

// Commands that write a PNG
const WRITING: readonly Command[] = ['encode', 'remove'];

function isCommand(value: string): value is Command {
  return (COMMANDS as readonly string[]).includes(value);
}

/**
 * Thrown for malformed command lines
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export interface CliArgs {
  command: Command;
  positionals: string[];
  chunkType: string;
  outputPath?: string;
  inPlace: boolean;
  suffix?: string;
  quiet: boolean;
  json: boolean;
}

export function parseArgs(raw: string[]): CliArgs {
  const [first, ...rest] = raw;
  if (first === undefined) {
    throw new UsageError('No command specified');
  }
  if (!isCommand(first)) {
    throw new UsageError(`Unknown command: ${first}`);
  }

  const args: CliArgs = {
    command: first,
    positionals: [],
    chunkType: DEFAULT_MESSAGE_CHUNK_TYPE,
    inPlace: false,
    quiet: false,
    json: false,
  };

  // Suffixes usually start with a dash, so --suffix takes any value.
  const take = (i: number, flag: string, allowDash = false): [number, string] => {
    const val = rest[i + 1];
    if (val === undefined || (!allowDash && val.startsWith('-') && val.length > 1)) {
      throw new UsageError(`${flag} requires a value`);
    }
    return [i + 1, val];
  };

  const allow = (flag: string, commands: readonly Command[]): void => {
    if (!commands.includes(args.command)) {
      throw new UsageError(`${flag} is not valid for ${args.command}`);
    }
  };

  for (let i = 0; i < rest.length; i++) {
    const a = rest[i]!;
    switch (a) {
      case '-i': case '--in-place': allow(a, WRITING); args.inPlace = true; break;
      case '-q': case '--quiet':    allow(a, WRITING); args.quiet = true; break;
      case '--json':                allow(a, ['print']); args.json = true; break;

      case '-t': case '--type': {
        allow(a, ['encode', 'decode', 'remove']);
        const [ni, v] = take(i, a); i = ni; args.chunkType = v; break;
      }
      case '-o': case '--output': {
        allow(a, WRITING);
        const [ni, v] = take(i, a); i = ni; args.outputPath = v; break;
      }
      case '-s': case '--suffix': {
        allow(a, WRITING);
        const [ni, v] = take(i, a, true); i = ni; args.suffix = v; break;
      }
      default:
        if (a.startsWith('-') && a.length > 1) {
          throw new UsageError(`Unknown option: ${a}`);
        }
        args.positionals.push(a);
    }
  }

  const expected = args.command === 'encode' ? 2 : 1;
  if (args.positionals.length < expected) {
    throw new UsageError(
      args.command === 'encode' ? 'encode requires <file> and <message>' : `${args.command} requires <file>`
    );
  }
  if (args.positionals.length > expected) {
    throw new UsageError(`Unexpected argument: ${args.positionals[expected]!}`);
  }
  if (args.outputPath !== undefined && args.inPlace) {
    throw new UsageError('--output and --in-place cannot be combined');
  }

  return args;
}

// ─── Commands ─────────────────────────────────────────────────────────────────

function buildOptions(a: CliArgs): FileMessageOptions {
  return {
    chunkType: a.chunkType,
    inPlace: a.inPlace,
    ...(a.outputPath !== undefined && { outputPath: a.outputPath }),
    ...(a.suffix !== undefined && { suffix: a.suffix }),
  };
}

function warnAboutType(code: string): void {
  const type = ChunkType.fromString(code);
  if (!type.isReservedBitValid()) {
    console.error(`Warning: chunk type ${code} has its reserved bit set; PNG readers may reject the file`);
  }
  if (type.isCritical()) {
    console.error(`Warning: chunk type ${code} is critical; PNG readers that do not know it will refuse the file`);
  }
}

async function runCommand(a: CliArgs, file: string): Promise<void> {
  const opts = buildOptions(a);

  switch (a.command) {
    case 'encode': {
      warnAboutType(a.chunkType);
      const message = a.positionals[1]!;
      const result = await hideMessageInFile(file, message, opts);
      if (!a.quiet) {
        console.log(`  ✓ ${file} → ${result.outputPath} (${result.chunk.type} chunk, ${formatSize(result.chunk.length)})`);
      }
      break;
    }
    case 'decode': {
      console.log(await revealMessageFromFile(file, opts));
      break;
    }
    case 'remove': {
      const result = await removeMessageFromFile(file, opts);
      if (!a.quiet) {
        console.log(`  ✓ ${file} → ${result.outputPath} (removed ${result.chunk.type} chunk, ${formatSize(result.chunk.length)})`);
      }
      break;
    }
    case 'print': {
      const summaries = await listChunksInFile(file);
      if (a.json) {
        console.log(JSON.stringify(summaries, null, 2));
      } else {
        console.log(file);
        for (const s of summaries) console.log(formatChunk(s));
      }
      break;
    }
  }
}

// ─── Main ─────────────────────────────────────────────────────────────────────

/**
 * Run the CLI against `rawArgs` (argv without node and script). Resolves to
 * the process exit code.
 */
export async function runCli(rawArgs: string[]): Promise<number> {
  const [first] = rawArgs;
  if (first === undefined || first === '-h' || first === '--help') {
    console.log(HELP);
    return 0;
  }
  if (first === '-v' || first === '--version') {
    console.log(getVersion());
    return 0;
  }

  let a: CliArgs;
  try {
    a = parseArgs(rawArgs);
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`Error: ${err.message}`);
      return 1;
    }
    throw err;
  }

  const file = a.positionals[0]!;
  try {
    await runCommand(a, file);
  } catch (err) {
    console.error(`  ✗ ${file}: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
  return 0;
}
