import { closeSync, openSync, readSync } from 'node:fs';
import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { compile } from './compile';
import { formatProgram } from './format';
import { search } from './search';
import { run, toBytes } from './vm';

export const MAX_INPUT_BYTES = 65536;

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
  readStdin(): Uint8Array;
}

interface CliOptions {
  text?: string;
  search?: boolean;
  dump?: boolean;
  maxThreads?: number;
}

const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  readStdin: () => readHead(0),
};

function parseCount(value: string): number {
  const n = Number.parseInt(value, 10);
  if (!Number.isInteger(n) || n <= 0 || String(n) !== value) {
    throw new InvalidArgumentError('expected a positive integer');
  }
  return n;
}

// Reads at most one byte past MAX_INPUT_BYTES so callers can tell the input was cut.
export function readHead(fd: number): Uint8Array {
  const buf = new Uint8Array(MAX_INPUT_BYTES + 1);
  let size = 0;
  while (size < buf.length) {
    const n = readSync(fd, buf, size, buf.length - size, null);
    if (n === 0) break;
    size += n;
  }
  return buf.subarray(0, size);
}

function readFileHead(file: string): Uint8Array {
  const fd = openSync(file, 'r');
  try {
    return readHead(fd);
  } finally {
    closeSync(fd);
  }
}

function readInput(file: string | undefined, options: CliOptions, io: CliIO): Uint8Array {
  const data =
    options.text !== undefined
      ? toBytes(options.text)
      : file !== undefined
        ? readFileHead(file)
        : io.readStdin();
  if (data.length <= MAX_INPUT_BYTES) return data;
  io.err(`input truncated to ${MAX_INPUT_BYTES} bytes`);
  return data.subarray(0, MAX_INPUT_BYTES);
}

function execute(pattern: string, file: string | undefined, options: CliOptions, io: CliIO): number {
  const prog = compile(pattern);
  if (options.dump) formatProgram(prog).forEach((line) => io.out(line));

  const data = readInput(file, options, io);
  const runOptions = { maxThreads: options.maxThreads };

  if (options.search) {
    const at = search(prog, data, runOptions);
    io.out(at < 0 ? 'no match' : `match at ${at}`);
    return at < 0 ? 1 : 0;
  }

  const matched = run(prog, data, runOptions);
  io.out(matched ? 'match' : 'no match');
  return matched ? 0 : 1;
}

/** Exit status: 0 on match, 1 on no match, 2 on any error. */
export async function main(argv: readonly string[], io: CliIO = consoleIO): Promise<number> {
  let status = 2;

  const program = new Command()
    .name('thompson-vm')
    .description('Match input bytes against a pattern compiled to Thompson VM bytecode')
    .argument('<pattern>', 'pattern to compile')
    .argument('[file]', 'input file (stdin when omitted)')
    .option('-t, --text <input>', 'match against this text instead of a file')
    .option('-s, --search', 'try every start offset instead of offset 0 only')
    .option('-d, --dump', 'print the compiled program before matching')
    .option('--max-threads <n>', 'limit on live threads per run', parseCount)
    .exitOverride()
    .configureOutput({
      writeOut: (str) => io.out(str.trimEnd()),
      writeErr: (str) => io.err(str.trimEnd()),
    })
    .action((pattern: string, file: string | undefined, options: CliOptions) => {
      try {
        status = execute(pattern, file, options, io);
      } catch (error) {
        io.err(error instanceof Error ? error.message : String(error));
        status = 2;
      }
    });

  try {
    await program.parseAsync([...argv], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) return error.exitCode === 0 ? 0 : 2;
    throw error;
  }
  return status;
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error instanceof Error ? error.message : String(error));
      process.exitCode = 2;
    },
  );
}
