import { maxThreadsFromEnv } from './config';
import { ThreadLimitError } from './errors';

export type Inst =
  | { op: 'char'; c: number }
  | { op: 'any' }
  | { op: 'match' }
  | { op: 'jmp'; to: number }
  | { op: 'split'; x: number; y: number };

export interface Thread {
  pc: number;
  sp: number;
}

export interface Program {
  readonly pattern: string;
  readonly insts: readonly Inst[];
}

export interface RunOptions {
  /** Upper bound on live threads; defaults to THOMPSON_VM_MAX_THREADS or 100000. */
  maxThreads?: number;
  /** Input offset the first thread starts at. */
  start?: number;
}

const encoder = new TextEncoder();

export function toBytes(input: Uint8Array | string): Uint8Array {
  return typeof input === 'string' ? encoder.encode(input) : input;
}

/**
 * Runs `prog` against `input` and reports whether some path reaches `match`
 * having consumed a prefix of the input starting at `options.start`.
 *
 * Threads are scanned in insertion order; a thread whose `(pc, sp)` state
 * has already been executed in this run is dropped.
 */
export function run(
  prog: Program,
  input: Uint8Array | string,
  options: RunOptions = {},
): boolean {
  const data = toBytes(input);
  const maxThreads = options.maxThreads ?? maxThreadsFromEnv();
  const start = options.start ?? 0;
  if (!Number.isInteger(maxThreads) || maxThreads <= 0) {
    throw new RangeError(`maxThreads must be a positive integer: ${maxThreads}`);
  }
  if (!Number.isInteger(start) || start < 0 || start > data.length) {
    throw new RangeError(`start must be an integer in [0, ${data.length}]: ${start}`);
  }
  const width = prog.insts.length;
  const seen = new Set<number>();
  const threads: Thread[] = [{ pc: 0, sp: start }];

  while (threads.length > 0) {
    let i = 0;
    while (i < threads.length) {
      const t = threads[i];
      const state = t.sp * width + t.pc;
      if (seen.has(state)) {
        threads.splice(i, 1);
        continue;
      }
      seen.add(state);

      const inst = prog.insts[t.pc];
      switch (inst.op) {
        case 'char':
          if (t.sp < data.length && data[t.sp] === inst.c) {
            t.pc++;
            t.sp++;
            i++;
          } else {
            threads.splice(i, 1);
          }
          break;

        case 'any':
          if (t.sp < data.length) {
            t.pc++;
            t.sp++;
            i++;
          } else {
            threads.splice(i, 1);
          }
          break;

        case 'match':
          return true;

        // Re-examined at the same index.
        case 'jmp':
          t.pc = inst.to;
          break;

        case 'split':
          if (threads.length >= maxThreads) throw new ThreadLimitError(maxThreads);
          t.pc = inst.x;
          threads.push({ pc: inst.y, sp: t.sp });
          i++;
          break;

        default: {
          const _: never = inst;
          throw new Error(`unknown instruction: ${JSON.stringify(_)}`);
        }
      }
    }
  }

  return false;
}
