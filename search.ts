import { type Program, type RunOptions, run, toBytes } from './vm';

/**
 * Returns the first input offset at which `prog` matches, trying every
 * offset from 0 through `input.length`, or -1 when none does.
 */
export function search(
  prog: Program,
  input: Uint8Array | string,
  options: Omit<RunOptions, 'start'> = {},
): number {
  const data = toBytes(input);
  for (let start = 0; start <= data.length; start++) {
    if (run(prog, data, { ...options, start })) return start;
  }
  return -1;
}
