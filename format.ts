import type { Inst, Program } from './vm';

export function formatInst(inst: Inst): string {
  switch (inst.op) {
    case 'char':
      return `char ${JSON.stringify(String.fromCharCode(inst.c))}`;
    case 'any':
      return 'any';
    case 'match':
      return 'match';
    case 'jmp':
      return `jmp ${inst.to}`;
    case 'split':
      return `split ${inst.x}, ${inst.y}`;
    default: {
      const _: never = inst;
      throw new Error(`unknown instruction: ${JSON.stringify(_)}`);
    }
  }
}

/** One `  <index>: <instruction>` line per instruction. */
export function formatProgram(prog: Program): string[] {
  return prog.insts.map((inst, idx) => `  ${idx}: ${formatInst(inst)}`);
}
