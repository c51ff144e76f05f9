import { CompileError } from './errors';
import { formatProgram } from './format';
import type { Inst, Program } from './vm';

export const MAX_GROUP_DEPTH = 10;

/**
 * Instruction count `compile` emits for `pattern`: one per literal, `.`,
 * `+` and `|`, two per `*`, none for parentheses, plus the final `match`.
 */
export function programSize(pattern: string): number {
  let size = 1;
  for (const c of pattern) {
    switch (c) {
      case '(':
      case ')':
        break;
      case '*':
        size += 2;
        break;
      default:
        size += 1;
    }
  }
  return size;
}

function bump(target: number, from: number): number {
  return target >= from ? target + 1 : target;
}

// Rewrites targets for an instruction that moved one slot to the right,
// along with everything at or after `from`.
function relocate(inst: Inst, from: number): Inst {
  switch (inst.op) {
    case 'split':
      return { op: 'split', x: bump(inst.x, from), y: bump(inst.y, from) };
    case 'jmp':
      return { op: 'jmp', to: bump(inst.to, from) };
    default:
      return inst;
  }
}

export function compile(pattern: string): Program {
  const insts: Inst[] = [];
  const groups: number[] = [];
  // Start of the sub-expression the next quantifier or `|` applies to.
  let atom: number | undefined;

  function emit(inst: Inst): number {
    insts.push(inst);
    return insts.length - 1;
  }

  function operand(c: string, pos: number): number {
    if (atom === undefined || atom === insts.length) {
      throw new CompileError('E_NOTHING_TO_REPEAT', `nothing to repeat before ${c}`, pos);
    }
    return atom;
  }

  // Shifts [mark, end) one slot right and leaves a placeholder split at mark.
  function openSlot(mark: number): void {
    const body = insts.splice(mark).map((inst) => relocate(inst, mark));
    emit({ op: 'split', x: 0, y: 0 });
    body.forEach((inst) => emit(inst));
  }

  for (let pos = 0; pos < pattern.length; pos++) {
    const c = pattern[pos];

    switch (c) {
      case '(':
        if (groups.length === MAX_GROUP_DEPTH) {
          throw new CompileError('E_GROUP_DEPTH', `groups nested deeper than ${MAX_GROUP_DEPTH}`, pos);
        }
        groups.push(insts.length);
        atom = undefined;
        break;

      case ')': {
        const start = groups.pop();
        if (start === undefined) throw new CompileError('E_UNMATCHED_PAREN', 'unmatched )', pos);
        atom = start;
        break;
      }

      case '+': {
        const mark = operand(c, pos);
        emit({ op: 'split', x: mark, y: insts.length + 1 });
        break;
      }

      case '*': {
        const mark = operand(c, pos);
        openSlot(mark);
        insts[mark] = { op: 'split', x: mark + 1, y: insts.length + 1 };
        emit({ op: 'jmp', to: mark });
        break;
      }

      case '|': {
        const mark = operand(c, pos);
        openSlot(mark);
        insts[mark] = { op: 'split', x: mark + 1, y: insts.length };
        break;
      }

      case '.':
        atom = emit({ op: 'any' });
        break;

      default: {
        const code = pattern.charCodeAt(pos);
        if (code > 0x7f) {
          throw new CompileError('E_UNSUPPORTED_CHAR', `unsupported character ${JSON.stringify(c)}`, pos);
        }
        atom = emit({ op: 'char', c: code });
      }
    }
  }

  emit({ op: 'match' });

  return { pattern, insts };
}

if (import.meta.url === `file://${process.argv[1]}`) {
  const tests = ['abc', 'a.c', 'ab*c', 'ab+c', 'c(ab)*c', 'a|b'];

  for (const pattern of tests) {
    console.log(`\n"${pattern}":`);
    for (const line of formatProgram(compile(pattern))) console.log(line);
    console.log(`  size: ${programSize(pattern)}`);
  }
}
