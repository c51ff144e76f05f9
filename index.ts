export { compile, programSize, MAX_GROUP_DEPTH } from './compile';
export { run, toBytes } from './vm';
export type { Inst, Program, RunOptions, Thread } from './vm';
export { search } from './search';
export { formatInst, formatProgram } from './format';
export { CompileError, ThreadLimitError } from './errors';
export type { CompileErrorCode } from './errors';
export { DEFAULT_MAX_THREADS } from './config';
