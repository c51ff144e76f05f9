// Environment-driven defaults, read once and cached.
export const DEFAULT_MAX_THREADS = 100_000;

let _maxThreads: number | undefined;

export function maxThreadsFromEnv(): number {
  if (_maxThreads === undefined) {
    const v = Number.parseInt(process.env.THOMPSON_VM_MAX_THREADS ?? '', 10);
    _maxThreads = Number.isInteger(v) && v > 0 ? v : DEFAULT_MAX_THREADS;
  }
  return _maxThreads;
}

// For tests only: drop the cached value so the next read sees process.env.
export function __resetConfigCacheForTests__(): void {
  _maxThreads = undefined;
}
