// ──────────────────────────────────────────────
// MEDIAFORGE - Async Mutex
// Serializes async critical sections on a promise chain
// ──────────────────────────────────────────────

export interface Mutex {
  runExclusive<T>(fn: () => T | Promise<T>): Promise<T>;
  isLocked(): boolean;
}

export function createMutex(): Mutex {
  let tail: Promise<void> = Promise.resolve();
  let holders = 0;

  return {
    runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
      holders += 1;
      const run = tail.then(fn);
      const release = () => {
        holders -= 1;
      };
      tail = run.then(release, release);
      return run;
    },

    isLocked(): boolean {
      return holders > 0;
    },
  };
}
