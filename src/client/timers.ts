export interface Timers {
  setTimeout(callback: () => void, ms: number): void;
  /** Returns a function that cancels the interval. */
  setInterval(callback: () => void, ms: number): () => void;
}

export const globalTimers: Timers = {
  setTimeout: (callback, ms) => {
    globalThis.setTimeout(callback, ms);
  },
  setInterval: (callback, ms) => {
    const id = globalThis.setInterval(callback, ms);
    return () => globalThis.clearInterval(id);
  },
};
