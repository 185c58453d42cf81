export type Cancel = () => void;

// Time source for the engine. Tests drive it through vi.useFakeTimers().
export interface Clock {
  now(): number;
  every(intervalMs: number, task: () => void): Cancel;
  after(delayMs: number, task: () => void): Cancel;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  every: (intervalMs, task) => {
    const id = setInterval(task, intervalMs);
    return () => clearInterval(id);
  },
  after: (delayMs, task) => {
    const id = setTimeout(task, delayMs);
    return () => clearTimeout(id);
  },
};
