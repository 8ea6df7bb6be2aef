export interface TimerHandle {
  cancel(): void;
}

/**
 * Time source for every deadline, poll and debounce in the engine.
 */
export interface ClockPort {
  /** Wall clock in milliseconds. */
  now(): number;
  sleep(ms: number): Promise<void>;
  setTimer(ms: number, callback: () => void): TimerHandle;
}
