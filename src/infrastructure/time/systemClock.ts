import { setTimeout as delay } from 'node:timers/promises';
import type { ClockPort, TimerHandle } from '@/ports/ClockPort';

export const systemClock: ClockPort = {
  now: () => Date.now(),
  sleep: async (ms: number) => {
    await delay(ms);
  },
  setTimer: (ms: number, callback: () => void): TimerHandle => {
    const timer = setTimeout(callback, ms);
    return {
      cancel: () => clearTimeout(timer),
    };
  },
};
