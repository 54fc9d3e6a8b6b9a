import { setTimeout } from 'node:timers/promises';

export type Sleeper = (milliseconds: number, signal?: AbortSignal) => Promise<void>;

export const SLEEPER = Symbol('SLEEPER');

export const defaultSleeper: Sleeper = async (milliseconds, signal) => {
  await setTimeout(milliseconds, undefined, { signal });
};
