/**
 * Source of the current time, injectable for tests
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export function secondsBetween(from: Date, to: Date): number {
  return Math.max(0, (to.getTime() - from.getTime()) / 1000);
}
