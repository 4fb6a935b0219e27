export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export function nowInstant(clock: Clock = systemClock): string {
  return new Date(clock()).toISOString();
}

export function secondsBetween(startMs: number, endMs: number): number {
  return Math.max(0, (endMs - startMs) / 1000);
}
