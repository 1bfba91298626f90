/**
 * The single source of "now". Tests pin it with `vi.spyOn(clock, 'now')`.
 */
export const clock = {
  now(): Date {
    return new Date();
  },
  isoNow(): string {
    return clock.now().toISOString();
  },
  elapsedMs(since: Date): number {
    return clock.now().getTime() - since.getTime();
  },
};
