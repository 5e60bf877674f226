/**
 * packages/testkit/src/eventLog.ts — Ordered event recording for lifecycle tests.
 *
 * Tests push short strings ("init:A", "dispose:B") from hooks and compare the
 * whole sequence at once.
 */

export type EventLog = Readonly<{
  push: (event: string) => void;
  /** Events recorded since the last `take`, then clears them. */
  take: () => string[];
  /** Every event recorded since the last `clear`. */
  all: () => readonly string[];
  /** Number of recorded events that equal `event`. */
  count: (event: string) => number;
  clear: () => void;
}>;

export function createEventLog(): EventLog {
  const events: string[] = [];
  let taken = 0;
  return Object.freeze({
    push(event: string): void {
      events.push(event);
    },
    take(): string[] {
      const out = events.slice(taken);
      taken = events.length;
      return out;
    },
    all: () => events,
    count: (event: string) => events.filter((e) => e === event).length,
    clear(): void {
      events.length = 0;
      taken = 0;
    },
  });
}
