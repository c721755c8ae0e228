import TinyQueue from "tinyqueue";
import type { SimSeconds } from "../types/brands";
import { SimulationError } from "./errors";

type TimedEvent<E> = {
  readonly time: SimSeconds;
  readonly seq: number;
  readonly event: E;
};

// earliest due first, scheduling order on ties
const byDueTime = <E>(a: TimedEvent<E>, b: TimedEvent<E>) =>
  a.time !== b.time ? a.time - b.time : a.seq - b.seq;

/**
 * Virtual clock plus due-time ordered event queue.
 *
 * There is no cancellation: once scheduled an event always fires, and the
 * dispatcher decides what a stale event means.
 */
export class Scheduler<E> {
  private readonly queue = new TinyQueue<TimedEvent<E>>([], byDueTime);
  private clock: SimSeconds = 0;
  private seq = 0;

  now(): SimSeconds {
    return this.clock;
  }

  get pending(): number {
    return this.queue.length;
  }

  peekTime(): SimSeconds | undefined {
    return this.queue.peek()?.time;
  }

  schedule(due: SimSeconds, event: E): void {
    if (due < this.clock) throw SimulationError.scheduleInPast(due, this.clock);
    this.queue.push({ time: due, seq: this.seq++, event });
  }

  /**
   * Dispatches every event due at or before `target`, moving the clock to
   * each event's due time, then leaves the clock at `target`.
   * Returns the number of dispatched events.
   */
  catchUp(target: SimSeconds, dispatch: (event: E, time: SimSeconds) => void): number {
    let dispatched = 0;
    for (let next = this.queue.peek(); next && next.time <= target; next = this.queue.peek()) {
      this.queue.pop();
      this.clock = next.time;
      dispatched++;
      dispatch(next.event, next.time);
    }
    this.clock = Math.max(this.clock, target);
    return dispatched;
  }
}
