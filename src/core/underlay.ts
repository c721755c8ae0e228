import type { Entity, SimSeconds } from "../types/brands";
import { SimulationError } from "./errors";
import type { World } from "./world";

/* ── node components ─────────────────────────────────────── */

export class UnderlayNodeName {
  constructor(readonly name: string) {}
}

export class UnderlayPosition {
  constructor(
    readonly x: number,
    readonly y: number,
  ) {}

  static distance(a: UnderlayPosition, b: UnderlayPosition): number {
    return Math.hypot(b.x - a.x, b.y - a.y);
  }
}

/* ── message components ──────────────────────────────────── */

/** Transport envelope of an in-flight message. */
export class UnderlayMessage {
  constructor(
    readonly source: Entity,
    readonly dest: Entity,
  ) {}
}

/** Half-open `[start, end)` interval of virtual time. */
export class TimeSpan {
  constructor(
    readonly start: SimSeconds,
    readonly end: SimSeconds,
  ) {}

  progress(now: SimSeconds): number {
    const length = this.end - this.start;
    return length > 0 ? (now - this.start) / length : 1;
  }

  progressClamped(now: SimSeconds): number {
    return Math.min(1, Math.max(0, this.progress(now)));
  }
}

export class UnderlayLine {
  constructor(
    readonly start: UnderlayPosition,
    readonly end: UnderlayPosition,
  ) {}

  static fromNodes(world: World, from: Entity, to: Entity): UnderlayLine {
    const start = world.get(from, UnderlayPosition);
    if (!start) throw SimulationError.unknownEntity(from);
    const end = world.get(to, UnderlayPosition);
    if (!end) throw SimulationError.unknownEntity(to);
    return new UnderlayLine(start, end);
  }
}

/** Marker for the protocol-less chatter spawned by `SpawnRandomMessages`. */
export class RandomMessage {}
