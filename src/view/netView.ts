import { PeerSet } from "../core/peers";
import { TimeSpan, UnderlayLine, UnderlayPosition } from "../core/underlay";
import type { World } from "../core/world";
import { GENESIS, type NakamotoNodeState } from "../protocols/nakamotoConsensus";
import type { BlockHash, Entity, SimSeconds } from "../types/brands";

/** Where an in-flight message is drawn at `now`, or undefined once it is gone. */
export const messagePosition = (
  world: World,
  message: Entity,
  now: SimSeconds,
): UnderlayPosition | undefined => {
  const line = world.get(message, UnderlayLine);
  const span = world.get(message, TimeSpan);
  if (!line || !span) return undefined;
  const p = span.progressClamped(now);
  return new UnderlayPosition(
    line.start.x + (line.end.x - line.start.x) * p,
    line.start.y + (line.end.y - line.start.y) * p,
  );
};

/* ── edges ───────────────────────────────────────────────── */

/**
 * `leftRight`: only the lower entity lists the higher one as a peer.
 * `phantom`: the link existed at some earlier rebuild but no longer does.
 */
export type EdgeType = "undirected" | "leftRight" | "rightLeft" | "phantom";

export type Edge = {
  readonly left: Entity;
  readonly right: Entity;
  type: EdgeType;
  readonly line: UnderlayLine;
};

const endpoints = (a: Entity, b: Entity): [Entity, Entity] => (a <= b ? [a, b] : [b, a]);
const edgeKey = (a: Entity, b: Entity) => endpoints(a, b).join(":");

/** Cached undirected view of every peer set in the world. */
export class EdgeMap {
  private readonly byKey = new Map<string, Edge>();
  private lastUpdate: SimSeconds = -Infinity;
  // peer-set revisions seen at the last rebuild
  private seen = new Map<Entity, number>();

  static build(world: World, now: SimSeconds): EdgeMap {
    const map = new EdgeMap();
    map.rebuild(world, now);
    return map;
  }

  needsRebuild(world: World): boolean {
    const sets = world.query(PeerSet);
    return (
      sets.length !== this.seen.size ||
      sets.some(([node, set]) => this.seen.get(node) !== set.revision)
    );
  }

  /** Virtual time of the last rebuild. */
  get builtAt(): SimSeconds {
    return this.lastUpdate;
  }

  rebuildIfNeeded(world: World, now: SimSeconds): boolean {
    if (!this.needsRebuild(world)) return false;
    this.rebuild(world, now);
    return true;
  }

  rebuild(world: World, now: SimSeconds): void {
    for (const edge of this.byKey.values()) edge.type = "phantom";

    const seen = new Map<Entity, number>();
    for (const [node, set] of world.query(PeerSet)) {
      seen.set(node, set.revision);
      for (const peer of set) {
        const [left, right] = endpoints(node, peer);
        const directed: EdgeType = left === node ? "leftRight" : "rightLeft";
        const key = edgeKey(node, peer);
        const existing = this.byKey.get(key);
        if (existing) {
          existing.type = existing.type === "phantom" ? directed : "undirected";
        } else if (world.has(node, UnderlayPosition) && world.has(peer, UnderlayPosition)) {
          this.byKey.set(key, {
            left,
            right,
            type: directed,
            line: UnderlayLine.fromNodes(world, node, peer),
          });
        }
      }
    }
    this.seen = seen;
    this.lastUpdate = now;
  }

  edgeType(a: Entity, b: Entity): EdgeType | undefined {
    return this.byKey.get(edgeKey(a, b))?.type;
  }

  edges(): Edge[] {
    return [...this.byKey.values()].sort((a, b) => a.left - b.left || a.right - b.right);
  }
}

/* ── block tree ──────────────────────────────────────────── */

const walkBack = (
  state: NakamotoNodeState,
  from: BlockHash,
  column: Array<BlockHash | undefined>,
  depth: number,
) => {
  let hash: BlockHash | undefined = from;
  while (column.length < depth && hash !== undefined && hash !== GENESIS) {
    column.push(hash);
    hash = state.hashPrev(hash);
  }
  return column;
};

/**
 * The top `maxDepth` rows of a node's block tree as columns: the main chain
 * first, then one column per fork tip less than `maxDepth` below the tip,
 * padded with `undefined` so rows line up by height. Row 0 is the tip's
 * height.
 */
export const blocksCutout = (
  state: NakamotoNodeState,
  maxDepth: number,
): Array<Array<BlockHash | undefined>> => {
  const columns = [walkBack(state, state.tip, [], maxDepth)];
  const tipHeight = state.tipHeight();
  const forks = [...state.forkTips]
    .map((tip) => ({ tip, diff: tipHeight - state.height(tip) }))
    .filter(({ diff }) => diff < maxDepth)
    .sort((a, b) => a.diff - b.diff || (a.tip < b.tip ? -1 : 1));
  for (const { tip, diff } of forks) {
    columns.push(walkBack(state, tip, Array<BlockHash | undefined>(diff).fill(undefined), maxDepth));
  }
  return columns;
};
