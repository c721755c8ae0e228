import Delaunator from "delaunator";
import type { Entity, SimSeconds } from "../types/brands";
import { SimulationError } from "./errors";
import type { Command, Simulation } from "./simulation";
import { UnderlayNodeName, UnderlayPosition } from "./underlay";

export type PeerSetUpdate =
  | { type: "peerAdded"; peer: Entity }
  | { type: "peerRemoved"; peer: Entity };

/**
 * The peers a node talks to. Symmetry is not enforced here: linking two
 * nodes both ways takes two inserts.
 */
export class PeerSet {
  private readonly peers = new Set<Entity>();
  // lets observers notice topology changes without diffing
  private lastUpdateTime: SimSeconds = 0;
  private changes = 0;

  static from(peers: Iterable<Entity>): PeerSet {
    const set = new PeerSet();
    for (const p of peers) set.peers.add(p);
    return set;
  }

  insert(peer: Entity, now: SimSeconds): boolean {
    if (this.peers.has(peer)) return false;
    this.peers.add(peer);
    this.lastUpdateTime = now;
    this.changes++;
    return true;
  }

  remove(peer: Entity, now: SimSeconds): boolean {
    if (!this.peers.delete(peer)) return false;
    this.lastUpdateTime = now;
    this.changes++;
    return true;
  }

  has(peer: Entity): boolean {
    return this.peers.has(peer);
  }

  get size(): number {
    return this.peers.size;
  }

  get lastUpdate(): SimSeconds {
    return this.lastUpdateTime;
  }

  /** Number of changes so far; tells apart updates made at the same instant. */
  get revision(): number {
    return this.changes;
  }

  /** Peers in ascending entity order. */
  toArray(): Entity[] {
    return [...this.peers].sort((a, b) => a - b);
  }

  [Symbol.iterator](): Iterator<Entity> {
    return this.toArray()[Symbol.iterator]();
  }
}

/** The node's peer set, attached on first use. */
export const peers = (sim: Simulation, node: Entity): PeerSet => {
  const existing = sim.world.get(node, PeerSet);
  if (existing) return existing;
  const created = new PeerSet();
  sim.world.insert(node, created);
  return created;
};

/* ── single edges ────────────────────────────────────────── */

/**
 * Links `node` to `peer` and notifies the node at the current instant. The
 * notification is sent even when the link already existed, so re-adding a
 * peer makes protocols resynchronise with it; only an actual change stamps
 * the peer set.
 */
export const addPeer = (sim: Simulation, node: Entity, peer: Entity): void => {
  if (peers(sim, node).insert(peer, sim.now())) {
    sim.logger.debug({ t: sim.now(), node: sim.name(node), peer: sim.name(peer) }, "peer added");
  }
  sim.scheduleNow({
    type: "node",
    node,
    event: { type: "peerSetChanged", update: { type: "peerAdded", peer } },
  });
};

export const removePeer = (sim: Simulation, node: Entity, peer: Entity): void => {
  if (peers(sim, node).remove(peer, sim.now())) {
    sim.logger.debug({ t: sim.now(), node: sim.name(node), peer: sim.name(peer) }, "peer removed");
  }
  sim.scheduleNow({
    type: "node",
    node,
    event: { type: "peerSetChanged", update: { type: "peerRemoved", peer } },
  });
};

/* ── whole-network topologies ────────────────────────────── */

/**
 * Replaces every node's peers with its Delaunay neighbours, linked both ways.
 * Every neighbour link is (re)announced, kept ones included. Nothing is
 * changed when the positions admit no triangulation.
 */
export const makeDelaunayNetwork = (sim: Simulation): void => {
  const rows = sim.world.query(UnderlayNodeName, UnderlayPosition);
  const nodes = rows.map(([node]) => node);
  if (nodes.length < 3) throw SimulationError.noTriangulation(nodes.length);

  const coords = new Float64Array(nodes.length * 2);
  rows.forEach(([, , pos], i) => {
    coords[2 * i] = pos.x;
    coords[2 * i + 1] = pos.y;
  });
  const { triangles } = new Delaunator(coords);
  if (triangles.length === 0) throw SimulationError.noTriangulation(nodes.length);

  const neighbours = new Map<Entity, Set<Entity>>(nodes.map((n) => [n, new Set()]));
  for (let i = 0; i < triangles.length; i += 3) {
    const corners = [nodes[triangles[i]], nodes[triangles[i + 1]], nodes[triangles[i + 2]]];
    for (const a of corners) {
      for (const b of corners) {
        if (a !== b) neighbours.get(a)?.add(b);
      }
    }
  }

  for (const node of nodes) {
    const wanted = neighbours.get(node) ?? new Set<Entity>();
    for (const peer of peers(sim, node)) {
      if (!wanted.has(peer)) removePeer(sim, node, peer);
    }
    for (const peer of [...wanted].sort((a, b) => a - b)) addPeer(sim, node, peer);
  }
  sim.logger.info({ t: sim.now(), nodes: nodes.length }, "delaunay network built");
};

/**
 * Peers `node` one-directionally with a random number in `[min, max)` of
 * nodes it is not yet peered with. Both bounds are clamped to the number
 * of candidates.
 */
export const addRandomNodesAsPeers = (
  sim: Simulation,
  node: Entity,
  min: number,
  max: number,
): void => {
  const current = peers(sim, node);
  const candidates = sim.allOtherNodes(node).filter((n) => !current.has(n));
  const count = sim.rng.range(
    Math.min(min, candidates.length),
    Math.min(max, candidates.length),
  );
  for (const peer of sim.rng.sample(candidates, count)) addPeer(sim, node, peer);
};

/* ── commands ────────────────────────────────────────────── */

export class AddPeer implements Command {
  constructor(
    readonly node: Entity,
    readonly peer: Entity,
  ) {}

  execute(sim: Simulation): void {
    addPeer(sim, this.node, this.peer);
  }
}

export class RemovePeer implements Command {
  constructor(
    readonly node: Entity,
    readonly peer: Entity,
  ) {}

  execute(sim: Simulation): void {
    removePeer(sim, this.node, this.peer);
  }
}

export class MakeDelaunayNetwork implements Command {
  execute(sim: Simulation): void {
    makeDelaunayNetwork(sim);
  }
}
