import { describe, it } from "vitest";
import fc from "fast-check";
import { PokeNode, SpawnRandomNodes } from "../src/core/commands";
import { peers } from "../src/core/peers";
import type { Simulation } from "../src/core/simulation";
import { GENESIS, type NakamotoNodeState } from "../src/protocols/nakamotoConsensus";
import type { BlockHash, Entity } from "../src/types/brands";
import { chainOf, quietSim, withNakamoto } from "./helpers/sim";

const seed = fc.integer({ min: 0, max: 0xffffffff });

const randomDelaunayNetwork = (s: number, size: number): Simulation => {
  const sim = quietSim(s);
  withNakamoto(sim);
  sim.doNow(new SpawnRandomNodes(size));
  sim.catchUp(0);
  sim.makeDelaunayNetwork();
  sim.catchUp(1);
  return sim;
};

const reachable = (sim: Simulation, from: Entity): Set<Entity> => {
  const seen = new Set<Entity>([from]);
  const todo = [from];
  for (let n = todo.pop(); n !== undefined; n = todo.pop()) {
    for (const p of peers(sim, n)) {
      if (seen.has(p)) continue;
      seen.add(p);
      todo.push(p);
    }
  }
  return seen;
};

/** True when every chain head leads back to genesis and together they cover every stored block. */
const connectedToGenesis = (chain: NakamotoNodeState): boolean => {
  const visited = new Set<BlockHash>();
  for (const head of [chain.tip, ...chain.forkTips]) {
    let hash: BlockHash | undefined = head;
    while (hash !== undefined && hash !== GENESIS && !visited.has(hash)) {
      visited.add(hash);
      hash = chain.hashPrev(hash);
    }
    if (hash === undefined) return false;
  }
  return visited.size === chain.blockCount;
};

describe("Property-based tests", () => {
  it("Delaunay networks are symmetric and connected", () => {
    fc.assert(
      fc.property(seed, fc.integer({ min: 3, max: 12 }), (s, size) => {
        const sim = randomDelaunayNetwork(s, size);
        const nodes = sim.nodes();
        const symmetric = nodes.every((n) => [...peers(sim, n)].every((p) => peers(sim, p).has(n)));
        return symmetric && reachable(sim, nodes[0]).size === nodes.length;
      }),
      { numRuns: 25 },
    );
  });

  it("sequential blocks reach every node and extend one chain", () => {
    fc.assert(
      fc.property(seed, fc.integer({ min: 1, max: 20 }), (s, pokes) => {
        const sim = randomDelaunayNetwork(s, 8);
        const nodes = sim.nodes();
        for (let i = 0; i < pokes; i++) {
          const node = sim.pickRandomNode();
          if (node === undefined) return false;
          sim.doNow(new PokeNode(node));
          sim.catchUp(10);
        }
        const tip = chainOf(sim, nodes[0]).tip;
        return nodes.every((n) => {
          const chain = chainOf(sim, n);
          return chain.tip === tip && chain.tipHeight() === pokes && chain.forkTips.size === 0;
        });
      }),
      { numRuns: 10 },
    );
  });

  it("after concurrent mining every stored block is connected to genesis, and one more block reunites the network", () => {
    fc.assert(
      fc.property(seed, (s) => {
        const sim = randomDelaunayNetwork(s, 8);
        const nodes = sim.nodes();
        for (let round = 0; round < 20; round++) {
          for (const node of sim.rng.sample(nodes, 3)) sim.doNow(new PokeNode(node));
          sim.catchUp(0.5);
        }
        sim.catchUp(20);
        if (!nodes.every((n) => connectedToGenesis(chainOf(sim, n)))) return false;

        const height = Math.max(...nodes.map((n) => chainOf(sim, n).tipHeight()));
        if (!nodes.every((n) => chainOf(sim, n).tipHeight() === height)) return false;

        sim.doNow(new PokeNode(nodes[0]));
        sim.catchUp(20);
        const tip = chainOf(sim, nodes[0]).tip;
        return nodes.every(
          (n) =>
            chainOf(sim, n).tip === tip &&
            chainOf(sim, n).tipHeight() === height + 1 &&
            connectedToGenesis(chainOf(sim, n)),
        );
      }),
      { numRuns: 10 },
    );
  });

  it("a node's tip height never goes down", () => {
    fc.assert(
      fc.property(seed, (s) => {
        const sim = randomDelaunayNetwork(s, 6);
        const nodes = sim.nodes();
        const last = new Map<Entity, number>();
        for (let round = 0; round < 8; round++) {
          for (const node of sim.rng.sample(nodes, 2)) sim.doNow(new PokeNode(node));
          for (let step = 0; step < 5; step++) {
            sim.catchUp(0.25);
            for (const n of nodes) {
              const height = chainOf(sim, n).tipHeight();
              if (height < (last.get(n) ?? 0)) return false;
              last.set(n, height);
            }
          }
        }
        return true;
      }),
      { numRuns: 10 },
    );
  });
});
