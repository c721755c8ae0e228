import { describe, it, expect } from "vitest";
import { PokeNode } from "../src/core/commands";
import { SimulationError } from "../src/core/errors";
import { SimRng } from "../src/core/rng";
import { UnderlayPosition } from "../src/core/underlay";
import {
  GENESIS,
  NakamotoNodeState,
  newBlock,
  type Block,
} from "../src/protocols/nakamotoConsensus";
import { asBlockHash } from "../src/types/brands";
import { chainOf, link, lineOfThree, quietSim, withNakamoto } from "./helpers/sim";

const block = (hash: string, prev: string = GENESIS): Block => ({
  hash: asBlockHash(hash),
  hashPrev: asBlockHash(prev),
});

describe("NakamotoNodeState", () => {
  it("starts at genesis", () => {
    const state = new NakamotoNodeState();
    expect(state.tip).toBe(GENESIS);
    expect(state.tipHeight()).toBe(0);
    expect(state.forkTips.size).toBe(0);
    expect(state.hasBlock(GENESIS)).toBe(true);
  });

  it("extends the tip", () => {
    const state = new NakamotoNodeState();
    expect(state.registerBlock(block("b1"))).toBe(true);
    expect(state.registerBlock(block("b2", "b1"))).toBe(true);
    expect(state.tip).toBe("b2");
    expect(state.tipHeight()).toBe(2);
    expect(state.hashPrev(asBlockHash("b2"))).toBe("b1");
  });

  it("ignores a block it already has", () => {
    const state = new NakamotoNodeState();
    state.registerBlock(block("b1"));
    expect(state.registerBlock(block("b1"))).toBe(false);
    expect(state.blockCount).toBe(1);
    expect(state.tip).toBe("b1");
  });

  it("drops blocks whose parent is unknown", () => {
    const state = new NakamotoNodeState();
    expect(state.registerBlock(block("orphan", "missing"))).toBe(false);
    expect(state.hasBlock(asBlockHash("orphan"))).toBe(false);
    expect(state.tip).toBe(GENESIS);
  });

  it("keeps the first of two equally long chains", () => {
    const state = new NakamotoNodeState();
    state.registerBlock(block("a1"));
    expect(state.registerBlock(block("b1"))).toBe(false);
    expect(state.tip).toBe("a1");
    expect([...state.forkTips]).toEqual(["b1"]);
  });

  it("switches to a longer fork and keeps the old tip as a fork", () => {
    const state = new NakamotoNodeState();
    state.registerBlock(block("a1"));
    state.registerBlock(block("b1"));
    expect(state.registerBlock(block("b2", "b1"))).toBe(true);
    expect(state.tip).toBe("b2");
    expect([...state.forkTips]).toEqual(["a1"]);
  });

  it("rejects height queries for unknown blocks", () => {
    const state = new NakamotoNodeState();
    let caught: unknown;
    try {
      state.height(asBlockHash("ff".repeat(32)));
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(SimulationError);
    expect(caught).toMatchObject({ kind: "UnknownBlock" });
  });

  it("lists blocks lowest first", () => {
    const state = new NakamotoNodeState();
    state.registerBlock(block("a1"));
    state.registerBlock(block("a2", "a1"));
    state.registerBlock(block("b1"));
    expect(state.allBlocksSorted().map((b) => b.hash)).toEqual(["a1", "b1", "a2"]);
  });

  it("mints 32-byte hex ids", () => {
    const b = newBlock(GENESIS, new SimRng(3));
    expect(b.hash).toMatch(/^[0-9a-f]{64}$/);
    expect(b.hashPrev).toBe(GENESIS);
  });
});

describe("NakamotoConsensus", () => {
  it("distributes a found block to every node", () => {
    const sim = quietSim();
    withNakamoto(sim);
    const nodes = lineOfThree(sim);
    sim.catchUp(1);

    sim.doNow(new PokeNode(nodes[0]));
    sim.catchUp(10);

    const tip = chainOf(sim, nodes[0]).tip;
    expect(tip).not.toBe(GENESIS);
    for (const n of nodes) {
      expect(chainOf(sim, n).tip).toBe(tip);
      expect(chainOf(sim, n).tipHeight()).toBe(1);
    }
    expect(sim.messageLog.map((e) => e.text)).toContain("a: Got poked, so I found a new block!");
  });

  it("registers concurrent blocks as forks, then resolves them", () => {
    const sim = quietSim();
    withNakamoto(sim);
    const [a, b, c] = lineOfThree(sim);
    sim.catchUp(1);

    sim.doNow(new PokeNode(a));
    sim.doNow(new PokeNode(c));
    sim.catchUp(10);

    const tipA = chainOf(sim, a).tip;
    const tipC = chainOf(sim, c).tip;
    expect(tipA).not.toBe(tipC);
    expect([...chainOf(sim, a).forkTips]).toEqual([tipC]);
    expect([...chainOf(sim, c).forkTips]).toEqual([tipA]);
    // b heard from a first
    expect(chainOf(sim, b).tip).toBe(tipA);

    sim.doNow(new PokeNode(a));
    sim.catchUp(10);

    const tip = chainOf(sim, a).tip;
    for (const n of [a, b, c]) {
      expect(chainOf(sim, n).tip).toBe(tip);
      expect(chainOf(sim, n).tipHeight()).toBe(2);
    }
    expect([...chainOf(sim, c).forkTips]).toEqual([tipC]);
  });

  it("recovers from a network split", () => {
    const sim = quietSim();
    withNakamoto(sim);
    const a = sim.spawnNode("a", new UnderlayPosition(0, 0));
    const b = sim.spawnNode("b", new UnderlayPosition(300, 0));

    for (let i = 0; i < 3; i++) sim.doNow(new PokeNode(a));
    for (let i = 0; i < 2; i++) sim.doNow(new PokeNode(b));
    sim.catchUp(10);
    expect(chainOf(sim, a).tipHeight()).toBe(3);
    expect(chainOf(sim, b).tipHeight()).toBe(2);

    link(sim, a, b);
    sim.catchUp(10);
    sim.catchUp(10);

    expect(chainOf(sim, b).tip).toBe(chainOf(sim, a).tip);
    expect(chainOf(sim, b).tipHeight()).toBe(3);
    expect(chainOf(sim, a).forkTips.size).toBe(1);
    expect(chainOf(sim, b).forkTips.size).toBe(1);
  });

  it("gets a new block past a peer that left the world", () => {
    const sim = quietSim();
    withNakamoto(sim);
    const a = sim.spawnNode("a", new UnderlayPosition(0, 0));
    const gone = sim.spawnNode("gone", new UnderlayPosition(100, 0));
    const c = sim.spawnNode("c", new UnderlayPosition(0, 100));
    link(sim, a, gone);
    link(sim, a, c);
    sim.catchUp(1);
    sim.world.despawn(gone);

    sim.doNow(new PokeNode(a));
    sim.catchUp(10);

    expect(chainOf(sim, a).tipHeight()).toBe(1);
    expect(chainOf(sim, c).tip).toBe(chainOf(sim, a).tip);
  });

  it("resends the whole chain when an existing peer is added again", () => {
    const sim = quietSim();
    withNakamoto(sim);
    const a = sim.spawnNode("a", new UnderlayPosition(0, 0));
    const b = sim.spawnNode("b", new UnderlayPosition(100, 0));
    link(sim, a, b);
    sim.catchUp(1);

    // blocks b never heard of
    const chain = chainOf(sim, a);
    chain.registerBlock(block("a1"));
    chain.registerBlock(block("a2", "a1"));
    sim.catchUp(10);
    expect(chainOf(sim, b).tip).toBe(GENESIS);

    sim.addPeer(a, b);
    sim.catchUp(10);
    expect(chainOf(sim, b).tip).toBe("a2");
    expect(chainOf(sim, b).tipHeight()).toBe(2);
  });

  it("replays the same run for the same seed", () => {
    const run = () => {
      const sim = quietSim(99);
      withNakamoto(sim);
      const [a, , c] = lineOfThree(sim);
      sim.doNow(new PokeNode(a));
      sim.catchUp(3);
      sim.doNow(new PokeNode(c));
      sim.catchUp(3);
      return chainOf(sim, a).tip;
    };
    expect(run()).toBe(run());
  });
});
