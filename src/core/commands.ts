import type { Entity } from "../types/brands";
import type { Command, Simulation } from "./simulation";

export { AddPeer, MakeDelaunayNetwork, RemovePeer } from "./peers";

export class SpawnRandomNodes implements Command {
  constructor(readonly count: number) {}

  execute(sim: Simulation): void {
    for (let i = 0; i < this.count; i++) sim.spawnRandomNode();
  }
}

export class SpawnRandomMessages implements Command {
  constructor(readonly count: number) {}

  execute(sim: Simulation): void {
    for (let i = 0; i < this.count; i++) sim.spawnMessageBetweenRandomNodes();
  }
}

/** External stimulus: the node acts without having received anything. */
export class PokeNode implements Command {
  constructor(readonly node: Entity) {}

  execute(sim: Simulation): void {
    sim.scheduleNow({ type: "node", node: this.node, event: { type: "poke" } });
  }
}

export class PokeMultipleRandomNodes implements Command {
  constructor(readonly count: number) {}

  execute(sim: Simulation): void {
    for (const node of sim.rng.sample(sim.nodes(), this.count)) {
      new PokeNode(node).execute(sim);
    }
  }
}
