import type pino from "pino";
import type { Entity, SimSeconds } from "../types/brands";
import { peers, type PeerSet, type PeerSetUpdate } from "./peers";
import type { SimRng } from "./rng";
import type { EventHandler, SimEvent, Simulation } from "./simulation";
import { UnderlayMessage } from "./underlay";
import type { ComponentType } from "./world";

/**
 * A protocol reacts to three things happening at a node. It keeps no
 * per-node state of its own: everything lives in the node's components.
 * Failures are thrown and handled by the simulation.
 */
export interface Protocol<P> {
  readonly name: string;
  /** Component class carried by this protocol's messages. */
  readonly payloadType: ComponentType<P>;
  handleMessage(node: NodeInterface, message: UnderlayMessage, payload: P): void;
  handlePoke(node: NodeInterface): void;
  handlePeerSetUpdate(node: NodeInterface, update: PeerSetUpdate): void;
}

/** What a protocol may touch while acting for one node. */
export class NodeInterface {
  private nodeLog?: pino.Logger;

  constructor(
    readonly sim: Simulation,
    readonly node: Entity,
  ) {}

  /** The node's component of the given class, created on first access. */
  get<T extends object>(type: new () => T): T {
    const existing = this.sim.world.get(this.node, type);
    if (existing !== undefined) return existing;
    const created = new type();
    this.sim.world.insert(this.node, created);
    return created;
  }

  peers(): PeerSet {
    return peers(this.sim, this.node);
  }

  now(): SimSeconds {
    return this.sim.now();
  }

  rng(): SimRng {
    return this.sim.rng;
  }

  name(): string {
    return this.sim.name(this.node);
  }

  logger(): pino.Logger {
    this.nodeLog ??= this.sim.logger.child({ node: this.name() });
    return this.nodeLog;
  }

  /** Notes something in the simulation's message log. */
  log(text: string): void {
    this.sim.record(`${this.name()}: ${text}`);
    this.logger().info({ t: this.now() }, text);
  }

  sendMessage(dest: Entity, payload: object): Entity {
    return this.sim.spawnMessage(this.node, dest, payload);
  }
}

/** Runs `protocol` for whichever node an event targets. */
export class InvokeProtocolForAllNodes<P> implements EventHandler {
  readonly name: string;

  constructor(readonly protocol: Protocol<P>) {
    this.name = protocol.name;
  }

  handleEvent(sim: Simulation, event: SimEvent): void {
    switch (event.type) {
      case "messageArrived": {
        const payload = sim.world.get(event.message, this.protocol.payloadType);
        const envelope = sim.world.get(event.message, UnderlayMessage);
        if (payload === undefined || !envelope || !sim.world.contains(envelope.dest)) return;
        this.protocol.handleMessage(new NodeInterface(sim, envelope.dest), envelope, payload);
        return;
      }
      case "node": {
        if (!sim.world.contains(event.node)) return;
        const node = new NodeInterface(sim, event.node);
        if (event.event.type === "poke") this.protocol.handlePoke(node);
        else this.protocol.handlePeerSetUpdate(node, event.event.update);
        return;
      }
      case "command":
        return;
    }
  }
}
