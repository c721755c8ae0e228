import type pino from "pino";
import { loadConfig, type SimulationConfig, type SimulationConfigInput } from "../config";
import { makeLogger } from "../logging";
import type { Entity, SimSeconds } from "../types/brands";
import { SimulationError, isSimulationError } from "./errors";
import {
  addPeer,
  addRandomNodesAsPeers,
  makeDelaunayNetwork,
  PeerSet,
  removePeer,
  type PeerSetUpdate,
} from "./peers";
import { randomSeed, SimRng } from "./rng";
import { Scheduler } from "./scheduler";
import {
  RandomMessage,
  TimeSpan,
  UnderlayLine,
  UnderlayMessage,
  UnderlayNodeName,
  UnderlayPosition,
} from "./underlay";
import { World } from "./world";

/* ── events ──────────────────────────────────────────────── */

export type NodeEvent =
  | { type: "poke" }
  | { type: "peerSetChanged"; update: PeerSetUpdate };

export type SimEvent =
  | { type: "messageArrived"; message: Entity }
  | { type: "node"; node: Entity; event: NodeEvent }
  | { type: "command"; command: Command };

/** A discrete operator instruction, executed at the time it is dispatched. */
export interface Command {
  execute(sim: Simulation): void;
}

/** Installed on a simulation; sees every message arrival and node event. */
export interface EventHandler {
  readonly name: string;
  handleEvent(sim: Simulation, event: SimEvent): void;
}

export type LogEntry = { readonly time: SimSeconds; readonly text: string };

export type SimulationOptions = SimulationConfigInput & {
  logger?: pino.Logger;
  env?: Record<string, string | undefined>;
};

/* ── simulation ──────────────────────────────────────────── */

export class Simulation {
  readonly config: SimulationConfig;
  readonly world = new World();
  readonly rng: SimRng;
  readonly logger: pino.Logger;
  /** Newest first, capped at `config.messageLogSize`. */
  readonly messageLog: LogEntry[] = [];
  private readonly scheduler = new Scheduler<SimEvent>();
  private readonly handlers: EventHandler[] = [];

  constructor(options: SimulationOptions = {}) {
    const { logger, env, ...overrides } = options;
    this.config = loadConfig(overrides, env ?? process.env);
    this.rng = new SimRng(this.config.seed ?? randomSeed());
    this.logger = logger ?? makeLogger(this.config.logLevel, this.config.logPretty);
    this.logger.debug({ seed: this.rng.seed }, "simulation created");
  }

  now(): SimSeconds {
    return this.scheduler.now();
  }

  get pendingEvents(): number {
    return this.scheduler.pending;
  }

  get underlayWidth(): number {
    return this.config.underlayWidth;
  }

  get underlayHeight(): number {
    return this.config.underlayHeight;
  }

  addEventHandler(handler: EventHandler): void {
    this.handlers.push(handler);
  }

  /* ── scheduling ─────────────────────────────────────────── */

  schedule(due: SimSeconds, event: SimEvent): void {
    this.scheduler.schedule(due, event);
  }

  scheduleNow(event: SimEvent): void {
    this.scheduler.schedule(this.now(), event);
  }

  doNow(command: Command): void {
    this.scheduleNow({ type: "command", command });
  }

  /** Advances the clock by `elapsed` seconds, processing everything due. */
  catchUp(elapsed: SimSeconds): number {
    return this.workUntil(this.now() + elapsed);
  }

  workUntil(target: SimSeconds): number {
    return this.scheduler.catchUp(target, (event) => this.applyEvent(event));
  }

  /* ── nodes ──────────────────────────────────────────────── */

  spawnNode(name: string, position: UnderlayPosition): Entity {
    return this.world.spawn(new UnderlayNodeName(name), position, new PeerSet());
  }

  spawnRandomNode(): Entity {
    const buffer = this.config.nodeBufferZone;
    const name = `node${String(this.rng.int(10_000)).padStart(4, "0")}`;
    const position = new UnderlayPosition(
      this.rng.float(buffer, this.underlayWidth - buffer),
      this.rng.float(buffer, this.underlayHeight - buffer),
    );
    return this.spawnNode(name, position);
  }

  nodes(): Entity[] {
    return this.world.entitiesWith(UnderlayNodeName, UnderlayPosition);
  }

  allOtherNodes(node: Entity): Entity[] {
    return this.nodes().filter((n) => n !== node);
  }

  pickRandomNode(): Entity | undefined {
    return this.rng.choose(this.nodes());
  }

  name(entity: Entity): string {
    return this.world.get(entity, UnderlayNodeName)?.name ?? `#${entity}`;
  }

  /* ── topology ───────────────────────────────────────────── */

  addPeer(node: Entity, peer: Entity): void {
    addPeer(this, node, peer);
  }

  removePeer(node: Entity, peer: Entity): void {
    removePeer(this, node, peer);
  }

  makeDelaunayNetwork(): void {
    makeDelaunayNetwork(this);
  }

  addRandomNodesAsPeers(node: Entity, min: number, max: number): void {
    addRandomNodesAsPeers(this, node, min, max);
  }

  /* ── messages ───────────────────────────────────────────── */

  /**
   * Puts a message in flight from `source` to `dest`; it arrives after the
   * underlay distance divided by `flightPerSecond`.
   */
  spawnMessage(source: Entity, dest: Entity, ...payload: object[]): Entity {
    const line = UnderlayLine.fromNodes(this.world, source, dest);
    const start = this.now();
    const end = start + UnderlayPosition.distance(line.start, line.end) / this.config.flightPerSecond;
    const message = this.world.spawn(
      new UnderlayMessage(source, dest),
      new TimeSpan(start, end),
      line,
      // where it left from; messagePosition gives the live one
      new UnderlayPosition(line.start.x, line.start.y),
      ...payload,
    );
    this.schedule(end, { type: "messageArrived", message });
    return message;
  }

  spawnMessageBetweenRandomNodes(): Entity | undefined {
    const [source, dest] = this.rng.sample(this.nodes(), 2);
    if (source === undefined || dest === undefined) {
      this.logger.warn({ t: this.now() }, "need two nodes for a random message");
      return undefined;
    }
    return this.spawnRandomMessage(source, dest);
  }

  spawnMessageToRandomNode(source: Entity): Entity | undefined {
    const dest = this.rng.choose(this.allOtherNodes(source));
    if (dest === undefined) return undefined;
    return this.spawnRandomMessage(source, dest);
  }

  private spawnRandomMessage(source: Entity, dest: Entity): Entity {
    this.record(`${this.name(source)}: Sending a message to ${this.name(dest)}`);
    return this.spawnMessage(source, dest, new RandomMessage());
  }

  /* ── logging ────────────────────────────────────────────── */

  record(text: string, time: SimSeconds = this.now()): void {
    this.messageLog.unshift({ time, text });
    this.messageLog.length = Math.min(this.messageLog.length, this.config.messageLogSize);
  }

  /* ── dispatch ───────────────────────────────────────────── */

  private applyEvent(event: SimEvent): void {
    switch (event.type) {
      case "command":
        this.runCommand(event.command);
        return;

      case "messageArrived": {
        const envelope = this.world.get(event.message, UnderlayMessage);
        if (!envelope) return;
        this.logger.debug(
          { t: this.now(), node: this.name(envelope.dest), from: this.name(envelope.source) },
          "message arrived",
        );
        this.dispatch(event, envelope.dest);
        if (this.world.has(event.message, RandomMessage)) {
          this.record(`${this.name(envelope.dest)}: Got message from ${this.name(envelope.source)}`);
          if (this.world.contains(envelope.dest)) this.spawnMessageToRandomNode(envelope.dest);
        }
        this.world.despawn(event.message);
        return;
      }

      case "node":
        if (!this.world.contains(event.node)) return;
        this.dispatch(event, event.node);
        return;
    }
  }

  private dispatch(event: SimEvent, node: Entity): void {
    for (const handler of this.handlers) {
      try {
        handler.handleEvent(this, event);
      } catch (e) {
        const err = isSimulationError(e) ? e : SimulationError.protocolFailure(handler.name, e);
        this.logger.error(
          { t: this.now(), node: this.name(node), event: event.type, handler: handler.name, err },
          "event handler failed",
        );
      }
    }
  }

  private runCommand(command: Command): void {
    try {
      command.execute(this);
    } catch (e) {
      this.logger.error(
        { t: this.now(), command: command.constructor.name, err: e },
        "command failed",
      );
    }
  }
}
