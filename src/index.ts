export { loadConfig, configFromEnv, simulationConfigSchema } from "./config";
export type { SimulationConfig, SimulationConfigInput } from "./config";
export { makeLogger } from "./logging";
export type { LogLevel } from "./logging";

export { SimulationError, isSimulationError } from "./core/errors";
export type { SimulationErrorKind } from "./core/errors";
export { SimRng, randomSeed } from "./core/rng";
export { Scheduler } from "./core/scheduler";
export { World } from "./core/world";
export type { ComponentType } from "./core/world";
export {
  RandomMessage,
  TimeSpan,
  UnderlayLine,
  UnderlayMessage,
  UnderlayNodeName,
  UnderlayPosition,
} from "./core/underlay";
export { Simulation } from "./core/simulation";
export type {
  Command,
  EventHandler,
  LogEntry,
  NodeEvent,
  SimEvent,
  SimulationOptions,
} from "./core/simulation";
export {
  PeerSet,
  peers,
  addPeer,
  removePeer,
  makeDelaunayNetwork,
  addRandomNodesAsPeers,
} from "./core/peers";
export type { PeerSetUpdate } from "./core/peers";
export {
  AddPeer,
  MakeDelaunayNetwork,
  PokeMultipleRandomNodes,
  PokeNode,
  RemovePeer,
  SpawnRandomMessages,
  SpawnRandomNodes,
} from "./core/commands";
export { InvokeProtocolForAllNodes, NodeInterface } from "./core/protocol";
export type { Protocol } from "./core/protocol";

export { FloodingLedger, FloodingMessage, SimpleFlooding } from "./protocols/simpleFlooding";
export type { FloodingMessageType } from "./protocols/simpleFlooding";
export {
  BlockMessage,
  GENESIS,
  NakamotoConsensus,
  NakamotoNodeState,
  newBlock,
} from "./protocols/nakamotoConsensus";
export type { Block } from "./protocols/nakamotoConsensus";

export { EdgeMap, blocksCutout, messagePosition } from "./view/netView";
export type { Edge, EdgeType } from "./view/netView";

export { asBlockHash, asEntity } from "./types/brands";
export type { BlockHash, Brand, Entity, SimSeconds } from "./types/brands";
