import type { BlockHash, Entity, SimSeconds } from "../types/brands";

export type SimulationErrorKind =
  | "UnknownEntity"
  | "UnknownBlock"
  | "TopologyError"
  | "ScheduleInPast"
  | "InvalidConfig"
  | "ProtocolFailure";

export class SimulationError extends Error {
  constructor(
    public readonly kind: SimulationErrorKind,
    message: string,
  ) {
    super(message);
    this.name = `SimulationError(${kind})`;
  }

  static unknownEntity(entity: Entity) {
    return new SimulationError("UnknownEntity", `Entity ${entity} does not exist`);
  }

  static unknownBlock(hash: BlockHash) {
    return new SimulationError("UnknownBlock", `Block ${hash} is not known to this node`);
  }

  static noTriangulation(nodeCount: number) {
    return new SimulationError(
      "TopologyError",
      `No triangulation exists for ${nodeCount} node position(s)`,
    );
  }

  static scheduleInPast(due: SimSeconds, now: SimSeconds) {
    return new SimulationError(
      "ScheduleInPast",
      `Cannot schedule an event at ${due}s, the clock is already at ${now}s`,
    );
  }

  static protocolFailure(context: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    const err = new SimulationError("ProtocolFailure", `${context}: ${reason}`);
    err.cause = cause;
    return err;
  }

  static invalidConfig(issues: string) {
    return new SimulationError("InvalidConfig", `Invalid simulation config: ${issues}`);
  }
}

export const isSimulationError = (e: unknown): e is SimulationError =>
  e instanceof SimulationError;
