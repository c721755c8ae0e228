import {
  boolean,
  gtValue,
  integer,
  maxValue,
  minValue,
  number,
  object,
  optional,
  picklist,
  pipe,
  safeParse,
  type InferOutput,
} from "valibot";
import { SimulationError } from "./core/errors";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export const simulationConfigSchema = object({
  seed: optional(pipe(number(), integer(), minValue(0), maxValue(0xffffffff))),
  underlayWidth: optional(pipe(number(), gtValue(0)), 1000),
  underlayHeight: optional(pipe(number(), gtValue(0)), 600),
  nodeBufferZone: optional(pipe(number(), minValue(0)), 10),
  // underlay units travelled per simulated second
  flightPerSecond: optional(pipe(number(), gtValue(0)), 500),
  messageLogSize: optional(pipe(number(), integer(), minValue(0)), 12),
  logLevel: optional(picklist(LOG_LEVELS), "info"),
  logPretty: optional(boolean(), false),
});

export type SimulationConfig = InferOutput<typeof simulationConfigSchema>;
export type SimulationConfigInput = Partial<SimulationConfig>;

type Env = Record<string, string | undefined>;

const num = (raw: string | undefined): number | undefined =>
  raw === undefined || raw.trim() === "" ? undefined : Number(raw);

/** Reads the recognised environment variables; unknown or empty ones are skipped. */
export const configFromEnv = (env: Env): Record<string, unknown> => {
  const picked: Record<string, unknown> = {
    seed: num(env.SIM_SEED),
    underlayWidth: num(env.SIM_UNDERLAY_WIDTH),
    underlayHeight: num(env.SIM_UNDERLAY_HEIGHT),
    flightPerSecond: num(env.SIM_FLIGHT_PER_SECOND),
    logLevel: env.LOG_LEVEL || undefined,
    logPretty: env.LOG_PRETTY === undefined ? undefined : env.LOG_PRETTY === "true",
  };
  return Object.fromEntries(Object.entries(picked).filter(([, v]) => v !== undefined));
};

export const loadConfig = (
  overrides: SimulationConfigInput = {},
  env: Env = process.env,
): SimulationConfig => {
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, v]) => v !== undefined),
  );
  const result = safeParse(simulationConfigSchema, { ...configFromEnv(env), ...defined });
  if (!result.success) {
    const issues = result.issues
      .map((issue) => {
        const path = issue.path?.map((p) => String(p.key)).join(".") ?? "";
        return path ? `${path}: ${issue.message}` : issue.message;
      })
      .join("; ");
    throw SimulationError.invalidConfig(issues);
  }
  return result.output;
};
