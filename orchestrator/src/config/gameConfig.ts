import fs from "fs";
import path from "path";
import yaml from "yaml";
import { z } from "zod";
import { ConfigValidationError, errorMessage } from "../errors";
import {
  Action,
  FindSpec,
  GameConfig,
  GameFlow,
  GameMetadata,
  RetryPolicy,
  StateDefinition,
  Step,
} from "../types/game";
import { defaultRetryPolicy } from "../runtime/retry";
import { defaultConfig } from "./defaults";
import { zodIssues } from "./issues";

export interface GameConfigDefaults {
  stepTimeoutMs: number;
  expectedDelayMs: number;
}

const builtInDefaults: GameConfigDefaults = {
  stepTimeoutMs: defaultConfig.runtime.defaultStepTimeoutMs,
  expectedDelayMs: defaultConfig.runtime.defaultExpectedDelayMs,
};

// Timing fields in game files are seconds.
const seconds = z.number().nonnegative();
const coordinate = z.number().int().nonnegative();
const button = z.enum(["left", "right", "middle"]).default("left");

const regionSchema = z.object({
  x: z.number(),
  y: z.number(),
  width: z.number().positive(),
  height: z.number().positive(),
});

const findSchema = z.object({
  type: z.string().min(1).default("any"),
  text: z.string(),
  text_match: z.enum(["exact", "contains"]).default("contains"),
  region: regionSchema.optional(),
});

const actionSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("click"),
    button,
    x: coordinate.optional(),
    y: coordinate.optional(),
    move_duration: seconds.optional(),
    click_delay: seconds.optional(),
  }),
  z.object({ type: z.literal("double_click"), button, x: coordinate.optional(), y: coordinate.optional() }),
  z.object({ type: z.literal("key"), key: z.string().min(1) }),
  z.object({
    type: z.literal("hotkey"),
    keys: z.union([z.array(z.string().min(1)).min(1), z.string().min(1)]),
  }),
  z.object({ type: z.literal("text"), text: z.string(), char_delay: seconds.optional() }),
  z.object({
    type: z.literal("scroll"),
    direction: z.enum(["up", "down"]),
    clicks: z.number().int().positive().default(3),
  }),
  z.object({ type: z.literal("wait"), duration: seconds }),
  z.object({ type: z.literal("custom"), name: z.string().min(1), params: z.record(z.unknown()).default({}) }),
  z.object({ type: z.literal("drag") }).passthrough(),
  z.object({ type: z.literal("terminate_game") }).passthrough(),
]);

const retrySchema = z.object({
  count: z.number().int().nonnegative().default(0),
  delay: seconds.default(2),
  backoff: z.enum(["fixed", "exponential"]).default("fixed"),
  max_delay: seconds.default(60),
});

const stepSchema = z.object({
  description: z.string().default(""),
  find: findSchema.optional(),
  action: actionSchema,
  timeout: seconds.optional(),
  expected_delay: seconds.optional(),
  optional: z.boolean().default(false),
  retry: retrySchema.optional(),
});

const ruleSchema = findSchema.extend({
  action: actionSchema.optional(),
  transition: z.string().min(1),
});

const stateSchema = z.object({
  description: z.string().optional(),
  find: z.array(ruleSchema).default([]),
  default: z
    .object({
      action: actionSchema.optional(),
      transition: z.string().min(1),
    })
    .optional(),
  timeout: seconds.optional(),
  retry: retrySchema.optional(),
  result: z.enum(["success", "failed"]).default("success"),
});

const metadataSchema = z
  .object({
    game_name: z.string().min(1),
    path: z.string().min(1).optional(),
    process_id: z.string().min(1).optional(),
    startup_wait: seconds.default(30),
    benchmark_duration: seconds.optional(),
  })
  .passthrough();

const gameFileSchema = z
  .object({
    metadata: metadataSchema,
    steps: z.record(z.string(), stepSchema).optional(),
    initial_state: z.string().min(1).optional(),
    target_state: z.string().min(1).optional(),
    states: z.record(z.string(), stateSchema).optional(),
  })
  .superRefine((file, ctx) => {
    if (file.steps && file.states) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "define either steps or states, not both" });
      return;
    }
    if (file.steps) {
      const ids = Object.keys(file.steps);
      if (ids.length === 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["steps"], message: "at least one step is required" });
      }
      for (const id of ids) {
        if (!/^\d+$/.test(id)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["steps", id], message: "step ids must be numbers" });
        }
      }
      return;
    }
    if (!file.states) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "either steps or states is required" });
      return;
    }

    const states = file.states;
    if (!file.initial_state) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["initial_state"], message: "required with states" });
    } else if (!(file.initial_state in states)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["initial_state"],
        message: `unknown state ${file.initial_state}`,
      });
    }
    if (file.target_state && !(file.target_state in states)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["target_state"],
        message: `unknown state ${file.target_state}`,
      });
    }
    for (const [id, state] of Object.entries(states)) {
      state.find.forEach((rule, index) => {
        if (!(rule.transition in states)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["states", id, "find", index, "transition"],
            message: `unknown state ${rule.transition}`,
          });
        }
      });
      if (state.default && !(state.default.transition in states)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["states", id, "default", "transition"],
          message: `unknown state ${state.default.transition}`,
        });
      }
    }
  });

type GameFile = z.infer<typeof gameFileSchema>;
type RawAction = z.infer<typeof actionSchema>;
type RawFind = z.infer<typeof findSchema>;
type RawRetry = z.infer<typeof retrySchema>;

const toMs = (value: number): number => Math.round(value * 1000);

function toAction(raw: RawAction): Action {
  switch (raw.type) {
    case "click":
      return {
        type: "click",
        button: raw.button,
        x: raw.x,
        y: raw.y,
        moveDuration: raw.move_duration,
        clickDelay: raw.click_delay,
      };
    case "double_click":
      return { type: "double_click", button: raw.button, x: raw.x, y: raw.y };
    case "key":
      return { type: "key", key: raw.key };
    case "hotkey":
      return {
        type: "hotkey",
        keys: Array.isArray(raw.keys) ? raw.keys : raw.keys.split("+").map((key) => key.trim()),
      };
    case "text":
      return { type: "text", text: raw.text, charDelay: raw.char_delay };
    case "scroll":
      return { type: "scroll", direction: raw.direction, clicks: raw.clicks };
    case "wait":
      return { type: "wait", durationMs: toMs(raw.duration) };
    case "custom":
      return { type: "custom", name: raw.name, params: raw.params };
    case "drag":
    case "terminate_game": {
      const { type, ...params } = raw;
      return { type: "custom", name: type, params };
    }
  }
}

function toFind(raw: RawFind): FindSpec {
  return {
    type: raw.type,
    text: raw.text,
    match: raw.text_match,
    region: raw.region,
  };
}

function toRetry(raw: RawRetry | undefined): RetryPolicy {
  if (!raw) {
    return { ...defaultRetryPolicy };
  }
  return {
    retries: raw.count,
    delayMs: toMs(raw.delay),
    backoff: raw.backoff,
    maxDelayMs: toMs(raw.max_delay),
  };
}

function toMetadata(raw: GameFile["metadata"]): GameMetadata {
  const { game_name, path: gamePath, process_id, startup_wait, benchmark_duration, ...rest } = raw;
  const extra: GameMetadata["extra"] = {};
  for (const [key, value] of Object.entries(rest)) {
    if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
      extra[key] = value;
    }
  }
  return {
    name: game_name,
    path: gamePath,
    processMarker: process_id,
    startupWaitMs: toMs(startup_wait),
    benchmarkDurationMs: benchmark_duration === undefined ? undefined : toMs(benchmark_duration),
    extra,
  };
}

function toFlow(file: GameFile, defaults: GameConfigDefaults): GameFlow {
  if (file.steps) {
    const steps: Step[] = Object.entries(file.steps)
      .map(([id, raw]) => ({
        id: Number(id),
        description: raw.description,
        find: raw.find ? toFind(raw.find) : undefined,
        action: toAction(raw.action),
        timeoutMs: raw.timeout === undefined ? defaults.stepTimeoutMs : toMs(raw.timeout),
        expectedDelayMs: raw.expected_delay === undefined ? defaults.expectedDelayMs : toMs(raw.expected_delay),
        optional: raw.optional,
        retry: toRetry(raw.retry),
      }))
      .sort((a, b) => a.id - b.id);
    return { kind: "steps", steps };
  }

  const states: Record<string, StateDefinition> = {};
  for (const [id, raw] of Object.entries(file.states ?? {})) {
    states[id] = {
      id,
      description: raw.description,
      rules: raw.find.map((rule) => ({
        find: toFind(rule),
        action: rule.action ? toAction(rule.action) : undefined,
        transition: rule.transition,
      })),
      default: raw.default
        ? {
            action: raw.default.action ? toAction(raw.default.action) : undefined,
            transition: raw.default.transition,
          }
        : undefined,
      timeoutMs: raw.timeout === undefined ? defaults.stepTimeoutMs : toMs(raw.timeout),
      retry: toRetry(raw.retry),
      result: raw.result,
    };
  }
  return {
    kind: "state_machine",
    // superRefine guarantees initial_state whenever states is present
    initialState: file.initial_state ?? "",
    targetState: file.target_state,
    states,
  };
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/** Parses a YAML game file into an immutable `GameConfig`. */
export function parseGameConfig(
  text: string,
  source = "<inline>",
  defaults: GameConfigDefaults = builtInDefaults,
): GameConfig {
  let document: unknown;
  try {
    document = yaml.parse(text);
  } catch (error) {
    throw new ConfigValidationError(source, [{ path: "", message: `not valid YAML (${errorMessage(error)})` }]);
  }

  const parsed = gameFileSchema.safeParse(document);
  if (!parsed.success) {
    throw new ConfigValidationError(source, zodIssues(parsed.error));
  }

  return deepFreeze({
    source,
    metadata: toMetadata(parsed.data.metadata),
    flow: toFlow(parsed.data, defaults),
  });
}

export function loadGameConfig(configPath: string, defaults?: GameConfigDefaults): GameConfig {
  const resolved = path.resolve(configPath);
  let text: string;
  try {
    text = fs.readFileSync(resolved, "utf-8");
  } catch (error) {
    throw new ConfigValidationError(resolved, [{ path: "", message: `cannot read file (${errorMessage(error)})` }]);
  }
  return parseGameConfig(text, resolved, defaults);
}
