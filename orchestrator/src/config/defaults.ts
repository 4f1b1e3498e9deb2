import fs from "fs";
import path from "path";
import { z } from "zod";
import { ConfigValidationError } from "../errors";
import { LogLevel } from "../logging";
import { VisionBackendConfig, detectedElementSchema } from "../rpc/visionClient";
import { zodIssues } from "./issues";

export interface AgentConfig {
  defaultPort: number;
  requestTimeoutMs: number;
  screenshotTimeoutMs: number;
  launchTimeoutMs: number;
  healthTimeoutMs: number;
}

export interface RuntimeConfig {
  pollIntervalMs: number;
  defaultStepTimeoutMs: number;
  defaultExpectedDelayMs: number;
  maxSessionMs: number;
  healthCheckIntervalMs: number;
  maxHealthFailures: number;
  killOnFailure: boolean;
}

export interface SchedulerConfig {
  mode: "per-sut" | "shared";
  delayBetweenGamesMs: number;
  continueOnFailure: boolean;
}

export interface PreviewConfig {
  intervalMs: number;
  timeoutMs: number;
}

export interface ArtifactsConfig {
  logsDir: string;
  saveScreenshots: boolean;
}

export interface OrchestratorConfig {
  logLevel: LogLevel;
  agent: AgentConfig;
  vision: VisionBackendConfig;
  runtime: RuntimeConfig;
  scheduler: SchedulerConfig;
  preview: PreviewConfig;
  artifacts: ArtifactsConfig;
}

export const defaultConfig: OrchestratorConfig = {
  logLevel: "info",
  agent: {
    defaultPort: 8080,
    requestTimeoutMs: 10_000,
    screenshotTimeoutMs: 15_000,
    launchTimeoutMs: 90_000,
    healthTimeoutMs: 5_000,
  },
  vision: {
    kind: "detector",
    url: "http://localhost:9000",
    timeoutMs: 30_000,
  },
  runtime: {
    pollIntervalMs: 1_000,
    defaultStepTimeoutMs: 20_000,
    defaultExpectedDelayMs: 2_000,
    maxSessionMs: 30 * 60_000,
    healthCheckIntervalMs: 5_000,
    maxHealthFailures: 3,
    killOnFailure: true,
  },
  scheduler: {
    mode: "per-sut",
    delayBetweenGamesMs: 120_000,
    continueOnFailure: true,
  },
  preview: {
    intervalMs: 4_000,
    timeoutMs: 2_000,
  },
  artifacts: {
    logsDir: "logs",
    saveScreenshots: false,
  },
};

const positive = z.number().int().positive();
const nonNegative = z.number().int().nonnegative();

const configSchema = z.object({
  logLevel: z.enum(["debug", "info", "warn", "error"]),
  agent: z.object({
    defaultPort: positive,
    requestTimeoutMs: positive,
    screenshotTimeoutMs: positive,
    launchTimeoutMs: positive,
    healthTimeoutMs: positive,
  }),
  vision: z.discriminatedUnion("kind", [
    z.object({ kind: z.literal("detector"), url: z.string().url(), timeoutMs: positive }),
    z.object({ kind: z.literal("static"), elements: z.array(detectedElementSchema) }),
  ]),
  runtime: z.object({
    pollIntervalMs: positive,
    defaultStepTimeoutMs: positive,
    defaultExpectedDelayMs: nonNegative,
    maxSessionMs: positive,
    healthCheckIntervalMs: positive,
    maxHealthFailures: positive,
    killOnFailure: z.boolean(),
  }),
  scheduler: z.object({
    mode: z.enum(["per-sut", "shared"]),
    delayBetweenGamesMs: nonNegative,
    continueOnFailure: z.boolean(),
  }),
  preview: z.object({
    intervalMs: positive,
    timeoutMs: positive,
  }),
  artifacts: z.object({
    logsDir: z.string().min(1),
    saveScreenshots: z.boolean(),
  }),
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function sectionOf(overrides: Record<string, unknown>, key: keyof OrchestratorConfig): Record<string, unknown> {
  const value = overrides[key];
  return isRecord(value) ? value : {};
}

/**
 * Overlays `overrides` on the defaults one section at a time and validates
 * the result.
 */
export function mergeConfig(
  overrides: Record<string, unknown>,
  source = "<inline>",
): OrchestratorConfig {
  const visionOverrides = sectionOf(overrides, "vision");
  // Switching backend kind replaces the vision section outright.
  const vision =
    visionOverrides.kind !== undefined && visionOverrides.kind !== defaultConfig.vision.kind
      ? visionOverrides
      : { ...defaultConfig.vision, ...visionOverrides };

  const merged = {
    logLevel: overrides.logLevel ?? defaultConfig.logLevel,
    agent: { ...defaultConfig.agent, ...sectionOf(overrides, "agent") },
    vision,
    runtime: { ...defaultConfig.runtime, ...sectionOf(overrides, "runtime") },
    scheduler: { ...defaultConfig.scheduler, ...sectionOf(overrides, "scheduler") },
    preview: { ...defaultConfig.preview, ...sectionOf(overrides, "preview") },
    artifacts: { ...defaultConfig.artifacts, ...sectionOf(overrides, "artifacts") },
  };

  const parsed = configSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigValidationError(source, zodIssues(parsed.error));
  }
  return parsed.data;
}

export function loadConfig(configPath?: string): OrchestratorConfig {
  if (!configPath) {
    return defaultConfig;
  }

  const resolved = path.resolve(configPath);
  const raw = fs.readFileSync(resolved, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigValidationError(resolved, [
      { path: "", message: `not valid JSON (${error instanceof Error ? error.message : String(error)})` },
    ]);
  }
  if (!isRecord(parsed)) {
    throw new ConfigValidationError(resolved, [{ path: "", message: "expected a JSON object" }]);
  }
  return mergeConfig(parsed, resolved);
}
