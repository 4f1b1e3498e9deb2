import { z } from "zod";

export const AgentRoutes = {
  screenshot: "/screenshot",
  action: "/action",
  processLaunch: "/process/launch",
  processStatus: "/process/status",
  processKill: "/process/kill",
  processCancel: "/process/cancel",
  health: "/health",
  status: "/status",
} as const;

export type AgentRoute = (typeof AgentRoutes)[keyof typeof AgentRoutes];

export const actionResponseSchema = z
  .object({
    status: z.string().optional(),
    ok: z.boolean().optional(),
    error: z.string().optional(),
  })
  .passthrough();

export type ActionResponse = z.infer<typeof actionResponseSchema>;

export interface LaunchRequest {
  path: string;
  args: string[];
  process_marker?: string;
  /** Seconds. */
  startup_wait: number;
}

export const launchResponseSchema = z.object({
  status: z.enum(["success", "warning", "error"]).optional(),
  pid: z.number().optional(),
  game_process_pid: z.number().optional(),
  game_process_name: z.string().optional(),
  foreground_confirmed: z.boolean().optional(),
  warning: z.string().optional(),
  error: z.string().optional(),
});

export const processStatusResponseSchema = z.object({
  running: z.boolean(),
  foregrounded: z.boolean().optional(),
  pid: z.number().optional(),
});

export const healthResponseSchema = z.object({
  ok: z.boolean().optional(),
  status: z.string().optional(),
});

export const agentStatusResponseSchema = z.object({
  version: z.string().optional(),
  screen_width: z.number().optional(),
  screen_height: z.number().optional(),
  capabilities: z.array(z.string()).optional(),
});

export type AgentStatusResponse = z.infer<typeof agentStatusResponseSchema>;

export const errorBodySchema = z.object({
  error: z.string().optional(),
  message: z.string().optional(),
});
