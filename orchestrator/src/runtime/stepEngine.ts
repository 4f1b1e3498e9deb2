import { AgentError, ConnectionError, errorMessage } from "../errors";
import { Step } from "../types/game";
import { DetectedElement } from "../types/session";
import {
  AutomationEngine,
  EngineContext,
  EngineOutcome,
  abortedOutcome,
  observe,
  performAction,
  record,
  sessionExpired,
} from "./engine";
import { centerOf, describeFind, findMatch } from "./matching";
import { retryDelayMs } from "./retry";

type AttemptResult =
  | { kind: "done" }
  | { kind: "aborted" }
  | { kind: "session_timeout" }
  | { kind: "timeout"; message: string }
  | { kind: "error"; message: string };

/**
 * Linear flow: each step waits for its element, acts on it, and hands over to
 * the next step in ascending id order.
 */
export class StepEngine implements AutomationEngine {
  readonly kind = "steps" as const;

  async run(ctx: EngineContext): Promise<EngineOutcome> {
    if (ctx.game.flow.kind !== "steps") {
      throw new Error(`StepEngine cannot run a ${ctx.game.flow.kind} flow`);
    }
    const steps = [...ctx.game.flow.steps].sort((a, b) => a.id - b.id);

    for (const [index, step] of steps.entries()) {
      if (index > 0) {
        ctx.cache.invalidate(ctx.session.id, "advance");
      }
      ctx.session.pointer = String(step.id);
      ctx.logger.info(`step ${step.id}: ${step.description}`);

      let retry = 0;
      for (;;) {
        const attempt = await this.attemptStep(ctx, step, retry + 1);
        if (attempt.kind === "done") {
          break;
        }
        if (attempt.kind === "aborted") {
          return abortedOutcome(ctx);
        }
        if (attempt.kind === "session_timeout") {
          return { result: "Timeout", reason: `session exceeded ${ctx.options.maxSessionMs}ms at step ${step.id}` };
        }

        if (retry < step.retry.retries) {
          retry += 1;
          ctx.session.retryCount += 1;
          const delay = retryDelayMs(step.retry, retry);
          ctx.logger.warn(`step ${step.id} retry ${retry}/${step.retry.retries} in ${delay}ms: ${attempt.message}`);
          await ctx.clock.sleep(delay, ctx.signal);
          continue;
        }

        if (attempt.kind === "timeout" && step.optional) {
          ctx.logger.info(`step ${step.id} is optional, skipping: ${attempt.message}`);
          break;
        }
        ctx.logger.error(`step ${step.id} failed: ${attempt.message}`);
        return {
          result: attempt.kind === "timeout" ? "Timeout" : "Failed",
          reason: `step ${step.id}: ${attempt.message}`,
        };
      }
    }

    return { result: "Success" };
  }

  private async attemptStep(ctx: EngineContext, step: Step, attempt: number): Promise<AttemptResult> {
    if (!step.find) {
      if (ctx.signal.aborted) {
        return { kind: "aborted" };
      }
      return this.act(ctx, step, attempt);
    }

    const find = step.find;
    const deadline = ctx.clock.now() + step.timeoutMs;
    for (;;) {
      if (ctx.signal.aborted) {
        return { kind: "aborted" };
      }
      if (sessionExpired(ctx)) {
        return { kind: "session_timeout" };
      }
      await ctx.heartbeat();
      if (ctx.signal.aborted) {
        return { kind: "aborted" };
      }

      const cycle = ctx.session.nextCycle();
      try {
        const observation = await observe(ctx, cycle);
        const match = findMatch(observation.elements, find);
        if (match) {
          if (ctx.signal.aborted) {
            return { kind: "aborted" };
          }
          return this.act(ctx, step, attempt, match);
        }
      } catch (error) {
        if (!(error instanceof ConnectionError || error instanceof AgentError)) {
          return this.fail(ctx, step, attempt, "error", errorMessage(error));
        }
        ctx.logger.warn(`step ${step.id} capture failed: ${errorMessage(error)}`);
      }

      const remaining = deadline - ctx.clock.now();
      if (remaining <= 0) {
        return this.fail(ctx, step, attempt, "timeout", `${describeFind(find)} not found within ${step.timeoutMs}ms`);
      }
      await ctx.clock.sleep(Math.min(ctx.options.pollIntervalMs, remaining), ctx.signal);
    }
  }

  /** Runs the step's action on `matched` (or without a target) and records the attempt. */
  private async act(ctx: EngineContext, step: Step, attempt: number, matched?: DetectedElement): Promise<AttemptResult> {
    const pointer = String(step.id);
    const action = step.action.type;
    try {
      await performAction(ctx, step.action, matched ? centerOf(matched.bbox) : undefined);
    } catch (error) {
      const message = errorMessage(error);
      await record(ctx, { kind: "step", pointer, attempt, ok: false, at: ctx.clock.now(), matched, action, error: message });
      return { kind: "error", message };
    }
    await record(ctx, { kind: "step", pointer, attempt, ok: true, at: ctx.clock.now(), matched, action });
    ctx.cache.invalidate(ctx.session.id, "action");

    await ctx.clock.sleep(step.expectedDelayMs, ctx.signal);
    return { kind: "done" };
  }

  private async fail(
    ctx: EngineContext,
    step: Step,
    attempt: number,
    kind: "timeout" | "error",
    message: string,
  ): Promise<AttemptResult> {
    await record(ctx, { kind: "step", pointer: String(step.id), attempt, ok: false, at: ctx.clock.now(), error: message });
    return { kind, message };
  }
}
