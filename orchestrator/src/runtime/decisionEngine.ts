import { AgentError, ConnectionError, errorMessage } from "../errors";
import { Action, StateDefinition, StateMachineFlow, StateRule, isTerminalState } from "../types/game";
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
import { centerOf, findMatch } from "./matching";
import { retryDelayMs } from "./retry";

/**
 * State-machine flow. Each poll cycle tests the current state's rules in
 * declared order against a single observation; the first match wins.
 */
export class DecisionEngine implements AutomationEngine {
  readonly kind = "state_machine" as const;

  async run(ctx: EngineContext): Promise<EngineOutcome> {
    if (ctx.game.flow.kind !== "state_machine") {
      throw new Error(`DecisionEngine cannot run a ${ctx.game.flow.kind} flow`);
    }
    const flow = ctx.game.flow;

    let current = flow.initialState;
    let enteredAt = ctx.clock.now();
    let retry = 0;
    ctx.session.pointer = current;

    const enter = async (next: string, cause: "rule" | "default", ruleIndex?: number) => {
      await record(ctx, { kind: "transition", from: current, to: next, cause, ruleIndex, at: ctx.clock.now() });
      ctx.logger.info(`state ${current} -> ${next} (${cause}${ruleIndex === undefined ? "" : ` #${ruleIndex}`})`);
      current = next;
      ctx.session.pointer = next;
      enteredAt = ctx.clock.now();
      retry = 0;
      ctx.cache.invalidate(ctx.session.id, "advance");
    };

    for (;;) {
      const state = stateOf(flow, current);
      if (isTerminalState(state)) {
        return state.result === "failed"
          ? { result: "Failed", reason: `reached failure state ${current}` }
          : { result: "Success" };
      }
      if (flow.targetState === current) {
        return { result: "Success" };
      }

      if (ctx.signal.aborted) {
        return abortedOutcome(ctx);
      }
      if (sessionExpired(ctx)) {
        return { result: "Timeout", reason: `session exceeded ${ctx.options.maxSessionMs}ms in state ${current}` };
      }
      await ctx.heartbeat();
      if (ctx.signal.aborted) {
        return abortedOutcome(ctx);
      }

      const cycle = ctx.session.nextCycle();
      let elements: DetectedElement[] = [];
      let failure: string | undefined;
      try {
        elements = (await observe(ctx, cycle)).elements;
      } catch (error) {
        if (error instanceof ConnectionError || error instanceof AgentError) {
          ctx.logger.warn(`state ${current} capture failed: ${errorMessage(error)}`);
        } else {
          failure = errorMessage(error);
          await record(ctx, { kind: "find", pointer: current, attempt: retry + 1, ok: false, at: ctx.clock.now(), error: failure });
        }
      }

      if (failure === undefined) {
        const fired = firstMatch(state.rules, elements);
        if (fired) {
          if (ctx.signal.aborted) {
            return abortedOutcome(ctx);
          }
          const { rule, index, element } = fired;
          await record(ctx, {
            kind: "find",
            pointer: current,
            attempt: retry + 1,
            ok: true,
            at: ctx.clock.now(),
            matched: element,
          });
          if (rule.action) {
            failure = await this.act(ctx, current, rule.action, centerOf(element.bbox));
          }
          if (failure === undefined) {
            await enter(rule.transition, "rule", index);
            continue;
          }
        }
      }

      if (failure !== undefined) {
        if (retry >= state.retry.retries) {
          return { result: "Failed", reason: `state ${current}: ${failure}` };
        }
        retry += 1;
        ctx.session.retryCount += 1;
        await ctx.clock.sleep(retryDelayMs(state.retry, retry), ctx.signal);
        continue;
      }

      if (ctx.clock.now() - enteredAt >= state.timeoutMs) {
        if (state.default) {
          if (ctx.signal.aborted) {
            return abortedOutcome(ctx);
          }
          const action = state.default.action;
          if (action) {
            const actionFailure = await this.act(ctx, current, action);
            if (actionFailure !== undefined) {
              return { result: "Failed", reason: `state ${current} default action: ${actionFailure}` };
            }
          }
          await enter(state.default.transition, "default");
          continue;
        }
        await record(ctx, {
          kind: "find",
          pointer: current,
          attempt: retry + 1,
          ok: false,
          at: ctx.clock.now(),
          error: `no rule matched within ${state.timeoutMs}ms`,
        });
        if (retry < state.retry.retries) {
          retry += 1;
          ctx.session.retryCount += 1;
          await ctx.clock.sleep(retryDelayMs(state.retry, retry), ctx.signal);
          enteredAt = ctx.clock.now();
          continue;
        }
        return { result: "Timeout", reason: `state ${current}: no rule matched within ${state.timeoutMs}ms` };
      }

      await ctx.clock.sleep(ctx.options.pollIntervalMs, ctx.signal);
    }
  }

  private async act(
    ctx: EngineContext,
    pointer: string,
    action: Action,
    target?: { x: number; y: number },
  ): Promise<string | undefined> {
    try {
      await performAction(ctx, action, target);
    } catch (error) {
      const message = errorMessage(error);
      await record(ctx, { kind: "action", pointer, action: action.type, ok: false, at: ctx.clock.now(), error: message });
      return message;
    }
    await record(ctx, { kind: "action", pointer, action: action.type, ok: true, at: ctx.clock.now() });
    ctx.cache.invalidate(ctx.session.id, "action");
    await ctx.clock.sleep(ctx.options.actionSettleMs, ctx.signal);
    return undefined;
  }
}

function stateOf(flow: StateMachineFlow, id: string): StateDefinition {
  const state = flow.states[id];
  if (!state) {
    throw new Error(`Unknown state ${id}`);
  }
  return state;
}

function firstMatch(
  rules: StateRule[],
  elements: DetectedElement[],
): { rule: StateRule; index: number; element: DetectedElement } | undefined {
  for (const [index, rule] of rules.entries()) {
    const element = findMatch(elements, rule.find);
    if (element) {
      return { rule, index, element };
    }
  }
  return undefined;
}
