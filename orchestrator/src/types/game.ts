export type TextMatchMode = "exact" | "contains";

export interface Region {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface FindSpec {
  /** Element type reported by the vision service, or "any". */
  type: string;
  text: string;
  match: TextMatchMode;
  region?: Region;
}

export type MouseButton = "left" | "right" | "middle";

export type Action =
  | {
      type: "click";
      button: MouseButton;
      /** Seconds, forwarded to the agent as is. */
      moveDuration?: number;
      clickDelay?: number;
      x?: number;
      y?: number;
    }
  | { type: "double_click"; button: MouseButton; x?: number; y?: number }
  | { type: "key"; key: string }
  | { type: "hotkey"; keys: string[] }
  | { type: "text"; text: string; charDelay?: number }
  | { type: "scroll"; direction: "up" | "down"; clicks: number }
  | { type: "wait"; durationMs: number }
  | { type: "custom"; name: string; params: Record<string, unknown> };

export type ActionType = Action["type"];

export interface RetryPolicy {
  retries: number;
  delayMs: number;
  backoff: "fixed" | "exponential";
  maxDelayMs: number;
}

export interface Step {
  id: number;
  description: string;
  find?: FindSpec;
  action: Action;
  timeoutMs: number;
  expectedDelayMs: number;
  optional: boolean;
  retry: RetryPolicy;
}

export interface StateRule {
  find: FindSpec;
  action?: Action;
  transition: string;
}

export interface DefaultTransition {
  action?: Action;
  transition: string;
}

export interface StateDefinition {
  id: string;
  description?: string;
  rules: StateRule[];
  default?: DefaultTransition;
  timeoutMs: number;
  retry: RetryPolicy;
  /** Only meaningful on terminal states. */
  result: "success" | "failed";
}

export interface StepFlow {
  kind: "steps";
  steps: Step[];
}

export interface StateMachineFlow {
  kind: "state_machine";
  initialState: string;
  targetState?: string;
  states: Record<string, StateDefinition>;
}

export type GameFlow = StepFlow | StateMachineFlow;

export type EngineKind = GameFlow["kind"];

export interface GameMetadata {
  name: string;
  path?: string;
  processMarker?: string;
  startupWaitMs: number;
  benchmarkDurationMs?: number;
  extra: Record<string, string | number | boolean>;
}

export interface GameConfig {
  source: string;
  metadata: GameMetadata;
  flow: GameFlow;
}

export function isTerminalState(state: StateDefinition): boolean {
  return state.rules.length === 0 && !state.default;
}
