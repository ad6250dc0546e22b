export type ActionIntent =
  | "bond-request"
  | "bond-accept"
  | "raid"
  | "spawn"
  | "request-grant"
  | "message"
  | "idle";

export const ACTION_INTENTS: readonly ActionIntent[] = [
  "bond-request",
  "bond-accept",
  "raid",
  "spawn",
  "request-grant",
  "message",
  "idle",
];

/** Intents that must name another agent. */
export const TARGETED_INTENTS: readonly ActionIntent[] = [
  "bond-request",
  "bond-accept",
  "raid",
  "message",
];

export interface AgentDecision {
  intent: ActionIntent;
  targetId: string | null;
  content: string;
  reasoning: string;
}

export interface PendingAction extends AgentDecision {
  agentId: string;
  tick: number;
}

export type DropReason =
  | "missing_target"
  | "self_target"
  | "unknown_target"
  | "target_vanished"
  | "target_bonded"
  | "already_bonded"
  | "no_pending_request"
  | "not_bonded"
  | "insufficient_sparks"
  | "oracle_failure";

export interface DroppedAction {
  agentId: string;
  intent: ActionIntent;
  targetId: string | null;
  reason: DropReason;
  tick: number;
}

export function isActionIntent(value: unknown): value is ActionIntent {
  return ACTION_INTENTS.some((intent) => intent === value);
}
