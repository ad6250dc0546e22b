import Anthropic from "@anthropic-ai/sdk";
import { z } from "zod";
import {
  ACTION_INTENTS,
  type Agent,
  type AgentDecision,
  type GrantDecision,
  type Mission,
  type MissionContent,
  type Observation,
  type PendingAction,
  type Persona,
} from "@spark-world/shared";
import type { MeetingOutcome, MissionEvaluation } from "./mission-lifecycle.js";
import {
  buildCharacterPrompt,
  buildDecisionPrompt,
  buildEvaluationPrompt,
  buildGrantPrompt,
  buildMeetingPrompt,
  buildMissionPrompt,
} from "./observation-prompt.js";
import {
  normalizeDecision,
  type BenefactorOracle,
  type CharacterGenerator,
  type DecisionOracle,
  type GrantContext,
  type MissionContext,
  type MissionOracle,
  type SpawnContext,
} from "./oracles.js";

export interface ClaudeOraclesOptions {
  apiKey: string;
  model: string;
  maxTokens?: number;
}

// === Tools (one forced call per request) ===

const DECIDE_TOOL: Anthropic.Tool = {
  name: "decide",
  description: "Submit your single action for this tick.",
  input_schema: {
    type: "object" as const,
    properties: {
      intent: { type: "string", enum: [...ACTION_INTENTS] },
      targetId: {
        type: ["string", "null"],
        description: "Agent id the action is aimed at, or null",
      },
      content: { type: "string", description: "Message text or request wording" },
      reasoning: { type: "string", description: "Why you chose this" },
    },
    required: ["intent", "targetId", "content", "reasoning"],
  },
};

const GRANT_TOOL: Anthropic.Tool = {
  name: "grant",
  description: "Decide how many sparks each requester receives.",
  input_schema: {
    type: "object" as const,
    properties: {
      grants: {
        type: "array",
        items: {
          type: "object",
          properties: {
            agentId: { type: "string" },
            amountGranted: { type: "integer", minimum: 0, maximum: 5 },
            reasoning: { type: "string" },
          },
          required: ["agentId", "amountGranted", "reasoning"],
        },
      },
    },
    required: ["grants"],
  },
};

const PERSONA_TOOL: Anthropic.Tool = {
  name: "persona",
  description: "Describe the new mind.",
  input_schema: {
    type: "object" as const,
    properties: {
      name: { type: "string" },
      species: { type: "string" },
      homeRealm: { type: "string" },
      personality: { type: "array", items: { type: "string" } },
      quirk: { type: "string" },
      ability: { type: "string" },
      backstory: { type: "string" },
      openingGoal: { type: "string" },
      speechStyle: { type: "string" },
    },
    required: [
      "name",
      "species",
      "homeRealm",
      "personality",
      "quirk",
      "ability",
      "backstory",
      "openingGoal",
      "speechStyle",
    ],
  },
};

const MISSION_TOOL: Anthropic.Tool = {
  name: "mission",
  description: "Give the bond its mission.",
  input_schema: {
    type: "object" as const,
    properties: {
      title: { type: "string" },
      description: { type: "string" },
      goal: { type: "string" },
    },
    required: ["title", "description", "goal"],
  },
};

const MEETING_TOOL: Anthropic.Tool = {
  name: "meeting",
  description: "Record the outcome of the team meeting.",
  input_schema: {
    type: "object" as const,
    properties: {
      progressNote: { type: "string" },
      tasks: {
        type: "array",
        items: {
          type: "object",
          properties: {
            agentId: { type: "string" },
            task: { type: "string" },
          },
          required: ["agentId", "task"],
        },
      },
    },
    required: ["progressNote", "tasks"],
  },
};

const EVALUATE_TOOL: Anthropic.Tool = {
  name: "evaluate",
  description: "Judge whether the mission goal has been met.",
  input_schema: {
    type: "object" as const,
    properties: {
      isComplete: { type: "boolean" },
      progressSummary: { type: "string" },
    },
    required: ["isComplete", "progressSummary"],
  },
};

// === Tool input validation ===

export const decisionInputSchema = z.object({
  intent: z.unknown(),
  targetId: z.unknown(),
  content: z.unknown(),
  reasoning: z.unknown(),
});

export const grantInputSchema = z.object({
  grants: z.array(
    z.object({
      agentId: z.string(),
      amountGranted: z.coerce.number(),
      reasoning: z.string().default(""),
    })
  ),
});

export const personaInputSchema = z.object({
  name: z.string().min(1),
  species: z.string(),
  homeRealm: z.string(),
  personality: z.array(z.string()),
  quirk: z.string(),
  ability: z.string(),
  backstory: z.string(),
  openingGoal: z.string(),
  speechStyle: z.string(),
});

export const missionInputSchema = z.object({
  title: z.string().min(1),
  description: z.string(),
  goal: z.string().min(1),
});

export const meetingInputSchema = z.object({
  progressNote: z.string(),
  tasks: z.array(z.object({ agentId: z.string(), task: z.string() })).default([]),
});

export const evaluationInputSchema = z.object({
  isComplete: z.boolean(),
  progressSummary: z.string(),
});

// Sonnet pricing: $3/M input, $15/M output
function calculateCost(usage: { input_tokens: number; output_tokens: number }): number {
  return (usage.input_tokens / 1_000_000) * 3 + (usage.output_tokens / 1_000_000) * 15;
}

export function toMeetingOutcome(input: z.infer<typeof meetingInputSchema>): MeetingOutcome {
  const assignedTasks: Record<string, string> = {};
  for (const { agentId, task } of input.tasks) assignedTasks[agentId] = task;
  return { progressNote: input.progressNote || null, assignedTasks };
}

/** Every language-producing collaborator, backed by Claude tool calls. */
export class ClaudeOracles
  implements DecisionOracle, BenefactorOracle, CharacterGenerator, MissionOracle
{
  private readonly client: Anthropic;
  private totalCost = 0;

  constructor(private readonly options: ClaudeOraclesOptions) {
    this.client = new Anthropic({ apiKey: options.apiKey });
  }

  async decide(agentId: string, observation: Observation, signal: AbortSignal): Promise<AgentDecision> {
    const input = await this.callTool(
      `decision for ${agentId}`,
      buildDecisionPrompt(observation),
      "It is your turn. Decide.",
      DECIDE_TOOL,
      decisionInputSchema,
      signal
    );
    return normalizeDecision(input);
  }

  async decideGrants(context: GrantContext, signal: AbortSignal): Promise<GrantDecision[]> {
    const input = await this.callTool(
      `grants for tick ${context.tick}`,
      buildGrantPrompt(context.balance, context.tick, context.requests),
      "Answer every request.",
      GRANT_TOOL,
      grantInputSchema,
      signal
    );
    return input.grants;
  }

  async spawn(context: SpawnContext, signal: AbortSignal): Promise<Persona> {
    return this.callTool(
      "persona",
      "You write characters for a small fantasy economy simulation.",
      buildCharacterPrompt(context.existingNames, context.parent),
      PERSONA_TOOL,
      personaInputSchema,
      signal
    );
  }

  async generateMission(
    members: Agent[],
    context: MissionContext,
    signal: AbortSignal
  ): Promise<MissionContent> {
    return this.callTool(
      "mission",
      `You set missions for bonds in a world of ${context.totalAgents} minds and ${context.activeBonds} bonds.`,
      buildMissionPrompt(members, context.tick),
      MISSION_TOOL,
      missionInputSchema,
      signal
    );
  }

  async evaluateProgress(
    mission: Mission,
    actions: PendingAction[],
    signal: AbortSignal
  ): Promise<MissionEvaluation> {
    return this.callTool(
      `evaluation of ${mission.id}`,
      "You judge missions fairly and strictly.",
      buildEvaluationPrompt(mission, actions),
      EVALUATE_TOOL,
      evaluationInputSchema,
      signal
    );
  }

  async coordinateMeeting(
    mission: Mission,
    members: Agent[],
    previousActions: PendingAction[],
    signal: AbortSignal
  ): Promise<MeetingOutcome> {
    const input = await this.callTool(
      `meeting for ${mission.id}`,
      "You run short team meetings.",
      buildMeetingPrompt(mission, members, previousActions),
      MEETING_TOOL,
      meetingInputSchema,
      signal
    );
    return toMeetingOutcome(input);
  }

  private async callTool<T>(
    label: string,
    system: string,
    prompt: string,
    tool: Anthropic.Tool,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    signal: AbortSignal
  ): Promise<T> {
    const message = await this.client.messages.create(
      {
        model: this.options.model,
        max_tokens: this.options.maxTokens ?? 1024,
        system,
        tools: [tool],
        tool_choice: { type: "tool", name: tool.name },
        messages: [{ role: "user", content: prompt }],
      },
      { signal }
    );

    const cost = calculateCost(message.usage);
    this.totalCost += cost;
    console.log(`[ORACLE] ${label}: $${cost.toFixed(6)} (total $${this.totalCost.toFixed(4)})`);

    const block = message.content.find(
      (b): b is Anthropic.ToolUseBlock => b.type === "tool_use" && b.name === tool.name
    );
    if (!block) {
      throw new Error(`${label}: response did not call ${tool.name}`);
    }
    return schema.parse(block.input);
  }
}
