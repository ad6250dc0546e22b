import { readFileSync } from "node:fs";
import { z } from "zod";
import {
  MAX_GRANT_PER_REQUEST,
  SPAWN_COST,
  type Agent,
  type AgentDecision,
  type GrantDecision,
  type Mission,
  type MissionContent,
  type Observation,
  type PendingAction,
  type Persona,
} from "@spark-world/shared";
import { defaultRandom, pickOne, type RandomSource } from "../lib/random.js";
import type { MeetingOutcome, MissionEvaluation } from "./mission-lifecycle.js";
import type {
  BenefactorOracle,
  CharacterGenerator,
  DecisionOracle,
  GrantContext,
  MissionOracle,
  SpawnContext,
} from "./oracles.js";

const personaSchema = z.object({
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

const missionRuleSchema = z.enum(["together", "outreach", "spawn"]);
type MissionRule = z.infer<typeof missionRuleSchema>;

const missionTemplateSchema = z.object({
  title: z.string().min(1),
  description: z.string(),
  goal: z.string(),
  rule: missionRuleSchema,
});
type MissionTemplate = z.infer<typeof missionTemplateSchema>;

function loadJson<T>(file: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const url = new URL(`../../data/${file}`, import.meta.url);
  return schema.parse(JSON.parse(readFileSync(url, "utf8")));
}

export const PERSONAS: Persona[] = loadJson("personas.json", z.array(personaSchema).min(1));
export const MISSION_TEMPLATES: MissionTemplate[] = loadJson(
  "mission-templates.json",
  z.array(missionTemplateSchema).min(1)
);

/** Ticks a bond must hold together before a "together" mission can succeed. */
export const TOGETHER_MIN_TICKS = 3;
const LOW_SPARKS = 2;
const RAID_CHANCE = 0.2;

const COOPERATIVE: ReadonlySet<string> = new Set(["message", "request-grant", "spawn"]);

function decision(
  intent: AgentDecision["intent"],
  targetId: string | null,
  content: string,
  reasoning: string
): AgentDecision {
  return { intent, targetId, content, reasoning };
}

/**
 * Rule-based stand-ins for every oracle, used when no Anthropic key is
 * configured. Deterministic for a given random source.
 */
export class HeuristicOracles
  implements DecisionOracle, BenefactorOracle, CharacterGenerator, MissionOracle
{
  constructor(private readonly random: RandomSource = defaultRandom) {}

  async decide(agentId: string, observation: Observation): Promise<AgentDecision> {
    const { self, availableActions } = observation;
    const can = (intent: AgentDecision["intent"]) => availableActions.includes(intent);
    const alive = observation.publicAgents.filter((a) => a.status === "alive");

    const request = observation.inbox.find((m) => m.intent === "bond-request");
    if (request && can("bond-accept")) {
      return decision("bond-accept", request.agentId, "Yes, let us shine together.", "Someone asked to bond");
    }

    if (self.sparks <= LOW_SPARKS && can("request-grant")) {
      return decision("request-grant", null, `${self.name} is fading and asks for help.`, "Sparks are low");
    }

    if (can("bond-request")) {
      const candidates = alive.filter((a) => a.bondStatus === "unbonded");
      if (candidates.length > 0) {
        const target = pickOne(this.random, candidates);
        return decision("bond-request", target.id, `Will you bond with me, ${target.name}?`, "Bonds mint sparks");
      }
    }

    if (can("spawn") && self.sparks >= SPAWN_COST + 3) {
      return decision("spawn", null, "A new mind for our bond.", "Enough sparks to spare");
    }

    if (can("raid") && self.sparks >= 4 && this.random() < RAID_CHANCE) {
      const victims = alive.filter((a) => !self.bondMates.includes(a.id));
      if (victims.length > 0) {
        const weakest = victims.reduce((a, b) => (b.age + b.sparks < a.age + a.sparks ? b : a));
        return decision("raid", weakest.id, "", "Easy pickings");
      }
    }

    const mission = observation.mission;
    if (mission && can("message")) {
      const mate = mission.teamMembers.find((id) => id !== agentId);
      if (mate) {
        const task = mission.assignedTasks[agentId] ?? mission.goal;
        return decision("message", mate, `Working on: ${task}`, "Keep the team in touch");
      }
    }

    return decision("idle", null, "", "Nothing worth doing");
  }

  async decideGrants(context: GrantContext): Promise<GrantDecision[]> {
    const seen = new Set<string>();
    const share = Math.max(1, Math.floor(context.balance / Math.max(1, context.requests.length)));
    const grants: GrantDecision[] = [];
    for (const request of context.requests) {
      if (seen.has(request.agentId)) continue;
      seen.add(request.agentId);
      grants.push({
        agentId: request.agentId,
        amountGranted: Math.min(MAX_GRANT_PER_REQUEST, share),
        reasoning: "An even share of what remains",
      });
    }
    return grants;
  }

  async spawn(context: SpawnContext): Promise<Persona> {
    const taken = new Set(context.existingNames);
    const fresh = PERSONAS.filter((p) => !taken.has(p.name));
    const base = structuredClone(fresh.length > 0 ? pickOne(this.random, fresh) : pickOne(this.random, PERSONAS));

    let name = base.name;
    for (let n = 2; taken.has(name); n++) name = `${base.name} ${n}`;

    if (context.parent) {
      return {
        ...base,
        name,
        species: context.parent.species,
        homeRealm: context.parent.homeRealm,
        backstory: `Child of ${context.parent.name}. ${base.backstory}`,
      };
    }
    return { ...base, name };
  }

  async generateMission(members: Agent[]): Promise<MissionContent> {
    const template = pickOne(this.random, MISSION_TEMPLATES);
    return {
      title: template.title,
      description: template.description.replace("{names}", members.map((m) => m.name).join(" and ")),
      goal: template.goal,
    };
  }

  async evaluateProgress(mission: Mission, actions: PendingAction[]): Promise<MissionEvaluation> {
    const rule = ruleFor(mission);
    const tick = actions.reduce((max, a) => Math.max(max, a.tick), mission.createdTick);
    const members = new Set(actions.map((a) => a.agentId));

    let isComplete = false;
    switch (rule) {
      case "together":
        isComplete =
          actions.length > 0 &&
          tick - mission.createdTick >= TOGETHER_MIN_TICKS &&
          actions.every((a) => COOPERATIVE.has(a.intent));
        break;
      case "outreach":
        isComplete = actions.some(
          (a) => a.intent === "message" && a.targetId !== null && !members.has(a.targetId)
        );
        break;
      case "spawn":
        isComplete = actions.some((a) => a.intent === "spawn");
        break;
    }

    const helping = actions.filter((a) => COOPERATIVE.has(a.intent)).length;
    return {
      isComplete,
      progressSummary: isComplete
        ? `Goal met at tick ${tick}`
        : `${helping} of ${actions.length} members worked for the bond at tick ${tick}`,
    };
  }

  async coordinateMeeting(
    mission: Mission,
    members: Agent[],
    previousActions: PendingAction[]
  ): Promise<MeetingOutcome> {
    const assignedTasks: Record<string, string> = {};
    for (const member of members) {
      assignedTasks[member.id] =
        member.id === mission.leaderId
          ? `Keep ${mission.title} on course`
          : `Report to ${mission.leaderId} and help with: ${mission.goal}`;
    }
    const active = previousActions.filter((a) => a.intent !== "idle").length;
    return {
      progressNote:
        previousActions.length > 0 ? `${active} of ${members.length} members acted last tick` : null,
      assignedTasks,
    };
  }
}

function ruleFor(mission: Mission): MissionRule {
  return MISSION_TEMPLATES.find((t) => t.title === mission.title)?.rule ?? "together";
}
