import type {
  Agent,
  Bond,
  Mission,
  MissionContent,
  MissionStatus,
  WorldState,
} from "@spark-world/shared";
import { InvariantViolationError } from "../lib/errors.js";
import type { TickContext } from "./tick-context.js";
import {
  completeMission,
  findAgent,
  findBond,
  findMission,
  nextMissionId,
} from "./world-state.js";

export interface MeetingOutcome {
  progressNote: string | null;
  assignedTasks: Record<string, string>;
}

export interface MissionEvaluation {
  isComplete: boolean;
  progressSummary: string;
}

export const INITIAL_PROGRESS = "Mission just started";

export function fallbackMissionContent(members: Agent[]): MissionContent {
  const names = members.map((m) => m.name).join(" and ");
  return {
    title: "Keep the Spark Alive",
    description: `${names} pool their strength to outlast the dark between ticks.`,
    goal: "Every member of the bond survives five more ticks.",
  };
}

/** Attach a fresh mission to a bond formed this tick. Exactly one per bond. */
export function createMission(
  ctx: TickContext,
  bond: Bond,
  content: MissionContent
): Mission {
  if (bond.missionId) {
    throw new InvariantViolationError(`bond ${bond.id} already has a mission`);
  }

  const mission: Mission = {
    id: nextMissionId(ctx.world),
    bondId: bond.id,
    title: content.title,
    description: content.description,
    goal: content.goal,
    leaderId: bond.leaderId,
    currentProgress: INITIAL_PROGRESS,
    assignedTasks: {},
    isComplete: false,
    createdTick: ctx.tick,
    completedTick: null,
    completionReason: null,
  };
  ctx.world.missions[mission.id] = mission;
  bond.missionId = mission.id;
  ctx.report.missionsCreated.push(mission.id);

  console.log(`[MISSION] ${mission.id} "${mission.title}" created for ${bond.id}`);
  return mission;
}

function requireMutable(world: WorldState, missionId: string): { mission: Mission; bond: Bond } {
  const mission = findMission(world, missionId);
  if (!mission) {
    throw new InvariantViolationError(`mission ${missionId} does not exist`);
  }
  if (mission.isComplete) {
    throw new InvariantViolationError(`mission ${missionId} is complete and immutable`);
  }
  const bond = findBond(world, mission.bondId);
  if (!bond) {
    throw new InvariantViolationError(
      `mission ${missionId} is in progress but bond ${mission.bondId} is gone`
    );
  }
  return { mission, bond };
}

/** Missions that take part in this tick's meetings and evaluation. */
export function activeMissions(world: WorldState): Mission[] {
  return Object.values(world.missions)
    .filter(
      (m) =>
        !m.isComplete &&
        m.createdTick < world.tick &&
        findBond(world, m.bondId) !== undefined
    )
    .sort((a, b) => (a.id < b.id ? -1 : 1));
}

export function applyMeeting(
  ctx: TickContext,
  missionId: string,
  outcome: MeetingOutcome
): void {
  const { mission, bond } = requireMutable(ctx.world, missionId);

  // Tasks only stick to current members
  const tasks: Record<string, string> = {};
  for (const [agentId, task] of Object.entries(outcome.assignedTasks)) {
    if (bond.members.includes(agentId)) tasks[agentId] = task;
  }
  mission.assignedTasks = tasks;
  if (outcome.progressNote) mission.currentProgress = outcome.progressNote;
}

/** Returns true when the goal was judged met; the caller then dissolves the bond. */
export function applyEvaluation(
  ctx: TickContext,
  missionId: string,
  evaluation: MissionEvaluation
): boolean {
  const { mission, bond } = requireMutable(ctx.world, missionId);
  if (evaluation.progressSummary) {
    mission.currentProgress = evaluation.progressSummary;
  }
  if (!evaluation.isComplete) return false;

  completeMission(mission, ctx.tick, "goal_met");
  ctx.report.missionsCompleted.push({
    missionId: mission.id,
    bondId: bond.id,
    reason: "goal_met",
  });
  console.log(`[MISSION] ${mission.id} "${mission.title}" accomplished by ${bond.id}`);
  return true;
}

export function missionStatusFor(world: WorldState, agentId: string): MissionStatus | null {
  const agent = findAgent(world, agentId);
  if (!agent || agent.bondStatus === "unbonded") return null;

  for (const mission of Object.values(world.missions)) {
    if (mission.isComplete) continue;
    const bond = findBond(world, mission.bondId);
    if (!bond || !bond.members.includes(agentId)) continue;

    return {
      missionId: mission.id,
      title: mission.title,
      description: mission.description,
      goal: mission.goal,
      currentProgress: mission.currentProgress,
      leaderId: mission.leaderId,
      assignedTasks: { ...mission.assignedTasks },
      teamMembers: [...bond.members],
    };
  }
  return null;
}
