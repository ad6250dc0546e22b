import {
  STARTING_SPARKS,
  type GrantOutcome,
  type Observation,
  type OracleFailure,
  type PendingAction,
  type SimulationStats,
  type TickReport,
  type WorldState,
} from "@spark-world/shared";
import { AgentNotFoundError, TickInProgressError, ValidationError, errorMessage } from "../lib/errors.js";
import { callWithTimeout } from "../lib/oracle-call.js";
import { defaultRandom, type RandomSource } from "../lib/random.js";
import { resolveBondAccepts, queueBondRequest } from "./bonding-protocol.js";
import { assertWorldInvariants } from "./invariants.js";
import {
  activeMissions,
  applyEvaluation,
  applyMeeting,
  createMission,
  fallbackMissionContent,
} from "./mission-lifecycle.js";
import type { NarrativeReporter } from "./narrative-reporter.js";
import { IDLE_DECISION, fallbackPersona, normalizeDecision, type Oracles } from "./oracles.js";
import { resolveRaid } from "./raid-resolver.js";
import { dissolveBond, reapDepletedAgents } from "./reaper.js";
import { checkSpawn, replicateAgent } from "./replicator.js";
import type { SimulationStore } from "./simulation-store.js";
import {
  applyGrants,
  applyUpkeep,
  auditMinting,
  mintAndDistribute,
  regenerateBenefactor,
} from "./spark-ledger.js";
import { createTickContext, dropAction, type TickContext } from "./tick-context.js";
import {
  buildObservation,
  enqueueGrantRequest,
  enqueueMail,
  previousActionsOf,
  recordActions,
  swapBuffers,
} from "./visibility-gateway.js";
import {
  addAgent,
  aliveAgents,
  cloneWorld,
  createWorld,
  findAgent,
  findBond,
  liveBonds,
  requireAgent,
} from "./world-state.js";

export const MAX_AGENTS = 500;

export interface SimulationEngineOptions {
  store: SimulationStore;
  oracles: Oracles;
  reporter: NarrativeReporter;
  oracleTimeoutMs: number;
  random?: RandomSource;
}

/**
 * Drives simulations one tick at a time. Each tick runs on a private copy of
 * the stored world and is saved only once every stage has finished, so a
 * failed tick leaves nothing behind.
 */
export class SimulationEngine {
  private readonly ticking = new Set<string>();
  private readonly random: RandomSource;

  constructor(private readonly options: SimulationEngineOptions) {
    this.random = options.random ?? defaultRandom;
  }

  async initialize(numAgents: number, name = "Spark World"): Promise<string> {
    if (!Number.isInteger(numAgents) || numAgents < 1 || numAgents > MAX_AGENTS) {
      throw new ValidationError(`numAgents must be an integer between 1 and ${MAX_AGENTS}`);
    }

    const { store, oracles } = this.options;
    const simulationId = await store.createSimulation(name);
    const world = createWorld(simulationId, name, numAgents);
    const failures: OracleFailure[] = [];

    for (let i = 0; i < numAgents; i++) {
      const seq = world.counters.nextAgentSeq;
      const persona = await this.consult(failures, "character", null, (signal) =>
        oracles.characters.spawn(
          {
            tick: 0,
            existingNames: Object.values(world.agents).map((a) => a.name),
            parent: null,
          },
          signal
        )
      );
      addAgent(world, persona ?? fallbackPersona(seq), {
        sparks: STARTING_SPARKS,
        parentId: null,
      });
    }

    await store.saveTick(world, null, "running");
    console.log(
      `[ENGINE] Simulation ${simulationId} "${name}" created with ${numAgents} minds` +
        (failures.length > 0 ? ` (${failures.length} placeholder persona(s))` : "")
    );
    return simulationId;
  }

  async tick(simulationId: string): Promise<TickReport> {
    if (this.ticking.has(simulationId)) {
      throw new TickInProgressError(simulationId);
    }
    this.ticking.add(simulationId);

    let report: TickReport;
    try {
      const world = cloneWorld(await this.options.store.loadWorld(simulationId));
      world.tick += 1;
      const ctx = createTickContext(world, this.random);
      console.log(`[ENGINE] Simulation ${simulationId}: starting tick ${ctx.tick}`);

      this.upkeepAndMint(ctx);
      const grantOutcomes = await this.benefactorGrants(ctx);
      const decisions = await this.agentDecisions(ctx, grantOutcomes);
      this.sparkDistribution(ctx);
      await this.actionResolution(ctx, decisions);
      report = this.finishTick(ctx);

      await this.options.store.saveTick(
        world,
        report,
        report.aliveAgents > 0 ? "running" : "extinct"
      );
    } finally {
      this.ticking.delete(simulationId);
    }

    await this.publish(report);
    return report;
  }

  async getWorld(simulationId: string): Promise<WorldState> {
    return this.options.store.loadWorld(simulationId);
  }

  /**
   * The observation an agent will receive at the start of the next tick,
   * before that tick's benefactor grants are known.
   */
  async previewObservation(simulationId: string, agentId: string): Promise<Observation> {
    const world = await this.options.store.loadWorld(simulationId);
    if (!findAgent(world, agentId)) throw new AgentNotFoundError(agentId);
    world.tick += 1;
    return buildObservation(world, agentId);
  }

  async stats(simulationId: string): Promise<SimulationStats> {
    const world = await this.options.store.loadWorld(simulationId);
    const agents = Object.values(world.agents);
    const alive = agents.filter((a) => a.status === "alive");
    const missions = Object.values(world.missions);

    const agentsByBondStatus: Record<string, number> = { unbonded: 0, bonded: 0, leader: 0 };
    for (const agent of alive) {
      agentsByBondStatus[agent.bondStatus] = (agentsByBondStatus[agent.bondStatus] ?? 0) + 1;
    }

    return {
      tick: world.tick,
      totalAgents: agents.length,
      aliveAgents: alive.length,
      vanishedAgents: agents.length - alive.length,
      activeBonds: Object.keys(world.bonds).length,
      activeMissions: missions.filter((m) => !m.isComplete).length,
      completedMissions: missions.filter((m) => m.isComplete).length,
      totalSparks: alive.reduce((sum, a) => sum + a.sparks, 0),
      benefactorBalance: world.benefactor.balance,
      agentsByBondStatus,
      ...world.totals,
    };
  }

  // === Stages ===

  private upkeepAndMint(ctx: TickContext): void {
    const burned = applyUpkeep(ctx);
    const reaped = reapDepletedAgents(ctx);
    const minted = mintAndDistribute(ctx);
    ctx.report.stages.upkeep_and_mint =
      `${burned} sparks burned, ${reaped.length} vanished, ${minted} minted`;
  }

  private async benefactorGrants(ctx: TickContext): Promise<GrantOutcome[]> {
    const { world } = ctx;
    const requests = world.visibility.frozen.grantRequests;

    let outcomes: GrantOutcome[] = [];
    if (requests.length > 0) {
      const decisions = await this.consult(ctx.report.oracleFailures, "benefactor", null, (signal) =>
        this.options.oracles.benefactor.decideGrants(
          {
            balance: world.benefactor.balance,
            tick: ctx.tick,
            requests: requests.map((r) => ({
              agentId: r.agentId,
              content: r.content,
              reasoning: r.reasoning,
              tick: r.tick,
            })),
          },
          signal
        )
      );
      outcomes = applyGrants(ctx, requests, decisions ?? []);
    }
    const regen = regenerateBenefactor(ctx);

    const granted = outcomes.reduce((sum, o) => sum + o.amountGranted, 0);
    ctx.report.stages.benefactor_grants =
      `${requests.length} request(s), ${granted} granted, +${regen} regenerated, balance ${world.benefactor.balance}`;
    return outcomes;
  }

  private async agentDecisions(
    ctx: TickContext,
    grantOutcomes: GrantOutcome[]
  ): Promise<PendingAction[]> {
    const { world } = ctx;
    const { oracles } = this.options;

    const missions = activeMissions(world);
    for (const mission of missions) {
      const bond = findBond(world, mission.bondId);
      if (!bond) continue;
      const members = bond.members.map((id) => structuredClone(requireAgent(world, id)));
      const outcome = await this.consult(ctx.report.oracleFailures, "coordinator", mission.id, (signal) =>
        oracles.missions.coordinateMeeting(
          structuredClone(mission),
          members,
          previousActionsOf(world, bond.members),
          signal
        )
      );
      if (outcome) applyMeeting(ctx, mission.id, outcome);
    }

    const decisions: PendingAction[] = [];
    for (const agent of aliveAgents(world)) {
      const observation = buildObservation(world, agent.id, grantOutcomes);
      const raw = await this.consult(ctx.report.oracleFailures, "decision", agent.id, (signal) =>
        oracles.decisions.decide(agent.id, observation, signal)
      );
      const decision = raw ? normalizeDecision(raw) : IDLE_DECISION;
      decisions.push({ ...decision, agentId: agent.id, tick: ctx.tick });
    }

    ctx.report.decisions = decisions;
    recordActions(ctx, decisions);
    ctx.report.stages.agent_decisions =
      `${missions.length} mission meeting(s), ${decisions.length} decision(s)`;
    return decisions;
  }

  private sparkDistribution(ctx: TickContext): void {
    const audited = auditMinting(ctx);
    ctx.report.stages.spark_distribution = `${audited} minted sparks audited`;
  }

  private async actionResolution(ctx: TickContext, decisions: PendingAction[]): Promise<void> {
    const { world } = ctx;
    const { oracles } = this.options;
    const withIntent = (intent: PendingAction["intent"]) =>
      decisions.filter((d) => d.intent === intent);

    // Bonds first, each with its mission
    for (const bond of resolveBondAccepts(ctx, withIntent("bond-accept"))) {
      const members = bond.members.map((id) => structuredClone(requireAgent(world, id)));
      const content = await this.consult(ctx.report.oracleFailures, "mission", bond.id, (signal) =>
        oracles.missions.generateMission(
          members,
          {
            tick: ctx.tick,
            totalAgents: aliveAgents(world).length,
            activeBonds: liveBonds(world).length,
          },
          signal
        )
      );
      const mission = createMission(ctx, bond, content ?? fallbackMissionContent(members));
      ctx.report.bondsFormed.push({
        bondId: bond.id,
        members: [...bond.members],
        leaderId: bond.leaderId,
        missionId: mission.id,
      });
    }

    for (const raid of withIntent("raid")) {
      resolveRaid(ctx, raid);
    }

    for (const spawn of withIntent("spawn")) {
      const problem = checkSpawn(ctx, spawn);
      if (problem) {
        dropAction(ctx, spawn, problem);
        continue;
      }
      const parent = structuredClone(requireAgent(world, spawn.agentId));
      const persona = await this.consult(ctx.report.oracleFailures, "character", spawn.agentId, (signal) =>
        oracles.characters.spawn(
          {
            tick: ctx.tick,
            existingNames: Object.values(world.agents).map((a) => a.name),
            parent,
          },
          signal
        )
      );
      if (!persona) {
        dropAction(ctx, spawn, "oracle_failure");
        continue;
      }
      replicateAgent(ctx, spawn, persona);
    }

    // Queued for the next tick's observations
    let queued = 0;
    for (const request of withIntent("bond-request")) {
      if (queueBondRequest(ctx, request)) queued++;
    }
    for (const message of withIntent("message")) {
      if (enqueueMail(ctx, message)) queued++;
    }
    for (const request of withIntent("request-grant")) {
      enqueueGrantRequest(ctx, request);
      queued++;
    }

    const swept = reapDepletedAgents(ctx);

    let completed = 0;
    for (const mission of activeMissions(world)) {
      const bond = findBond(world, mission.bondId);
      if (!bond) continue;
      const actions = decisions.filter((d) => bond.members.includes(d.agentId));
      const verdict = await this.consult(ctx.report.oracleFailures, "evaluator", mission.id, (signal) =>
        oracles.missions.evaluateProgress(structuredClone(mission), actions, signal)
      );
      if (verdict && applyEvaluation(ctx, mission.id, verdict)) {
        dissolveBond(ctx, bond.id, "mission_complete");
        completed++;
      }
    }

    ctx.report.stages.action_resolution = [
      `${ctx.report.bondsFormed.length} bond(s) formed`,
      `${ctx.report.raids.length} raid(s)`,
      `${ctx.report.agentsSpawned.length} spawn(s)`,
      `${queued} queued for next tick`,
      `${ctx.report.droppedActions.length} dropped`,
      `${swept.length} swept`,
      `${completed} mission(s) accomplished`,
    ].join(", ");
  }

  private finishTick(ctx: TickContext): TickReport {
    const { world, report } = ctx;
    assertWorldInvariants(world);

    report.benefactorBalance = world.benefactor.balance;
    report.aliveAgents = aliveAgents(world).length;
    report.stages.report =
      `${report.aliveAgents} alive, ${report.sparksMinted} minted, ${report.sparksLost} burned`;

    swapBuffers(world);
    console.log(`[ENGINE] Simulation ${world.simulationId}: tick ${ctx.tick} complete. ${report.stages.report}`);
    return report;
  }

  // === Oracle calls ===

  /** Returns null when the oracle failed or timed out; the failure is recorded. */
  private async consult<T>(
    failures: OracleFailure[],
    oracle: OracleFailure["oracle"],
    subjectId: string | null,
    request: (signal: AbortSignal) => Promise<T>
  ): Promise<T | null> {
    const label = subjectId ? `${oracle} oracle for ${subjectId}` : `${oracle} oracle`;
    try {
      return await callWithTimeout(label, this.options.oracleTimeoutMs, request);
    } catch (error) {
      const message = errorMessage(error);
      failures.push({ oracle, subjectId, message });
      console.warn(`[ORACLE] ${label} failed, using safe default: ${message}`);
      return null;
    }
  }

  private async publish(report: TickReport): Promise<void> {
    try {
      await this.options.reporter.publish(report);
    } catch (error) {
      console.error(
        `[ENGINE] Report for tick ${report.tick} of ${report.simulationId} was saved but not published:`,
        errorMessage(error)
      );
    }
  }
}
