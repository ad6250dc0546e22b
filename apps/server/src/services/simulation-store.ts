import { randomUUID } from "node:crypto";
import type {
  SimulationStatus,
  SimulationSummary,
  TickReport,
  WorldState,
} from "@spark-world/shared";
import { SimulationNotFoundError } from "../lib/errors.js";
import { deserializeWorld, serializeWorld } from "./world-snapshot.js";

export interface SimulationStore {
  /** Reserve an id for a new simulation. */
  createSimulation(name: string): Promise<string>;
  /** Write the world and (after genesis) its tick report in one atomic step. */
  saveTick(world: WorldState, report: TickReport | null, status: SimulationStatus): Promise<void>;
  loadWorld(simulationId: string): Promise<WorldState>;
  getReport(simulationId: string, tick: number): Promise<TickReport | null>;
  listSimulations(): Promise<SimulationSummary[]>;
}

interface StoredSimulation {
  summary: SimulationSummary;
  snapshot: string | null;
  reports: Map<number, TickReport>;
}

/** Process-local store. Snapshots are kept as JSON text so every load is a real round trip. */
export class MemorySimulationStore implements SimulationStore {
  private simulations = new Map<string, StoredSimulation>();

  async createSimulation(name: string): Promise<string> {
    const id = randomUUID();
    this.simulations.set(id, {
      summary: { id, name, tick: 0, status: "running", createdAt: new Date().toISOString() },
      snapshot: null,
      reports: new Map(),
    });
    return id;
  }

  async saveTick(
    world: WorldState,
    report: TickReport | null,
    status: SimulationStatus
  ): Promise<void> {
    const stored = this.require(world.simulationId);
    stored.snapshot = serializeWorld(world);
    stored.summary = { ...stored.summary, tick: world.tick, status };
    if (report) stored.reports.set(report.tick, structuredClone(report));
  }

  async loadWorld(simulationId: string): Promise<WorldState> {
    const stored = this.require(simulationId);
    if (!stored.snapshot) throw new SimulationNotFoundError(simulationId);
    return deserializeWorld(stored.snapshot);
  }

  async getReport(simulationId: string, tick: number): Promise<TickReport | null> {
    const report = this.require(simulationId).reports.get(tick);
    return report ? structuredClone(report) : null;
  }

  async listSimulations(): Promise<SimulationSummary[]> {
    return [...this.simulations.values()]
      .map((s) => ({ ...s.summary }))
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt));
  }

  private require(simulationId: string): StoredSimulation {
    const stored = this.simulations.get(simulationId);
    if (!stored) throw new SimulationNotFoundError(simulationId);
    return stored;
  }
}
