import { and, asc, desc, eq } from "drizzle-orm";
import type { BatchItem } from "drizzle-orm/batch";
import { z } from "zod";
import type {
  SimulationStatus,
  SimulationSummary,
  TickReport,
  WorldState,
} from "@spark-world/shared";
import type { Database } from "../config/database.js";
import {
  ledgerEntries,
  simulations,
  tickReports,
  worldSnapshots,
} from "../db/schema.js";
import { SimulationNotFoundError } from "../lib/errors.js";
import type { SimulationStore } from "./simulation-store.js";
import { parseWorld } from "./world-snapshot.js";

const simulationIdSchema = z.string().uuid();

/** Postgres-backed store. Every tick is one batch: state, report and ledger land together or not at all. */
export class DrizzleSimulationStore implements SimulationStore {
  constructor(private readonly db: Database) {}

  async createSimulation(name: string): Promise<string> {
    const [created] = await this.db
      .insert(simulations)
      .values({ name })
      .returning({ id: simulations.id });
    console.log(`[STORE] Simulation ${created.id} registered`);
    return created.id;
  }

  async saveTick(
    world: WorldState,
    report: TickReport | null,
    status: SimulationStatus
  ): Promise<void> {
    const statements: [BatchItem<"pg">, ...BatchItem<"pg">[]] = [
      this.db
        .update(simulations)
        .set({ currentTick: world.tick, status, updatedAt: new Date() })
        .where(eq(simulations.id, world.simulationId)),
      this.db
        .insert(worldSnapshots)
        .values({ simulationId: world.simulationId, tick: world.tick, state: world })
        .onConflictDoUpdate({
          target: [worldSnapshots.simulationId, worldSnapshots.tick],
          set: { state: world },
        }),
    ];

    if (report) {
      statements.push(
        this.db.insert(tickReports).values({
          simulationId: report.simulationId,
          tick: report.tick,
          report,
          aliveAgents: report.aliveAgents,
          sparksMinted: report.sparksMinted,
          sparksLost: report.sparksLost,
        })
      );
      if (report.ledger.length > 0) {
        statements.push(
          this.db.insert(ledgerEntries).values(
            report.ledger.map((entry) => ({
              simulationId: report.simulationId,
              tick: entry.tick,
              fromEntity: entry.from,
              toEntity: entry.to,
              amount: entry.amount,
              reason: entry.reason,
              note: entry.note,
            }))
          )
        );
      }
    }

    await this.db.batch(statements);
    console.log(
      `[STORE] Saved ${world.simulationId} at tick ${world.tick} (${statements.length} statements)`
    );
  }

  async loadWorld(simulationId: string): Promise<WorldState> {
    if (!simulationIdSchema.safeParse(simulationId).success) {
      throw new SimulationNotFoundError(simulationId);
    }
    const snapshot = await this.db.query.worldSnapshots.findFirst({
      where: eq(worldSnapshots.simulationId, simulationId),
      orderBy: [desc(worldSnapshots.tick)],
    });
    if (!snapshot) throw new SimulationNotFoundError(simulationId);
    return parseWorld(snapshot.state);
  }

  async getReport(simulationId: string, tick: number): Promise<TickReport | null> {
    if (!simulationIdSchema.safeParse(simulationId).success) {
      throw new SimulationNotFoundError(simulationId);
    }
    const simulation = await this.db.query.simulations.findFirst({
      where: eq(simulations.id, simulationId),
      columns: { id: true },
    });
    if (!simulation) throw new SimulationNotFoundError(simulationId);

    const row = await this.db.query.tickReports.findFirst({
      where: and(eq(tickReports.simulationId, simulationId), eq(tickReports.tick, tick)),
    });
    return row?.report ?? null;
  }

  async listSimulations(): Promise<SimulationSummary[]> {
    const rows = await this.db.query.simulations.findMany({
      orderBy: [asc(simulations.createdAt)],
    });
    return rows.map((row) => ({
      id: row.id,
      name: row.name,
      tick: row.currentTick,
      status: row.status,
      createdAt: row.createdAt.toISOString(),
    }));
  }
}
