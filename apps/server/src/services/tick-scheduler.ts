import cron, { type ScheduledTask } from "node-cron";
import { TickInProgressError, errorMessage } from "../lib/errors.js";
import type { SimulationEngine } from "./simulation-engine.js";
import type { SimulationStore } from "./simulation-store.js";

let isRunning = false;

/** Advance every running simulation by one tick. Overlapping runs are skipped. */
export async function runScheduledTicks(
  engine: SimulationEngine,
  store: SimulationStore
): Promise<number> {
  if (isRunning) {
    console.log("[ENGINE] Previous scheduled tick still running, skipping...");
    return 0;
  }

  isRunning = true;
  let advanced = 0;
  try {
    const running = (await store.listSimulations()).filter((s) => s.status === "running");
    for (const simulation of running) {
      try {
        await engine.tick(simulation.id);
        advanced++;
      } catch (error) {
        if (error instanceof TickInProgressError) continue;
        console.error(
          `[ENGINE] Scheduled tick failed for ${simulation.id}:`,
          errorMessage(error)
        );
      }
    }
  } finally {
    isRunning = false;
  }
  return advanced;
}

export function startTickScheduler(
  expression: string,
  engine: SimulationEngine,
  store: SimulationStore
): ScheduledTask {
  if (!cron.validate(expression)) {
    throw new Error(`Invalid TICK_CRON expression: ${expression}`);
  }
  console.log(`[ENGINE] Auto-tick scheduled with cron: ${expression}`);
  return cron.schedule(expression, () => {
    runScheduledTicks(engine, store).catch((error: unknown) => {
      console.error("[ENGINE] Scheduler error:", errorMessage(error));
    });
  });
}
