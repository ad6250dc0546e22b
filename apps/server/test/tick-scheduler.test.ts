import { describe, it, expect, vi, beforeEach } from "vitest";
import { SimulationEngine } from "../src/services/simulation-engine.js";
import { MemorySimulationStore } from "../src/services/simulation-store.js";
import { runScheduledTicks, startTickScheduler } from "../src/services/tick-scheduler.js";
import { RecordingReporter, ScriptedOracles, sequence } from "./helpers.js";

let store: MemorySimulationStore;
let engine: SimulationEngine;

beforeEach(() => {
  store = new MemorySimulationStore();
  engine = new SimulationEngine({
    store,
    oracles: new ScriptedOracles().asOracles(),
    reporter: new RecordingReporter(),
    oracleTimeoutMs: 1000,
    random: sequence(),
  });
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

describe("runScheduledTicks", () => {
  it("advances running simulations and leaves extinct ones alone", async () => {
    const running = await engine.initialize(1);
    const extinct = await engine.initialize(1);
    await store.saveTick(await store.loadWorld(extinct), null, "extinct");

    expect(await runScheduledTicks(engine, store)).toBe(1);
    expect((await store.loadWorld(running)).tick).toBe(1);
    expect((await store.loadWorld(extinct)).tick).toBe(0);
  });

  it("keeps going when one simulation fails", async () => {
    await store.createSimulation("Never initialized");
    const healthy = await engine.initialize(1);

    expect(await runScheduledTicks(engine, store)).toBe(1);
    expect((await store.loadWorld(healthy)).tick).toBe(1);
    expect(console.error).toHaveBeenCalledTimes(1);
  });
});

describe("startTickScheduler", () => {
  it("rejects an invalid cron expression", () => {
    expect(() => startTickScheduler("every so often", engine, store)).toThrow(
      "Invalid TICK_CRON expression: every so often"
    );
  });

  it("schedules a valid expression", () => {
    const task = startTickScheduler("0 0 1 1 *", engine, store);
    task.stop();
  });
});
