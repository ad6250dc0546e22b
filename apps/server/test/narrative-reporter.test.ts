import { describe, it, expect, vi } from "vitest";
import { SSEManager } from "../src/lib/sse-manager.js";
import { SseNarrativeReporter, summarizeReport } from "../src/services/narrative-reporter.js";
import { createTickContext } from "../src/services/tick-context.js";
import { makeWorld, sequence } from "./helpers.js";

function reportFor(tick: number) {
  const report = createTickContext(makeWorld([3, 3], tick), sequence()).report;
  report.aliveAgents = 2;
  return report;
}

describe("summarizeReport", () => {
  it("mentions only what happened", () => {
    const report = reportFor(4);
    report.raids.push({
      tick: 4,
      attackerId: "agent_001",
      defenderId: "agent_002",
      outcome: "lost",
      attackerStrength: 3,
      defenderStrength: 3,
      successProbability: 0.5,
      sparksTransferred: -1,
    });

    expect(summarizeReport(report)).toBe("Tick 4: 2 minds alive, 1 raid(s)");
    expect(summarizeReport(reportFor(5))).toBe("Tick 5: 2 minds alive");
  });
});

describe("SseNarrativeReporter", () => {
  it("broadcasts every finished tick", async () => {
    const sse = new SSEManager();
    const broadcast = vi.spyOn(sse, "broadcast");
    const report = reportFor(1);

    await new SseNarrativeReporter(sse).publish(report);

    expect(broadcast).toHaveBeenCalledWith({
      type: "tick_completed",
      simulationId: "sim-test",
      data: { headline: "Tick 1: 2 minds alive", report },
    });
  });
});
