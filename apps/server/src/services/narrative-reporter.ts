import type { TickReport } from "@spark-world/shared";
import type { SSEManager } from "../lib/sse-manager.js";

export interface NarrativeReporter {
  publish(report: TickReport): Promise<void>;
}

/** Headline shown to live viewers alongside the structured report. */
export function summarizeReport(report: TickReport): string {
  const parts = [`Tick ${report.tick}: ${report.aliveAgents} minds alive`];
  if (report.bondsFormed.length > 0) parts.push(`${report.bondsFormed.length} bond(s) formed`);
  if (report.bondsDissolved.length > 0) parts.push(`${report.bondsDissolved.length} bond(s) dissolved`);
  if (report.raids.length > 0) parts.push(`${report.raids.length} raid(s)`);
  if (report.agentsSpawned.length > 0) parts.push(`${report.agentsSpawned.length} birth(s)`);
  if (report.agentsVanished.length > 0) parts.push(`${report.agentsVanished.length} vanished`);
  return parts.join(", ");
}

/** Streams every finished tick to Server-Sent Events clients. */
export class SseNarrativeReporter implements NarrativeReporter {
  constructor(private readonly sse: SSEManager) {}

  async publish(report: TickReport): Promise<void> {
    this.sse.broadcast({
      type: "tick_completed",
      simulationId: report.simulationId,
      data: { headline: summarizeReport(report), report },
    });
  }
}
