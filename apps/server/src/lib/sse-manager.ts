import type { Response } from "express";
import { randomUUID } from "node:crypto";

export type WorldEventType = "simulation_created" | "tick_completed" | "tick_failed";

export interface WorldEvent {
  type: WorldEventType;
  simulationId: string;
  data: unknown;
}

export class SSEManager {
  private clients: Map<string, Response> = new Map();
  // Clients may follow one simulation or all of them
  private filters: Map<string, string | null> = new Map();

  addClient(res: Response, simulationId: string | null = null): string {
    const clientId = randomUUID();

    res.writeHead(200, {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
    });

    res.write(`data: ${JSON.stringify({ type: "connected", clientId, simulationId })}\n\n`);

    this.clients.set(clientId, res);
    this.filters.set(clientId, simulationId);

    res.on("close", () => {
      this.clients.delete(clientId);
      this.filters.delete(clientId);
    });

    return clientId;
  }

  broadcast(event: WorldEvent): void {
    const message = `event: ${event.type}\ndata: ${JSON.stringify({
      simulationId: event.simulationId,
      ...toObject(event.data),
    })}\n\n`;
    for (const [clientId, client] of this.clients) {
      const filter = this.filters.get(clientId);
      if (filter && filter !== event.simulationId) continue;
      client.write(message);
    }
  }

  get clientCount(): number {
    return this.clients.size;
  }
}

function toObject(data: unknown): Record<string, unknown> {
  if (typeof data === "object" && data !== null && !Array.isArray(data)) {
    return { ...data };
  }
  return { data };
}

export const sseManager = new SSEManager();
