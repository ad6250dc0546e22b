import { Router } from "express";
import { sseManager } from "../lib/sse-manager.js";

const router = Router();

// Optional ?simulationId= narrows the stream to one simulation
router.get("/events", (req, res) => {
  const { simulationId } = req.query;
  sseManager.addClient(res, typeof simulationId === "string" ? simulationId : null);
});

export default router;
