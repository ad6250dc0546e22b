import type { Request, Response, NextFunction, RequestHandler } from "express";

// The live stream and health check stay public
const PUBLIC_PATHS = new Set(["/api/health", "/api/events"]);

export function apiKeyAuth(apiKey: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (PUBLIC_PATHS.has(req.path)) {
      return next();
    }

    const provided = req.headers["x-api-key"];

    if (!provided || provided !== apiKey) {
      res.status(401).json({
        error: "Unauthorized",
        message: "Invalid or missing API key",
        statusCode: 401,
      });
      return;
    }

    next();
  };
}
