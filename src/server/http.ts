import express, { NextFunction, Request, Response } from "express";
import bodyParser from "body-parser";
import type { ForgeLogger } from "../core/logger";
import { describeThrown } from "../core/errors";
import { PeerMessageHandlers, messageRoutes, sendError } from "./routes/message";

export interface PeerAppDeps {
  handlers: PeerMessageHandlers;
  logger?: ForgeLogger;
}

function isBodyParserError(error: unknown): boolean {
  return (
    error !== null &&
    typeof error === "object" &&
    "type" in error &&
    (error.type === "entity.parse.failed" || error.type === "entity.too.large")
  );
}

export function createPeerApp(deps: PeerAppDeps) {
  const app = express();

  app.use((req, res, next) => {
    const started = Date.now();
    res.on("finish", () => {
      deps.logger?.traceRequest(req.method, req.originalUrl, res.statusCode, Date.now() - started, {
        senderId: req.socket.remoteAddress,
      });
    });
    next();
  });

  app.use(bodyParser.json({ limit: "256kb" }));

  app.get("/health", (req, res) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  app.use("/", messageRoutes(deps.handlers));

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({
      error: "Not found",
      message: `Route ${req.method} ${req.path} not found`,
      availableEndpoints: ["GET /health", "POST /message"],
    });
  });

  // Malformed JSON and other errors raised before a route runs
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParserError(error)) {
      res.status(400).json({
        ok: false,
        error: { code: "validation_error", message: `Request body rejected: ${describeThrown(error).message}` },
      });
      return;
    }
    sendError(res, error);
  });

  return app;
}
