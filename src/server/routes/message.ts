import { Router, Request, Response } from "express";
import { ForgeError, describeThrown } from "../../core/errors";
import type { RiskLevel } from "../../core/safety/classifier";
import { PeerMessage, PeerMessageSchema } from "./schemas";
import { ValidatedLocals, validateBody } from "../middleware/validation";

/**
 * What the gateway needs from the runtime.
 */
export interface PeerMessageHandlers {
  receiveMessage(text: string, senderId: string): void;
  receiveTool(name: string, source: string, senderId: string): Promise<{ name: string; riskLevel: RiskLevel }>;
}

export function senderOf(req: Request): string {
  return req.socket.remoteAddress ?? "unknown";
}

export function sendError(res: Response, error: unknown): void {
  if (error instanceof ForgeError) {
    res.status(error.statusCode ?? 500).json({
      ok: false,
      error: { code: error.code, message: error.message, details: error.details },
    });
    return;
  }
  res.status(500).json({
    ok: false,
    error: { code: "internal_error", message: describeThrown(error).message },
  });
}

export function messageRoutes(handlers: PeerMessageHandlers) {
  const r = Router();

  r.post(
    "/message",
    validateBody(PeerMessageSchema),
    async (req: Request, res: Response<unknown, ValidatedLocals<PeerMessage>>) => {
      const body = res.locals.validatedBody;
      const senderId = senderOf(req);

      if ("source" in body) {
        try {
          const proposal = await handlers.receiveTool(body.name, body.source, senderId);
          res.status(202).json({ status: "queued", name: proposal.name, riskLevel: proposal.riskLevel });
        } catch (error: unknown) {
          sendError(res, error);
        }
        return;
      }

      const text = "message" in body ? body.message : body.content;
      handlers.receiveMessage(text, senderId);
      res.json({ status: "ok", received: text });
    }
  );

  return r;
}
