/**
 * Zod validation schemas for the peer gateway
 */

import { z } from "zod";
import { MAX_NAME_LENGTH, MAX_SOURCE_LENGTH } from "../../core/tool-engine/compiler";

// Tool-share: a peer offers a tool for approval
export const ToolShareSchema = z
  .object({
    name: z.string().min(1).max(MAX_NAME_LENGTH),
    source: z.string().min(1).max(MAX_SOURCE_LENGTH),
  })
  .strict();

// Generic text message
export const GenericMessageSchema = z
  .object({
    message: z.string(),
  })
  .strict();

// Older peers send `content` instead of `message`
export const LegacyMessageSchema = z
  .object({
    content: z.string(),
  })
  .strict();

export const PeerMessageSchema = z.union([ToolShareSchema, GenericMessageSchema, LegacyMessageSchema]);

export type ToolShare = z.infer<typeof ToolShareSchema>;
export type PeerMessage = z.infer<typeof PeerMessageSchema>;
