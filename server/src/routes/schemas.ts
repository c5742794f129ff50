/**
 * Request body schemas
 */

import { z } from "zod";
import type { JsonValue } from "../canonical/index.js";

const jsonValue: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValue), z.record(jsonValue)]),
);
const jsonObject = z.record(jsonValue);

const attachment = z.object({
  type: z.literal("attachment").default("attachment"),
  ref: z.string().min(1),
  mediaType: z.string().min(1),
  data: z.string().optional(),
  name: z.string().optional(),
});

const toolResult = z.object({
  toolCallId: z.string().min(1),
  content: z.string(),
  isError: z.boolean().optional(),
});

const tool = z.object({
  name: z.string().min(1),
  description: z.string().default(""),
  inputSchema: jsonObject,
});

const thinking = z.object({
  enabled: z.boolean(),
  budgetTokens: z.number().int().positive().optional(),
  effort: z.enum(["low", "medium", "high"]).optional(),
  preserveAcrossTurns: z.boolean().optional(),
});

export const CreateSessionBody = z.object({
  model: z.string().min(1).optional(),
});

export const MessageBody = z.object({
  content: z.string().optional(),
  attachments: z.array(attachment).optional(),
  toolResults: z.array(toolResult).optional(),
  model: z.string().min(1).optional(),
  thinking: thinking.optional(),
  maxTokens: z.number().int().positive().optional(),
  temperature: z.number().min(0).max(2).optional(),
  tools: z.array(tool).optional(),
  stream: z.boolean().optional(),
});

export const EndSessionBody = z.object({
  reason: z.string().min(1).default("client_request"),
});

export const CoreBlockBody = z.object({
  content: z.string(),
});

export const SaveMemoryBody = z.object({
  text: z.string().min(1),
  tags: z.array(z.string()).optional(),
});
