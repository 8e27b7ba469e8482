import { z } from "zod";
import type { BotConfig } from "./types.js";
import { isValidTimeZone } from "../utils/time.js";

const TIME_OF_DAY = /^([01]\d|2[0-3]):[0-5]\d(:[0-5]\d)?$/;

const timeOfDaySchema = z.string().regex(TIME_OF_DAY, "expected HH:MM or HH:MM:SS");

const proactiveSchema = z.object({
  enabled: z.boolean().default(false),
  maxPerDay: z.number().int().min(0).default(1),
  cooldownHours: z.number().min(0).default(6),
  minConfidence: z.number().min(0).max(1).default(0.6),
  maxPendingPerChat: z.number().int().min(0).default(2),
});

const quietHoursSchema = z.object({
  start: timeOfDaySchema,
  end: timeOfDaySchema,
});

const groupsSchema = z.object({
  allowProactive: z.boolean().default(false),
  replyOnlyWhenMentioned: z.boolean().default(true),
});

const securitySchema = z.object({
  sharedSecret: z.string().min(1),
});

const runtimeSchema = z.object({
  host: z.string().default("127.0.0.1"),
  port: z.number().int().positive().default(8000),
  schedulerIntervalSeconds: z.number().int().positive().default(20),
  dbPath: z.string().optional(),
});

const connectorSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("stub") }),
  z.object({
    type: z.literal("http"),
    url: z.string().url(),
    token: z.string().optional(),
    timeoutMs: z.number().int().positive().default(10_000),
  }),
]);

const memorySchema = z.object({
  recentMessages: z.number().int().positive().default(30),
  summaryMaxChars: z.number().int().min(16).default(1200),
});

const llmSchema = z.object({
  baseUrl: z.string().optional(),
  apiKey: z.string().optional(),
  model: z.string().optional(),
  timeoutMs: z.number().int().positive().default(30_000),
  temperature: z.number().min(0).max(2).default(0.4),
});

const loggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
  file: z.string().optional(),
  json: z.boolean().optional(),
});

export const botConfigSchema = z.object({
  timezone: z
    .string()
    .default("UTC")
    .refine(isValidTimeZone, (tz) => ({ message: `Invalid timezone: ${tz}` })),
  tone: z.string().default("friendly"),
  gifRate: z.enum(["off", "low", "medium", "high"]).default("medium"),
  gifFolder: z.string().default("assets/gifs"),
  proactive: proactiveSchema.default({}),
  quietHours: z.array(quietHoursSchema).default([]),
  groups: groupsSchema.default({}),
  security: securitySchema,
  runtime: runtimeSchema.default({}),
  connector: connectorSchema.default({ type: "stub" }),
  memory: memorySchema.default({}),
  llm: llmSchema.default({}),
  logging: loggingSchema.default({}),
});

export function parseConfig(raw: unknown): BotConfig {
  return botConfigSchema.parse(raw);
}
