import { z } from "zod";
import type { LlmConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import { SYSTEM_PROMPT, buildUserPrompt } from "./context.js";
import {
  llmOutputSchema,
  toModelOutput,
  type LlmContext,
  type ModelClient,
  type ModelOutput,
} from "./types.js";

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().default("") }).default({}),
      }),
    )
    .default([]),
});

interface ResolvedLlmConfig {
  readonly baseUrl: string;
  readonly apiKey: string;
  readonly model: string;
}

/**
 * OpenAI-compatible chat completions client. Any failure (unconfigured,
 * transport, HTTP status, malformed output) yields the deterministic dummy reply.
 */
export class LlmClient implements ModelClient {
  private readonly resolved: ResolvedLlmConfig | null;
  private readonly logger: Logger;

  constructor(
    private readonly config: LlmConfig,
    logger: Logger,
    private readonly fetchImpl: typeof fetch = fetch,
  ) {
    this.logger = logger.child({ component: "llm" });
    this.resolved = resolveLlmConfig(config);
  }

  isConfigured(): boolean {
    return this.resolved !== null;
  }

  async generate(context: LlmContext): Promise<ModelOutput> {
    if (!this.resolved) return dummyResponse(context);

    let content: string;
    try {
      content = await this.complete(this.resolved, context);
    } catch (err) {
      this.logger.warn({ err }, "Model call failed, falling back to dummy reply");
      return dummyResponse(context);
    }

    const parsed = parseModelOutput(content);
    if (!parsed) {
      this.logger.warn("Model output was not valid JSON, falling back to dummy reply");
      return dummyResponse(context);
    }
    return parsed;
  }

  private async complete(resolved: ResolvedLlmConfig, context: LlmContext): Promise<string> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.timeoutMs);

    try {
      const response = await this.fetchImpl(`${resolved.baseUrl.replace(/\/+$/, "")}/v1/chat/completions`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${resolved.apiKey}`,
        },
        body: JSON.stringify({
          model: resolved.model,
          messages: [
            { role: "system", content: SYSTEM_PROMPT },
            { role: "user", content: buildUserPrompt(context) },
          ],
          temperature: this.config.temperature,
        }),
        signal: controller.signal,
      });
      if (!response.ok) {
        throw new Error(`Model request failed: ${response.status} ${response.statusText}`);
      }
      const body = completionSchema.parse(await response.json());
      return body.choices[0]?.message.content ?? "";
    } finally {
      clearTimeout(timeout);
    }
  }
}

export function resolveLlmConfig(config: LlmConfig): ResolvedLlmConfig | null {
  const baseUrl = config.baseUrl ?? process.env["LLM_BASE_URL"];
  const apiKey = config.apiKey ?? process.env["LLM_API_KEY"];
  const model = config.model ?? process.env["LLM_MODEL"];
  if (!baseUrl || !apiKey || !model) return null;
  return { baseUrl, apiKey, model };
}

/** Outermost `{...}` span of the content, or null. */
export function extractJson(content: string): string | null {
  const start = content.indexOf("{");
  const end = content.lastIndexOf("}");
  if (start === -1 || end === -1 || end <= start) return null;
  return content.slice(start, end + 1);
}

export function parseModelOutput(content: string): ModelOutput | null {
  const json = extractJson(content.trim());
  if (!json) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch {
    return null;
  }

  const result = llmOutputSchema.safeParse(raw);
  return result.success ? toModelOutput(result.data) : null;
}

export function dummyResponse(context: Pick<LlmContext, "incomingText">): ModelOutput {
  const text = context.incomingText.trim() || "Got it.";
  return {
    reply: { text: `(dummy) ${text}`, sendGif: false, gifTag: null },
    planning: { action: "none", items: [] },
    memoryUpdates: [],
  };
}
