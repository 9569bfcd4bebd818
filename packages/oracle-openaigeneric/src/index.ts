import { z } from "zod";
import type {
  CompletionOptions,
  Logger,
  Oracle,
  Plugin,
  PluginContext,
  TokenUsage,
} from "@conductor/sdk";

const PLUGIN_NAME = "@conductor/oracle-openaigeneric";
const DEFAULT_BASE_URL = "https://api.openai.com/v1";
const DEFAULT_MODEL = "gpt-4o-mini";
const ERROR_BODY_LIMIT = 500;

const configSchema = z.object({
  apiKey: z.string().optional(),
  baseUrl: z.string().url().optional(),
  defaultModel: z.string().min(1).optional(),
  organization: z.string().optional(),
  project: z.string().optional(),
  temperature: z.number().min(0).max(2).optional(),
  maxTokens: z.number().int().positive().optional(),
  headers: z.record(z.string()).optional(),
  timeoutMs: z.number().int().positive().optional(),
});

export type OpenAIGenericConfig = z.infer<typeof configSchema>;

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z
          .object({
            content: z.string().nullish(),
          })
          .nullish(),
      }),
    )
    .optional(),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
      total_tokens: z.number().optional(),
    })
    .nullish(),
});

type CompletionResponse = z.infer<typeof completionSchema>;

export class OracleRequestError extends Error {
  public readonly status: number;
  public readonly body: string;

  constructor(status: number, body: string) {
    super(`OpenAI-like request failed (${status}): ${body.slice(0, ERROR_BODY_LIMIT)}`);
    this.name = "OracleRequestError";
    this.status = status;
    this.body = body;

    Object.setPrototypeOf(this, OracleRequestError.prototype);
  }
}

/**
 * Oracle backed by any OpenAI-compatible `/chat/completions` endpoint.
 * Each prompt is sent as a single user message; no streaming.
 */
export class OpenAIGenericOracle implements Oracle, Plugin {
  readonly name = PLUGIN_NAME;
  readonly version = "0.1.0";
  readonly type = "oracle" as const;

  private config: OpenAIGenericConfig;
  private logger?: Logger;

  constructor(config: OpenAIGenericConfig = {}) {
    this.config = configSchema.parse(config);
  }

  async init(context: PluginContext): Promise<void> {
    this.logger = context.logger;
    const raw = context.config.get(`plugins."${PLUGIN_NAME}"`);
    if (raw === undefined) return;

    const parsed = configSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
      throw new Error(`Invalid ${PLUGIN_NAME} configuration: ${issues.join("; ")}`);
    }
    this.config = { ...this.config, ...parsed.data };
  }

  async destroy(): Promise<void> {
    return;
  }

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    const response = await this.requestJson(
      "/chat/completions",
      {
        method: "POST",
        body: JSON.stringify(this.buildPayload(prompt)),
      },
      options.signal,
    );

    const usage = this.toUsage(response.usage);
    const content = response.choices?.[0]?.message?.content ?? "";
    this.logger?.debug(
      `Completion received (${usage.promptTokens} prompt / ${usage.completionTokens} completion tokens)`,
    );
    return content;
  }

  private buildPayload(prompt: string): Record<string, unknown> {
    const payload: Record<string, unknown> = {
      model: this.config.defaultModel ?? DEFAULT_MODEL,
      messages: [{ role: "user", content: prompt }],
      stream: false,
    };

    if (this.config.temperature !== undefined) payload.temperature = this.config.temperature;
    if (this.config.maxTokens !== undefined) payload.max_tokens = this.config.maxTokens;

    return payload;
  }

  private toUsage(usage: CompletionResponse["usage"]): TokenUsage {
    return {
      promptTokens: usage?.prompt_tokens ?? 0,
      completionTokens: usage?.completion_tokens ?? 0,
      totalTokens: usage?.total_tokens ?? 0,
    };
  }

  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
    };

    if (this.config.apiKey) {
      headers.Authorization = `Bearer ${this.config.apiKey}`;
    }

    if (this.config.organization) {
      headers["OpenAI-Organization"] = this.config.organization;
    }

    if (this.config.project) {
      headers["OpenAI-Project"] = this.config.project;
    }

    if (this.config.headers) {
      Object.assign(headers, this.config.headers);
    }

    return headers;
  }

  private buildUrl(path: string): string {
    const baseUrl = this.config.baseUrl ?? DEFAULT_BASE_URL;
    const trimmedBase = baseUrl.replace(/\/+$/, "");
    const trimmedPath = path.replace(/^\/+/, "");
    return `${trimmedBase}/${trimmedPath}`;
  }

  private async requestJson(
    path: string,
    init: RequestInit,
    signal?: AbortSignal,
  ): Promise<CompletionResponse> {
    const timeout = this.config.timeoutMs;
    const signals = [signal, timeout ? AbortSignal.timeout(timeout) : undefined].filter(
      (s): s is AbortSignal => s !== undefined,
    );

    const response = await fetch(this.buildUrl(path), {
      ...init,
      headers: this.buildHeaders(),
      signal: signals.length > 0 ? AbortSignal.any(signals) : undefined,
    });

    if (!response.ok) {
      throw new OracleRequestError(response.status, await response.text());
    }

    const body: unknown = await response.json();
    const parsed = completionSchema.safeParse(body);
    if (!parsed.success) {
      throw new Error("OpenAI-like response has an unexpected shape");
    }
    return parsed.data;
  }
}

const plugin = new OpenAIGenericOracle();
export default plugin;
