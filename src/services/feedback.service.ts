import axios, { AxiosInstance } from "axios";
import OpenAI from "openai";
import {
  GenerationFailure,
  GenerationOutcome,
  GenerationSource,
  OllamaConnectionStatus,
} from "../types/model/feedback.model";
import { MacroTotals } from "../types/model/summary.model";
import { describeError } from "../utils/errors";
import { logger } from "../utils/logger";

export const COACH_SYSTEM_PROMPT =
  "You are a helpful nutrition coach. Provide concise, actionable advice.";

export const FEEDBACK_FALLBACK_TEXT =
  "Sorry, I'm unable to generate feedback at this time. Please check your nutrition data manually.";

export interface FeedbackGenerator {
  /** Best-effort text; never rejects. */
  generate(prompt: string): Promise<string>;
}

export interface GenerationStep {
  readonly source: GenerationSource;
  generate(prompt: string): Promise<string>;
}

export interface OllamaOptions {
  url: string;
  model: string;
  timeoutMs: number;
  temperature: number;
  maxTokens: number;
}

/**
 * Ollama's OpenAI-compatible chat endpoint (`/v1/chat/completions`).
 */
export class OpenAICompatibleStep implements GenerationStep {
  readonly source = "openai-compatible" as const;
  private client: OpenAI;

  constructor(private readonly options: OllamaOptions) {
    this.client = new OpenAI({
      baseURL: `${options.url}/v1`,
      // Ollama ignores the key but the SDK requires one
      apiKey: "ollama",
      timeout: options.timeoutMs,
      maxRetries: 0,
    });
  }

  async generate(prompt: string): Promise<string> {
    const completion = await this.client.chat.completions.create({
      model: this.options.model,
      messages: [
        { role: "system", content: COACH_SYSTEM_PROMPT },
        { role: "user", content: prompt },
      ],
      temperature: this.options.temperature,
      max_tokens: this.options.maxTokens,
    });
    return completion.choices[0]?.message?.content?.trim() ?? "";
  }
}

/**
 * Ollama's native `/api/generate` endpoint, non-streaming.
 */
export class NativeOllamaStep implements GenerationStep {
  readonly source = "native" as const;

  constructor(
    private readonly options: OllamaOptions,
    private readonly http: AxiosInstance = axios.create({
      baseURL: options.url,
      timeout: options.timeoutMs,
    })
  ) {}

  async generate(prompt: string): Promise<string> {
    const response = await this.http.post<{ response?: string }>("/api/generate", {
      model: this.options.model,
      prompt: `${COACH_SYSTEM_PROMPT} ${prompt}`,
      stream: false,
      options: {
        temperature: this.options.temperature,
        num_predict: this.options.maxTokens,
      },
    });
    return (response.data.response ?? "").trim();
  }
}

/**
 * Runs the steps in order and stops at the first one that yields text.
 */
export class FeedbackService implements FeedbackGenerator {
  constructor(
    private readonly steps: readonly GenerationStep[],
    private readonly fallbackText: string = FEEDBACK_FALLBACK_TEXT
  ) {}

  async run(prompt: string): Promise<GenerationOutcome> {
    const failures: GenerationFailure[] = [];

    for (const step of this.steps) {
      try {
        const text = await step.generate(prompt);
        if (text) {
          return { status: "success", text, source: step.source };
        }
        failures.push({ source: step.source, reason: "empty response" });
      } catch (error) {
        failures.push({ source: step.source, reason: describeError(error) });
      }
      logger.warn(`Feedback step ${step.source} failed, trying next`);
    }

    return { status: "exhausted", failures };
  }

  async generate(prompt: string): Promise<string> {
    const outcome = await this.run(prompt);
    if (outcome.status === "success") {
      return outcome.text;
    }

    logger.error("All feedback steps failed", outcome.failures);
    return this.fallbackText;
  }
}

export const buildDailyFeedbackPrompt = (
  date: string,
  timeZone: string,
  totals: MacroTotals
): string =>
  [
    `On ${date} (${timeZone}) I ate ${totals.calories} kcal,`,
    `${totals.protein} g protein, ${totals.carbs} g carbohydrates and ${totals.fat} g fat.`,
    "Give me one short, specific tip to improve tomorrow.",
  ].join(" ");

type OllamaTagsResponse = {
  models?: Array<{ name?: string }>;
};

export class OllamaHealthService {
  constructor(
    private readonly model: string,
    private readonly http: AxiosInstance
  ) {}

  static create(options: Pick<OllamaOptions, "url" | "model">): OllamaHealthService {
    return new OllamaHealthService(
      options.model,
      axios.create({ baseURL: options.url, timeout: 10_000 })
    );
  }

  async checkConnection(): Promise<OllamaConnectionStatus> {
    try {
      const response = await this.http.get<OllamaTagsResponse>("/api/tags");
      const availableModels = (response.data.models ?? [])
        .map((model) => model.name)
        .filter((name): name is string => typeof name === "string");

      return {
        status: "healthy",
        ollama_running: true,
        model_available: availableModels.includes(this.model),
        available_models: availableModels,
      };
    } catch (error) {
      return { status: "error", ollama_running: false, error: describeError(error) };
    }
  }
}
