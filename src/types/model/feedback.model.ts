export type GenerationSource = "openai-compatible" | "native";

export interface GenerationFailure {
  source: GenerationSource;
  reason: string;
}

export type GenerationOutcome =
  | { status: "success"; text: string; source: GenerationSource }
  | { status: "exhausted"; failures: GenerationFailure[] };

export type OllamaConnectionStatus =
  | {
      status: "healthy";
      ollama_running: true;
      model_available: boolean;
      available_models: string[];
    }
  | { status: "error"; ollama_running: false; error: string };

export interface DailyFeedback {
  date: string;
  timezone: string;
  tip: string;
}
