import { anthropic } from "@ai-sdk/anthropic";
import { google } from "@ai-sdk/google";
import { createOpenAI, openai } from "@ai-sdk/openai";
import type { LanguageModel } from "ai";
import { config } from "./config.ts";

export interface ModelDescriptor {
  provider: "openai" | "anthropic" | "google" | "ollama";
  modelId: string;
  model: LanguageModel;
}

const OPENAI_DEFAULT = "gpt-4o";
const ANTHROPIC_DEFAULT = "claude-sonnet-4-6";
const GOOGLE_DEFAULT = "gemini-2.5-flash";
const OLLAMA_DEFAULT = "llama3.1:8b";

/** Model used for lease-term extraction, chosen by LLM_PROVIDER and LLM_MODEL. */
export function getExtractionModel(): ModelDescriptor {
  const provider = config.llmProvider;

  if (provider === "anthropic") {
    const modelId = config.llmModel ?? ANTHROPIC_DEFAULT;
    return { provider, modelId, model: anthropic(modelId) };
  }
  if (provider === "google") {
    const modelId = config.llmModel ?? GOOGLE_DEFAULT;
    return { provider, modelId, model: google(modelId) };
  }
  if (provider === "ollama") {
    // Ollama speaks the OpenAI chat completions protocol on /v1
    const modelId = config.llmModel ?? OLLAMA_DEFAULT;
    const ollama = createOpenAI({ baseURL: `${config.ollamaBaseUrl}/v1`, apiKey: "ollama" });
    return { provider, modelId, model: ollama.chat(modelId) };
  }

  const modelId = config.llmModel ?? OPENAI_DEFAULT;
  return { provider, modelId, model: openai(modelId) };
}
