/**
 * Advisor: the language-model collaborator stages consult for
 * recommendations and generated build files.
 *
 * Stages name a role (analysis, codegen, review); the advisor maps it to the
 * model configured under `advisor.models`. Calls may reject. Stages decide
 * whether a failed call is fatal or a warning.
 */

import { createAnthropic } from "@ai-sdk/anthropic";
import { generateText, stepCountIs, type LanguageModel, type ToolSet } from "ai";
import type { AdvisorConfig, AdvisorRole } from "../config/index.js";
import type { Logger } from "../logging/index.js";

export interface AdviceRequest {
  role: AdvisorRole;
  prompt: string;
  /** System instructions */
  instructions?: string;
  tools?: ToolSet;
  /** Upper bound on tool-calling steps (default 1, or 5 with tools) */
  maxSteps?: number;
}

export interface Advisor {
  ask(request: AdviceRequest): Promise<string>;
}

// ============================================================
// Model-backed advisor
// ============================================================

export interface GenerationRequest {
  modelId: string;
  system?: string;
  prompt: string;
  tools?: ToolSet;
  maxSteps: number;
  maxOutputTokens: number;
  abortSignal: AbortSignal;
}

/** One round trip to a model; returns the final text. */
export type TextGenerator = (request: GenerationRequest) => Promise<string>;

/**
 * Build a generator that calls Anthropic models through the AI SDK.
 */
export function createAnthropicGenerator(apiKey: string): TextGenerator {
  const anthropic = createAnthropic({ apiKey });

  return async (request) => {
    const model: LanguageModel = anthropic(request.modelId);
    const { text } = await generateText({
      model,
      system: request.system,
      prompt: request.prompt,
      tools: request.tools,
      stopWhen: stepCountIs(request.maxSteps),
      maxOutputTokens: request.maxOutputTokens,
      // Retries belong to the stage's retry wrapper
      maxRetries: 0,
      abortSignal: request.abortSignal,
    });
    return text;
  };
}

const DEFAULT_TOOL_STEPS = 5;

export class ModelAdvisor implements Advisor {
  constructor(
    private readonly config: AdvisorConfig,
    private readonly generate: TextGenerator,
    private readonly logger?: Logger
  ) {}

  async ask(request: AdviceRequest): Promise<string> {
    const modelId = this.config.models[request.role];
    const maxSteps = request.maxSteps ?? (request.tools ? DEFAULT_TOOL_STEPS : 1);
    const started = Date.now();

    this.logger?.debug("Advisor request", {
      role: request.role,
      model: modelId,
      tools: request.tools ? Object.keys(request.tools) : [],
      maxSteps,
    });

    const text = await this.generate({
      modelId,
      system: request.instructions,
      prompt: request.prompt,
      tools: request.tools,
      maxSteps,
      maxOutputTokens: this.config.maxOutputTokens,
      abortSignal: AbortSignal.timeout(this.config.timeoutSeconds * 1000),
    });

    this.logger?.debug("Advisor response", {
      role: request.role,
      chars: text.length,
      durationMs: Date.now() - started,
    });
    return text;
  }
}

/**
 * Answers every request with an empty string so stages fall back to their
 * built-in templates.
 */
export class DryRunAdvisor implements Advisor {
  private readonly asked: AdvisorRole[] = [];

  async ask(request: AdviceRequest): Promise<string> {
    this.asked.push(request.role);
    return "";
  }

  get requests(): readonly AdvisorRole[] {
    return [...this.asked];
  }
}

// ============================================================
// Answer helpers
// ============================================================

const FENCE = /```[\w.+-]*[ \t]*\r?\n([\s\S]*?)\r?\n?```/;

/**
 * Body of the first fenced code block, or the trimmed text when there is
 * none.
 */
export function extractCodeBlock(text: string): string {
  const match = FENCE.exec(text);
  if (match) {
    return match[1].trim();
  }
  return text.trim();
}
