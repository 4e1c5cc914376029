/**
 * OpenAI + Mastra integration layer.
 *
 * The raw OpenAI client serves embeddings; completions go through a Mastra
 * agent primed as an audio engineer. Both go to the same endpoint and share
 * the retry policy in `./retry`; the SDKs' own retries are turned off.
 */
import { createOpenAI } from "@ai-sdk/openai";
import { config } from "@config/index";
import type { LLMMessage, LLMPort } from "@domain/llm/ports";
import { withRetry } from "@infrastructure/llm/retry";
import { logEvent } from "@infrastructure/logging/Logger";
import {
  messageOf,
  statusCodeOf,
  toUpstreamError,
} from "@typesLocal/StatusCodeError";
import { Agent } from "@mastra/core/agent";
import OpenAI from "openai";

export const client = new OpenAI({
  apiKey: config.openai.key,
  baseURL: config.openai.baseUrl,
  timeout: config.openai.timeoutMs,
  maxRetries: 0,
});

const provider = createOpenAI({
  apiKey: config.openai.key,
  baseURL: config.openai.baseUrl,
});

export const AUDIO_ENGINEER_INSTRUCTIONS = `
You are an experienced audio engineer and music producer.

CONTEXT INPUTS:
- CANDIDATE CHAINS: plugin chains retrieved from the library, each with an id.
- KNOWLEDGE: short notes on mixing and mastering technique.

RULES:
1. Only recommend chains that appear in CANDIDATE CHAINS, referenced by id.
2. Explain each recommendation in terms of the user's request: genre,
   instrument and the sound they describe.
3. Prefer chains built from plugins the user already owns when they are
   listed.
4. Never invent plugins, settings or chains.
5. Reply with the JSON object requested in the prompt and nothing else.
`;

export const agent = new Agent({
  name: "plugin-chain-agent",
  instructions: AUDIO_ENGINEER_INSTRUCTIONS,
  model: provider(config.openai.model),
});

export async function callLLM(
  prompt: string,
  context: string
): Promise<string> {
  const messages: LLMMessage[] = [
    { role: "system", content: `CONTEXT:\n${context || "No context."}` },
    { role: "user", content: prompt },
  ];

  const startedAt = Date.now();

  try {
    const result = await withRetry(
      () =>
        agent.generate(messages as Parameters<(typeof agent)["generate"]>[0], {
          maxRetries: 0,
        }),
      "llm.generate"
    );

    logEvent("LLM_SUCCESS", {
      model: config.openai.model,
      durationMs: Date.now() - startedAt,
      promptLength: prompt.length,
      contextLength: context.length,
    });

    return result.text;
  } catch (error: unknown) {
    logEvent("LLM_FAILURE", {
      model: config.openai.model,
      durationMs: Date.now() - startedAt,
      message: messageOf(error),
      upstreamStatus: statusCodeOf(error),
    });

    throw toUpstreamError(error, "LLM request failed. Check API key or model.");
  }
}

export const llmPort: LLMPort = {
  callLLM,
};
