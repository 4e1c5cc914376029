/**
 * Domain port for LLM interactions.
 *
 * A single text-generating call: the task prompt plus the retrieved context.
 */
export interface LLMMessage {
  role: "user" | "assistant" | "system";
  content: string;
}

export interface LLMPort {
  callLLM(prompt: string, context: string): Promise<string>;
}
