import { readFileSync } from "node:fs";
import { join, resolve } from "node:path";

export type ChatRole = "system" | "user";

export type ChatMessage = {
  role: ChatRole;
  content: string;
};

export const SYSTEM_PROMPT_FILE = "system_prompt.txt";

export const RETRY_FEEDBACK_LABEL = "Previous error:";

/**
 * Loads the system prompt once. The prompt must match the one the model was
 * tuned on, so it lives in a file rather than in code.
 */
export class PromptBuilder {
  readonly systemPrompt: string;

  constructor(promptsDir = process.env.PROMPTS_DIR ?? "prompts") {
    const file = join(resolve(promptsDir), SYSTEM_PROMPT_FILE);
    this.systemPrompt = readFileSync(file, "utf8").trim();
    if (!this.systemPrompt) {
      throw new Error(`System prompt is empty: ${file}`);
    }
  }

  buildMessages(userText: string, retryFeedback: string | null = null): ChatMessage[] {
    return [
      { role: "system", content: this.systemPrompt },
      { role: "user", content: buildUserContent(userText, retryFeedback) },
    ];
  }
}

// Retry feedback rides in the user turn, which is the layout the model was tuned on.
export function buildUserContent(userText: string, retryFeedback: string | null = null): string {
  if (!retryFeedback) return userText;
  return `${userText}\n\n${RETRY_FEEDBACK_LABEL} ${retryFeedback}`;
}
