import { CommandParameters } from "../contracts/pipeline";

export type CommandProposal = {
  replyText: string;
  // null = conversational reply; parameters are then ignored.
  command: string | null;
  parameters: CommandParameters;
};

export type ProposalParseResult =
  | { ok: true; proposal: CommandProposal }
  | { ok: false; reason: "invalid_json" | "not_an_object"; detail: string };

export const FALLBACK_REPLY = "I'm ready to help with robot commands!";
export const DEFAULT_CHAT_REPLY = "I'm ready to help!";
export const DEFAULT_COMMAND_REPLY = "Command received";

const CODE_FENCE = /^```(?:json)?\s*([\s\S]*?)\s*```$/i;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stripCodeFence(text: string): string {
  const match = CODE_FENCE.exec(text);
  return match ? match[1] : text;
}

// Absent params become {}; anything else goes to the validator as proposed.
function proposedParameters(value: unknown): CommandParameters {
  const parsed = CommandParameters.safeParse(value);
  return parsed.success ? parsed.data : {};
}

/**
 * Parse raw model output into a proposal.
 *
 * Expected shape: {"response": string, "command": string | null, "command_params": object | null}.
 */
export function parseProposal(rawText: string): ProposalParseResult {
  const text = stripCodeFence(rawText.trim());

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    return { ok: false, reason: "invalid_json", detail: String(error) };
  }

  if (!isRecord(parsed)) {
    return { ok: false, reason: "not_an_object", detail: `Expected a JSON object, got ${typeof parsed}` };
  }

  const command = typeof parsed.command === "string" && parsed.command.trim()
    ? parsed.command.trim()
    : null;
  const response = typeof parsed.response === "string" ? parsed.response : undefined;

  if (!command) {
    return {
      ok: true,
      proposal: { replyText: response ?? DEFAULT_CHAT_REPLY, command: null, parameters: {} },
    };
  }

  return {
    ok: true,
    proposal: {
      replyText: response ?? DEFAULT_COMMAND_REPLY,
      command,
      parameters: proposedParameters(parsed.command_params),
    },
  };
}

export function fallbackProposal(): CommandProposal {
  return { replyText: FALLBACK_REPLY, command: null, parameters: {} };
}
