import type { ChatMessage } from "../control-plane/prompt_builder";
import { RETRY_FEEDBACK_LABEL } from "../control-plane/prompt_builder";

// Deterministic stand-in for the model runner (LLM_PROVIDER=fake).
// Keyword matching only; good enough to drive the pipeline locally without a model.

type FakeProposal = {
  response: string;
  command: string | null;
  command_params: Record<string, unknown> | null;
};

const NUMBER = "(-?\\d+(?:\\.\\d+)?)";
const MOVE_TO = new RegExp(`(?:move|go|navigate)\\s+to\\D*?${NUMBER}\\s*[, ]\\s*${NUMBER}`, "i");
const ROTATE = new RegExp(`(?:rotate|turn)\\D*?${NUMBER}`, "i");
const LOOPS = /(\d+)\s*(?:times|loops?|rounds?)/i;

function lastUserText(messages: ChatMessage[]): string {
  for (let i = messages.length - 1; i >= 0; i--) {
    const m = messages[i];
    if (m.role === "user") {
      // Drop retry feedback; the fake answers the same request again.
      return m.content.split(`\n\n${RETRY_FEEDBACK_LABEL}`)[0].trim();
    }
  }
  return "";
}

function proposeFromText(text: string): FakeProposal {
  const move = MOVE_TO.exec(text);
  if (move) {
    const x = Number(move[1]);
    const y = Number(move[2]);
    return {
      response: `Moving to (${x}, ${y}).`,
      command: "move_to",
      command_params: { x, y },
    };
  }

  const rotate = ROTATE.exec(text);
  if (rotate) {
    const angle = Number(rotate[1]);
    const direction = /counter|anti|left/i.test(text) ? "counter-clockwise" : "clockwise";
    return {
      response: `Rotating ${angle} degrees ${direction}.`,
      command: "rotate",
      command_params: { angle, direction },
    };
  }

  if (/patrol/i.test(text)) {
    const lower = text.toLowerCase();
    const route_id = lower.includes("bedroom")
      ? "bedrooms"
      : lower.includes("second floor") || lower.includes("upstairs")
        ? "second_floor"
        : "first_floor";
    const speed = lower.includes("slow") ? "slow" : lower.includes("fast") ? "fast" : "medium";
    const loops = LOOPS.exec(text);
    const repeat_count = /continuous|forever|non-stop|nonstop/.test(lower)
      ? -1
      : loops
        ? Number(loops[1])
        : 1;
    return {
      response: `Starting the ${route_id.replace("_", " ")} patrol.`,
      command: "start_patrol",
      command_params: { route_id, speed, repeat_count },
    };
  }

  return {
    response: "Hello! I can move to a point, rotate, or start a patrol. What should I do?",
    command: null,
    command_params: null,
  };
}

export async function fakeModelReply(input: { messages: ChatMessage[] }): Promise<{ rawText: string }> {
  const proposal = proposeFromText(lastUserText(input.messages));
  return { rawText: JSON.stringify(proposal) };
}
