import { z } from "zod";

// Parameters exactly as the model proposed them; the validator owns their shape.
export const CommandParameters = z.union([
  z.record(z.string(), z.unknown()),
  z.array(z.unknown()),
  z.string(),
  z.number(),
  z.boolean(),
]);
export type CommandParameters = z.infer<typeof CommandParameters>;

// Caller -> orchestrator.
export const ProcessInput = z.object({
  userInput: z.string().trim().min(1).max(20_000),
});

export type ProcessInput = z.infer<typeof ProcessInput>;

// Orchestrator -> generation service.
export const GenerationRequest = z.object({
  userText: z.string().trim().min(1),
  retryFeedback: z.string().min(1).nullable().default(null),
  correlationId: z.string().min(1).optional(),
});

export type GenerationRequest = z.infer<typeof GenerationRequest>;

export const GenerationResponse = z.object({
  replyText: z.string(),
  command: z.string().min(1).nullable(),
  commandParameters: CommandParameters.nullable(),
});

export type GenerationResponse = z.infer<typeof GenerationResponse>;

// Orchestrator -> validator service.
export const ExecuteCommandRequest = z.object({
  command: z.string().min(1),
  commandParameters: CommandParameters.default({}),
  correlationId: z.string().min(1).optional(),
});

export type ExecuteCommandRequest = z.infer<typeof ExecuteCommandRequest>;

export const ValidatorSuccess = z.object({
  success: z.literal(true),
  message: z.string(),
  command: z.string(),
  commandParameters: CommandParameters,
});

export const ValidatorFailure = z.object({
  success: z.literal(false),
  error: z.string(),
  details: z.string().optional(),
  errorCode: z.enum(["unknown_command", "schema_violation", "internal_error"]).optional(),
});

export const ValidatorResponse = z.discriminatedUnion("success", [ValidatorSuccess, ValidatorFailure]);

export type ValidatorSuccess = z.infer<typeof ValidatorSuccess>;
export type ValidatorFailure = z.infer<typeof ValidatorFailure>;
export type ValidatorResponse = z.infer<typeof ValidatorResponse>;
