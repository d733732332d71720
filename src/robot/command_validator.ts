import type { ZodIssue } from "zod";

import {
  MoveToParams,
  RotateParams,
  StartPatrolParams,
  isCommandName,
  listCommandNames,
  schemaFor,
  type CommandName,
  type ParameterDefinition,
  type RobotCommand,
} from "./command_registry";

export type ValidationErrorCode = "unknown_command" | "schema_violation";

export type ViolationKind = "missing_key" | "invalid_enum" | "wrong_type" | "constraint";

export type ValidationOutcome =
  | {
      valid: true;
      command: RobotCommand;
      message: string;
    }
  | {
      valid: false;
      errorCode: ValidationErrorCode;
      message: string;
      details: string;
      field?: string;
      violation?: ViolationKind;
    };

type VariantParse =
  | { ok: true; command: RobotCommand }
  | { ok: false; issues: ZodIssue[] };

function parseVariant(name: CommandName, parameters: unknown): VariantParse {
  switch (name) {
    case "move_to": {
      const result = MoveToParams.safeParse(parameters);
      return result.success
        ? { ok: true, command: { command: name, params: result.data } }
        : { ok: false, issues: result.error.issues };
    }
    case "rotate": {
      const result = RotateParams.safeParse(parameters);
      return result.success
        ? { ok: true, command: { command: name, params: result.data } }
        : { ok: false, issues: result.error.issues };
    }
    case "start_patrol": {
      const result = StartPatrolParams.safeParse(parameters);
      return result.success
        ? { ok: true, command: { command: name, params: result.data } }
        : { ok: false, issues: result.error.issues };
    }
  }
}

function quoteAll(values: readonly string[]): string {
  return values.map((v) => `'${v}'`).join(", ");
}

function issuePath(issue: ZodIssue): string {
  return issue.path.length ? issue.path.map(String).join(".") : "command_params";
}

function describeIssue(
  issue: ZodIssue,
  definition: ParameterDefinition | undefined
): { violation: ViolationKind; text: string } {
  const field = issuePath(issue);

  if (issue.code === "invalid_type" && issue.received === "undefined") {
    return { violation: "missing_key", text: `Missing required key '${field}'` };
  }

  const enumConstraint = definition?.constraints.find((c) => c.type === "enum");
  if (enumConstraint?.type === "enum"
    && (issue.code === "invalid_enum_value" || issue.code === "invalid_type")) {
    return {
      violation: "invalid_enum",
      text: `Invalid value for '${field}'. Expected one of: ${quoteAll(enumConstraint.allowed)}`,
    };
  }

  if (issue.code === "invalid_type") {
    const kind = definition?.kind ?? issue.expected;
    return {
      violation: "wrong_type",
      text: `Wrong data type for '${field}'. Input should be a valid ${kind}`,
    };
  }

  return { violation: "constraint", text: issue.message };
}

function formatRawDetail(issues: ZodIssue[]): string {
  return issues
    .map((issue) => `${issue.code} at ${issuePath(issue)}: ${issue.message}`)
    .join("; ");
}

/**
 * Validate a proposed command against the closed registry.
 *
 * Parameters are checked in declaration order and the first violation wins.
 * Pure: identical input always yields an identical outcome.
 */
export function validateCommand(commandName: string, parameters: unknown): ValidationOutcome {
  if (!isCommandName(commandName)) {
    return {
      valid: false,
      errorCode: "unknown_command",
      message: `Invalid command. Reason: Unknown command name '${commandName}'`,
      details: `Valid commands are: ${listCommandNames().join(", ")}`,
    };
  }

  const parsed = parseVariant(commandName, parameters);
  if (parsed.ok) {
    return {
      valid: true,
      command: parsed.command,
      message: `Received and validated command: '${commandName}' with params ${JSON.stringify(parameters)}`,
    };
  }

  // zod walks object keys in shape order, so issues[0] is the first declared violation.
  const first = parsed.issues[0];
  const field = first ? issuePath(first) : "command_params";
  const definition = schemaFor(commandName)?.parameters.find((p) => p.name === field);
  const { violation, text } = first
    ? describeIssue(first, definition)
    : { violation: "constraint" as const, text: "Unknown validation error" };

  return {
    valid: false,
    errorCode: "schema_violation",
    message: `Invalid params for '${commandName}': ${text}`,
    details: formatRawDetail(parsed.issues),
    field,
    violation,
  };
}
