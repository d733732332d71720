import { z } from "zod";

/**
 * Closed command catalogue.
 *
 * Each command is its own typed variant with its own zod schema. The
 * `parameters` table describes the same schema for humans and prompts, in
 * declaration order (the order the validator reports violations in).
 */

export const COMMAND_NAMES = ["move_to", "rotate", "start_patrol"] as const;
export type CommandName = (typeof COMMAND_NAMES)[number];

export const ROTATION_DIRECTIONS = ["clockwise", "counter-clockwise"] as const;
export const PATROL_ROUTES = ["first_floor", "bedrooms", "second_floor"] as const;
export const PATROL_SPEEDS = ["slow", "medium", "fast"] as const;

export const CONTINUOUS_PATROL = -1;

export const REPEAT_COUNT_ZERO_MESSAGE =
  "repeat_count cannot be 0. Use -1 for continuous or >= 1 for finite loops";
export const REPEAT_COUNT_RANGE_MESSAGE =
  "repeat_count must be -1 for continuous or >= 1 for finite loops";

export const MoveToParams = z.object({
  x: z.number(),
  y: z.number(),
});

export const RotateParams = z.object({
  angle: z.number(),
  direction: z.enum(ROTATION_DIRECTIONS),
});

export const StartPatrolParams = z.object({
  route_id: z.enum(PATROL_ROUTES),
  speed: z.enum(PATROL_SPEEDS).default("medium"),
  repeat_count: z
    .number()
    .int()
    .min(CONTINUOUS_PATROL, { message: REPEAT_COUNT_RANGE_MESSAGE })
    .refine((value) => value !== 0, { message: REPEAT_COUNT_ZERO_MESSAGE })
    .default(1),
});

export type MoveToParams = z.infer<typeof MoveToParams>;
export type RotateParams = z.infer<typeof RotateParams>;
export type StartPatrolParams = z.infer<typeof StartPatrolParams>;

export type RobotCommand =
  | { command: "move_to"; params: MoveToParams }
  | { command: "rotate"; params: RotateParams }
  | { command: "start_patrol"; params: StartPatrolParams };

export type ParameterKind = "number" | "integer" | "enum" | "string";

export type ParameterConstraint =
  | { type: "none" }
  | { type: "enum"; allowed: readonly string[] }
  | { type: "range"; min?: number; max?: number; minExclusive?: boolean; maxExclusive?: boolean }
  | { type: "not_equal"; forbidden: number; message: string };

export type ParameterDefinition = {
  name: string;
  kind: ParameterKind;
  constraints: ParameterConstraint[];
  description: string;
  default?: string | number;
};

export type CommandSchema = {
  name: CommandName;
  description: string;
  parameters: readonly ParameterDefinition[];
};

const SCHEMAS: Record<CommandName, CommandSchema> = {
  move_to: {
    name: "move_to",
    description: "Navigate to a coordinate on the floor map",
    parameters: [
      { name: "x", kind: "number", constraints: [{ type: "none" }], description: "X coordinate" },
      { name: "y", kind: "number", constraints: [{ type: "none" }], description: "Y coordinate" },
    ],
  },
  rotate: {
    name: "rotate",
    description: "Rotate in place",
    parameters: [
      {
        name: "angle",
        kind: "number",
        constraints: [{ type: "none" }],
        description: "Rotation angle in degrees",
      },
      {
        name: "direction",
        kind: "enum",
        constraints: [{ type: "enum", allowed: ROTATION_DIRECTIONS }],
        description: "Direction of rotation",
      },
    ],
  },
  start_patrol: {
    name: "start_patrol",
    description: "Patrol a predefined route",
    parameters: [
      {
        name: "route_id",
        kind: "enum",
        constraints: [{ type: "enum", allowed: PATROL_ROUTES }],
        description: "Route identifier",
      },
      {
        name: "speed",
        kind: "enum",
        constraints: [{ type: "enum", allowed: PATROL_SPEEDS }],
        description: "Patrol speed",
        default: "medium",
      },
      {
        name: "repeat_count",
        kind: "integer",
        constraints: [
          { type: "range", min: CONTINUOUS_PATROL },
          { type: "not_equal", forbidden: 0, message: REPEAT_COUNT_ZERO_MESSAGE },
        ],
        description: "Number of patrol loops. -1 for continuous, >= 1 for finite loops",
        default: 1,
      },
    ],
  },
};

export function isCommandName(name: string): name is CommandName {
  return COMMAND_NAMES.some((known) => known === name);
}

export function schemaFor(commandName: string): CommandSchema | undefined {
  return isCommandName(commandName) ? SCHEMAS[commandName] : undefined;
}

export function listCommandNames(): CommandName[] {
  return [...COMMAND_NAMES];
}

export function describeCommands(): CommandSchema[] {
  return COMMAND_NAMES.map((name) => SCHEMAS[name]);
}
