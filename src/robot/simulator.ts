import { CONTINUOUS_PATROL, type RobotCommand } from "./command_registry";

export type SimulationOutcome =
  | { ok: true; description: string }
  | { ok: false; code: "internal_error"; message: string };

function unreachableCommand(command: never): SimulationOutcome {
  // Only reachable if the validator and registry disagree.
  return {
    ok: false,
    code: "internal_error",
    message: `Unknown command in simulation: ${JSON.stringify(command)}`,
  };
}

/**
 * Deterministic text standing in for driving the robot.
 */
export function simulateCommand(command: RobotCommand): SimulationOutcome {
  switch (command.command) {
    case "move_to": {
      const { x, y } = command.params;
      return { ok: true, description: `Robot navigating to coordinates (${x}, ${y})` };
    }
    case "rotate": {
      const { angle, direction } = command.params;
      return { ok: true, description: `Robot rotating ${angle} degrees ${direction}` };
    }
    case "start_patrol": {
      const { route_id, speed, repeat_count } = command.params;
      const repeat = repeat_count === CONTINUOUS_PATROL
        ? "continuous patrol"
        : `${repeat_count} time(s)`;
      return {
        ok: true,
        description: `Robot starting ${route_id} patrol at ${speed} speed, repeating ${repeat}`,
      };
    }
    default:
      return unreachableCommand(command);
  }
}
