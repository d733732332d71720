import { describe, it, expect } from "vitest";

import {
  MoveToParams,
  RotateParams,
  StartPatrolParams,
  describeCommands,
  isCommandName,
  listCommandNames,
  schemaFor,
} from "../src/robot/command_registry";

describe("command registry", () => {
  it("lists the closed command set in declaration order", () => {
    expect(listCommandNames()).toEqual(["move_to", "rotate", "start_patrol"]);
    expect(describeCommands().map((c) => c.name)).toEqual(["move_to", "rotate", "start_patrol"]);
  });

  it("returns undefined for unknown names", () => {
    expect(schemaFor("fly")).toBeUndefined();
    expect(isCommandName("fly")).toBe(false);
    expect(isCommandName("rotate")).toBe(true);
  });

  it("keeps the parameter table aligned with the zod shapes", () => {
    const shapes = {
      move_to: Object.keys(MoveToParams.shape),
      rotate: Object.keys(RotateParams.shape),
      start_patrol: Object.keys(StartPatrolParams.shape),
    };
    for (const schema of describeCommands()) {
      expect(schema.parameters.map((p) => p.name)).toEqual(shapes[schema.name]);
    }
  });

  it("declares defaults only for optional start_patrol params", () => {
    const patrol = schemaFor("start_patrol");
    expect(patrol?.parameters.map((p) => [p.name, p.default])).toEqual([
      ["route_id", undefined],
      ["speed", "medium"],
      ["repeat_count", 1],
    ]);
    expect(StartPatrolParams.parse({ route_id: "bedrooms" })).toEqual({
      route_id: "bedrooms",
      speed: "medium",
      repeat_count: 1,
    });
  });

  it("exposes enum choices for prompts and clients", () => {
    const rotate = schemaFor("rotate");
    const direction = rotate?.parameters.find((p) => p.name === "direction");
    expect(direction?.constraints).toEqual([
      { type: "enum", allowed: ["clockwise", "counter-clockwise"] },
    ]);
  });
});
