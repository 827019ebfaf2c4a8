import { describe, expect, it } from "vitest";

import type { ScheduledTrain } from "@sidings/protocol";

import { SidingsSimulation, formatClock, type TickResult } from "../src/index.js";

const morningRun: ScheduledTrain = {
  id: "morning-1",
  spawnPoint: "east",
  departureMinute: 0,
  consist: [
    { id: "loco-1", type: "locomotive" },
    { id: "coach-1", type: "passenger_car" },
    { id: "flat-1", type: "flatbed" }
  ],
  program: [
    { type: "move_to", spot: "platform" },
    { type: "wait_seconds", seconds: 10 },
    { type: "move_to", spot: "team_track" }
  ]
};

const shunter: ScheduledTrain = {
  id: "shunter-2",
  spawnPoint: "east",
  departureMinute: 1,
  consist: [
    { id: "loco-2", type: "locomotive" },
    { id: "box-1", type: "boxcar" }
  ],
  program: [{ type: "set_switch", switchId: "main", position: "normal" }, { type: "couple" }]
};

const local: ScheduledTrain = {
  id: "local-3",
  spawnPoint: "east",
  departureMinute: 2,
  consist: [{ id: "loco-3", type: "locomotive" }],
  program: [{ type: "move_to", spot: "platform" }]
};

function runFor(simulation: SidingsSimulation, seconds: number): TickResult[] {
  const results: TickResult[] = [];
  for (let second = 0; second < seconds; second += 1) {
    results.push(simulation.tick(1));
  }
  return results;
}

describe("SidingsSimulation", () => {
  it("runs a morning timetable", () => {
    const simulation = SidingsSimulation.create({ switches: { main: "reverse" } });
    simulation.schedule(morningRun);
    simulation.schedule(shunter);
    simulation.schedule(local);

    const results = runFor(simulation, 180);

    expect(results.flatMap((result) => result.spawned)).toEqual(["morning-1", "shunter-2", "local-3"]);
    expect(results.flatMap((result) => result.effects)).toEqual([
      { type: "set_switch", switchId: "main", position: "normal" }
    ]);
    expect(results.flatMap((result) => result.stopped)).toEqual([
      { id: "shunter-2", reason: "Couple: no adjacent cars found" },
      { id: "local-3", reason: "Cannot reach Platform" }
    ]);
    expect(results.flatMap((result) => result.finished)).toEqual(["morning-1"]);
    expect(results.flatMap((result) => result.despawned)).toEqual([]);

    const world = simulation.getWorld();
    expect(world.clock).toBe("06:03:00");
    expect(world.switches).toEqual({ main: "normal" });
    expect(world.pending).toEqual([]);

    const morning = world.trains.find((train) => train.id === "morning-1");
    expect(morning?.position).toBeCloseTo(450.8);
    expect(morning?.speed).toBe(0);
    expect(morning?.programCounter).toBe(3);
    expect(morning?.currentOrder).toBeUndefined();
    expect(morning?.trainState).toEqual({ state: "waiting_for_orders" });
    expect(morning?.description).toBe("1 loco, 1 coach, 1 flatbed");
    expect(morning?.routeTermination).toBe("reached_end");
    expect(morning?.pose?.position.y).toBeCloseTo(-4.8536, 3);
  });

  it("keeps routes built at spawn when the switch changes", () => {
    const simulation = SidingsSimulation.create({ switches: { main: "reverse" } });
    simulation.schedule({ ...morningRun, program: [] });
    simulation.tick(0.1);

    simulation.setSwitch("main", "normal");
    simulation.tick(0.1);

    expect(simulation.getTrain("morning-1")?.route.totalLength).toBeCloseTo(530.8);
    expect(simulation.switches).toEqual({ main: "normal" });
  });

  it("holds trains until their departure minute", () => {
    const simulation = SidingsSimulation.create();
    simulation.schedule({ ...local, departureMinute: 5 });
    simulation.schedule({ ...morningRun, departureMinute: 1 });

    expect(simulation.getWorld().pending.map((train) => train.id)).toEqual(["morning-1", "local-3"]);

    runFor(simulation, 59);
    expect(simulation.getWorld().trains).toEqual([]);

    const result = simulation.tick(1);
    expect(result.spawned).toEqual(["morning-1"]);
  });

  it("scales simulated time", () => {
    const simulation = SidingsSimulation.create({ timeScale: 4 });
    const result = simulation.tick(1.5);

    expect(result.clockSeconds).toBe(21606);
    expect(simulation.getWorld().timeScale).toBe(4);
  });

  it("ignores empty ticks", () => {
    const simulation = SidingsSimulation.create();
    expect(simulation.tick(0)).toEqual({
      clockSeconds: 21600,
      spawned: [],
      despawned: [],
      finished: [],
      stopped: [],
      effects: []
    });
  });

  it("rejects bad input", () => {
    const simulation = SidingsSimulation.create();
    simulation.schedule(morningRun);

    expect(() => simulation.schedule(morningRun)).toThrow("Train morning-1 is already scheduled");
    expect(() => simulation.schedule({ ...local, consist: [] })).toThrow(
      "Invalid ScheduledTrain: consist must not be empty"
    );
    expect(() => simulation.tick(Number.NaN)).toThrow("tick expects a finite number of seconds, got NaN");
    expect(() => SidingsSimulation.create({ timeScale: 0 })).toThrow("timeScale must be positive, got 0");
  });
});

describe("formatClock", () => {
  it("prints the time of day", () => {
    expect(formatClock(21600)).toBe("06:00:00");
    expect(formatClock(21600 + 3725.9)).toBe("07:02:05");
    expect(formatClock(86400 + 61)).toBe("00:01:01");
  });
});
