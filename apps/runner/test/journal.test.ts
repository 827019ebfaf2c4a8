import { describe, expect, it } from "vitest";

import { SidingsSimulation, type TrainSnapshot, type WorldSnapshot } from "@sidings/engine";

import { describeTick, summarizeWorld } from "../src/journal.js";
import { MORNING_RUN_PATH, loadScenario } from "../src/scenario.js";

function snapshot(partial: Partial<TrainSnapshot> & Pick<TrainSnapshot, "id" | "trainState">): TrainSnapshot {
  return {
    spawnPoint: "east",
    consist: [],
    description: "1 loco",
    position: 0,
    speed: 0,
    reverser: "forward",
    programCounter: 0,
    programLength: 1,
    waitTimer: 0,
    routeLength: 500,
    routeTermination: "reached_end",
    ...partial
  };
}

describe("describeTick", () => {
  it("narrates the Morning Run", async () => {
    const scenario = await loadScenario(MORNING_RUN_PATH);
    const simulation = SidingsSimulation.create({ switches: scenario.switches, timeScale: scenario.timeScale });
    for (const train of scenario.trains) {
      simulation.schedule(train);
    }

    const lines: string[] = [];
    for (let second = 0; second < 180; second += 1) {
      lines.push(...describeTick(simulation.tick(1), simulation.getWorld()));
    }

    const completed = lines.filter((line) => line.endsWith("completed its program"));
    expect(completed).toHaveLength(1);
    expect(completed[0]).toMatch(/^\[06:0[01]:\d\d\] morning-1 completed its program$/);

    expect(lines.filter((line) => !line.endsWith("completed its program"))).toEqual([
      "[06:00:01] morning-1 (1 loco, 1 coach, 1 flatbed) entered at East Station",
      "[06:01:00] shunter-2 (1 loco, 1 boxcar) entered at East Station",
      "[06:01:00] switch main set to normal",
      "[06:01:01] shunter-2 stopped: Couple: no adjacent cars found",
      "[06:02:00] local-3 (1 loco) entered at East Station",
      "[06:02:00] local-3 stopped: Cannot reach Platform"
    ]);
  });
});

describe("summarizeWorld", () => {
  it("lists trains and departures", () => {
    const world: WorldSnapshot = {
      plan: "Sawmill",
      clockSeconds: 21600,
      clock: "06:00:00",
      timeScale: 1,
      switches: { main: "reverse" },
      pending: [{ id: "later", spawnPoint: "west", departureMinute: 30 }],
      trains: [
        snapshot({
          id: "t1",
          position: 12.3,
          trainState: { state: "stopped", reason: "Couple: no adjacent cars found" }
        }),
        snapshot({
          id: "t2",
          position: 300,
          speed: 11.11,
          currentOrder: "Move To Platform",
          trainState: { state: "executing" }
        })
      ]
    };

    expect(summarizeWorld(world)).toEqual([
      'Sawmill at 06:00:00, switches {"main":"reverse"}',
      "  t1              12.3 m   0.00 m/s  stopped: Couple: no adjacent cars found",
      "  t2             300.0 m  11.11 m/s  executing Move To Platform",
      "  still to depart: later"
    ]);
  });

  it("says when the layout is empty", () => {
    const world: WorldSnapshot = {
      plan: "Sawmill",
      clockSeconds: 21600,
      clock: "06:00:00",
      timeScale: 1,
      switches: {},
      pending: [],
      trains: []
    };

    expect(summarizeWorld(world)).toEqual(["Sawmill at 06:00:00, switches {}", "No trains on the layout."]);
  });
});
