import http from "node:http";

import { SidingsSimulation, type TickResult, type WorldSnapshot } from "@sidings/engine";
import { WebSocketServer, type WebSocket } from "ws";

import { describeTick, summarizeWorld } from "./journal.js";
import { MORNING_RUN_PATH, loadScenario, type Scenario } from "./scenario.js";

type RunnerCommand = "demo" | "run" | "simulate" | "help";
type RunStatus = "running" | "failed";

type StreamMessage =
  | {
      type: "snapshot";
      scenario: string;
      world: WorldSnapshot;
      status: RunStatus;
    }
  | {
      type: "tick";
      world: WorldSnapshot;
      result: TickResult;
    }
  | {
      type: "status";
      status: RunStatus;
      detail?: string;
    };

interface RunnerOptions {
  command: RunnerCommand;
  scenarioPath?: string;
  durationSeconds: number;
  port: number;
  timeScale?: number;
}

const COMMANDS: RunnerCommand[] = ["demo", "run", "simulate", "help"];
const DEFAULT_PORT = 4327;
const DEFAULT_SIMULATE_SECONDS = 600;
const TICK_INTERVAL_MS = 100;

function isCommand(value: string): value is RunnerCommand {
  return COMMANDS.some((command) => command === value);
}

function parsePositiveNumber(raw: string | undefined, name: string): number | undefined {
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`${name} must be a positive number, got "${raw}"`);
  }
  return value;
}

function parseCommand(argv: string[]): RunnerOptions {
  const [, , rawCommand = "demo", ...rest] = argv;
  if (!isCommand(rawCommand)) {
    throw new Error(`Unknown command "${rawCommand}". Try: sidings help`);
  }

  const port = parsePositiveNumber(process.env.SIDINGS_PORT, "SIDINGS_PORT") ?? DEFAULT_PORT;
  const timeScale = parsePositiveNumber(process.env.SIDINGS_TIME_SCALE, "SIDINGS_TIME_SCALE");

  if (rawCommand === "run") {
    return { command: rawCommand, scenarioPath: rest[0], durationSeconds: 0, port, timeScale };
  }

  if (rawCommand === "simulate") {
    const durationSeconds = parsePositiveNumber(rest[1], "seconds") ?? DEFAULT_SIMULATE_SECONDS;
    return { command: rawCommand, scenarioPath: rest[0], durationSeconds, port, timeScale };
  }

  return { command: rawCommand, durationSeconds: 0, port, timeScale };
}

async function selectScenario(options: RunnerOptions): Promise<Scenario> {
  if (options.command === "run") {
    if (!options.scenarioPath) {
      throw new Error("Missing scenario path. Usage: sidings run <scenario.json>");
    }
    return loadScenario(options.scenarioPath);
  }
  return loadScenario(options.scenarioPath ?? MORNING_RUN_PATH);
}

function createSimulation(scenario: Scenario, options: RunnerOptions): SidingsSimulation {
  const simulation = SidingsSimulation.create({
    switches: scenario.switches,
    timeScale: options.timeScale ?? scenario.timeScale
  });
  for (const train of scenario.trains) {
    simulation.schedule(train);
  }
  return simulation;
}

function broadcast(clients: Set<WebSocket>, message: StreamMessage): void {
  const payload = JSON.stringify(message);
  for (const client of clients) {
    if (client.readyState !== client.OPEN) {
      continue;
    }
    try {
      client.send(payload);
    } catch (error) {
      console.error("Dropping stream client:", error instanceof Error ? error.message : error);
      client.terminate();
    }
  }
}

function simulateHeadless(scenario: Scenario, simulation: SidingsSimulation, durationSeconds: number): void {
  console.log(`Simulating ${scenario.name} for ${durationSeconds}s of operating time`);
  const simulatedPerTick = simulation.timeScale;
  const ticks = Math.ceil(durationSeconds / simulatedPerTick);

  for (let index = 0; index < ticks; index += 1) {
    const result = simulation.tick(1);
    for (const line of describeTick(result, simulation.getWorld())) {
      console.log(line);
    }
  }

  for (const line of summarizeWorld(simulation.getWorld())) {
    console.log(line);
  }
}

function serve(scenario: Scenario, simulation: SidingsSimulation, port: number): void {
  let status: RunStatus = "running";

  const clients = new Set<WebSocket>();
  const server = http.createServer((req, res) => {
    const urlPath = (req.url ?? "/").split("?")[0] ?? "/";
    res.setHeader("access-control-allow-origin", "*");

    if (urlPath === "/health") {
      const world = simulation.getWorld();
      res.writeHead(200, { "content-type": "application/json; charset=utf-8" });
      res.end(JSON.stringify({ ok: status === "running", clock: world.clock, trains: world.trains.length }));
      return;
    }

    if (urlPath === "/world") {
      res.writeHead(200, { "content-type": "application/json; charset=utf-8", "cache-control": "no-store" });
      res.end(JSON.stringify(simulation.getWorld()));
      return;
    }

    res.writeHead(404, { "content-type": "text/plain; charset=utf-8" });
    res.end("Sidings runner: GET /health, GET /world, WebSocket /stream\n");
  });

  const wss = new WebSocketServer({ noServer: true });

  server.on("upgrade", (req, socket, head) => {
    const urlPath = (req.url ?? "").split("?")[0] ?? "";
    if (urlPath !== "/stream") {
      socket.destroy();
      return;
    }
    wss.handleUpgrade(req, socket, head, (ws) => {
      wss.emit("connection", ws, req);
    });
  });

  wss.on("connection", (ws) => {
    clients.add(ws);
    const snapshot: StreamMessage = {
      type: "snapshot",
      scenario: scenario.name,
      world: simulation.getWorld(),
      status
    };
    ws.send(JSON.stringify(snapshot));

    ws.on("close", () => {
      clients.delete(ws);
    });
  });

  const interval = setInterval(() => {
    try {
      const result = simulation.tick(TICK_INTERVAL_MS / 1000);
      const world = simulation.getWorld();
      for (const line of describeTick(result, world)) {
        console.log(line);
      }
      broadcast(clients, { type: "tick", world, result });
    } catch (error) {
      status = "failed";
      clearInterval(interval);
      const detail = error instanceof Error ? error.message : "Simulation failed";
      console.error(`Simulation halted: ${detail}`);
      broadcast(clients, { type: "status", status, detail });
    }
  }, TICK_INTERVAL_MS);

  server.listen(port, () => {
    const runnerUrl = `http://localhost:${port}`;
    console.log(`Sidings runner listening at ${runnerUrl} (${scenario.name}, x${simulation.timeScale})`);
    console.log(`Stream: ws://localhost:${port}/stream`);
    console.log(`World:  ${runnerUrl}/world`);
  });

  const shutdown = () => {
    clearInterval(interval);
    for (const client of clients) {
      client.close();
    }
    wss.close();
    server.close();
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

async function main(): Promise<void> {
  const options = parseCommand(process.argv);

  if (options.command === "help") {
    console.log("Sidings commands: demo | run <scenario.json> | simulate [scenario.json] [seconds] | help");
    console.log(`Environment: SIDINGS_PORT (default ${DEFAULT_PORT}), SIDINGS_TIME_SCALE (default: the scenario's)`);
    return;
  }

  const scenario = await selectScenario(options);
  const simulation = createSimulation(scenario, options);

  if (options.command === "simulate") {
    simulateHeadless(scenario, simulation, options.durationSeconds);
    return;
  }

  serve(scenario, simulation, options.port);
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
