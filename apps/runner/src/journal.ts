import { formatClock, type TickResult, type TrainSnapshot, type WorldSnapshot } from "@sidings/engine";
import { SPAWN_POINT_NAMES } from "@sidings/protocol";

function describeEntry(world: WorldSnapshot, id: string): string {
  const train = world.trains.find((candidate) => candidate.id === id);
  if (!train) {
    return `${id} entered the layout`;
  }
  return `${id} (${train.description}) entered at ${SPAWN_POINT_NAMES[train.spawnPoint]}`;
}

/** One log line per thing that happened during a tick, in a stable order. */
export function describeTick(result: TickResult, world: WorldSnapshot): string[] {
  const stamp = `[${formatClock(result.clockSeconds)}]`;
  const lines: string[] = [];

  for (const id of result.spawned) {
    lines.push(`${stamp} ${describeEntry(world, id)}`);
  }
  for (const effect of result.effects) {
    lines.push(`${stamp} switch ${effect.switchId} set to ${effect.position}`);
  }
  for (const id of result.finished) {
    lines.push(`${stamp} ${id} completed its program`);
  }
  for (const stopped of result.stopped) {
    lines.push(`${stamp} ${stopped.id} stopped: ${stopped.reason}`);
  }
  for (const id of result.despawned) {
    lines.push(`${stamp} ${id} left the layout`);
  }

  return lines;
}

function describeState(train: TrainSnapshot): string {
  switch (train.trainState.state) {
    case "executing":
      return `executing ${train.currentOrder ?? "-"}`;
    case "waiting_for_orders":
      return "waiting for orders";
    case "stopped":
      return `stopped: ${train.trainState.reason}`;
  }
}

/** Plain-text table of the trains on the layout. */
export function summarizeWorld(world: WorldSnapshot): string[] {
  const lines = [`${world.plan} at ${world.clock}, switches ${JSON.stringify(world.switches)}`];
  if (world.trains.length === 0) {
    lines.push("No trains on the layout.");
  }
  for (const train of world.trains) {
    lines.push(
      `  ${train.id.padEnd(12)} ${train.position.toFixed(1).padStart(7)} m  ${train.speed.toFixed(2).padStart(5)} m/s  ${describeState(train)}`
    );
  }
  if (world.pending.length > 0) {
    lines.push(`  still to depart: ${world.pending.map((train) => train.id).join(", ")}`);
  }
  return lines;
}
