import {
  consistLength,
  type Car,
  type Order,
  type Reverser,
  type ScheduledTrain,
  type SpawnPointId,
  type SwitchSnapshot,
  type TrainState
} from "@sidings/protocol";
import { buildRoute, sawmillPlan, type Route, type TrackPlan } from "@sidings/track";

export interface ActiveTrain {
  id: string;
  spawnPoint: SpawnPointId;
  consist: Car[];
  /** Distance of the lead car's front along the route, in metres. */
  position: number;
  /** Always non-negative; direction comes from the reverser. */
  speed: number;
  route: Route;
  program: Order[];
  programCounter: number;
  trainState: TrainState;
  reverser: Reverser;
  waitTimer: number;
}

/** Seconds a wait order starts from when the program counter lands on it. */
export function waitTimerFor(order: Order | undefined): number {
  return order?.type === "wait_seconds" ? order.seconds : 0;
}

/**
 * Puts a scheduled train on the layout at its spawn point. The route is built
 * once, from the switch snapshot at this moment, and never rebuilt.
 */
export function spawnTrain(
  scheduled: ScheduledTrain,
  switches: SwitchSnapshot,
  plan: TrackPlan = sawmillPlan
): ActiveTrain {
  const start = plan.spawnPoints[scheduled.spawnPoint];
  const route = buildRoute(start.elementId, start.connectorIndex, switches, plan.layout);
  const program = [...scheduled.program];

  return {
    id: scheduled.id,
    spawnPoint: scheduled.spawnPoint,
    consist: [...scheduled.consist],
    position: 0,
    speed: 0,
    route,
    program,
    programCounter: 0,
    trainState: program.length === 0 ? { state: "waiting_for_orders" } : { state: "executing" },
    reverser: "forward",
    waitTimer: waitTimerFor(program[0])
  };
}

/** True once the whole train is beyond the far end, or backed out behind the start. */
export function hasLeftRoute(train: ActiveTrain): boolean {
  return train.position - consistLength(train.consist) > train.route.totalLength || train.position < 0;
}
