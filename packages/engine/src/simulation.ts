import {
  assertScheduledTrain,
  describeConsist,
  describeOrder,
  type Car,
  type Effect,
  type Reverser,
  type ScheduledTrain,
  type SpawnPointId,
  type SwitchPosition,
  type SwitchSnapshot,
  type TrainState
} from "@sidings/protocol";
import { positionOnRoute, sawmillPlan, type Pose, type RouteTermination, type TrackPlan } from "@sidings/track";

import { step } from "./step.js";
import { hasLeftRoute, spawnTrain, type ActiveTrain } from "./train.js";

/** 06:00, when the operating day and its departure minutes begin. */
export const OPERATING_DAY_START_SECONDS = 6 * 60 * 60;
const DEFAULT_TIME_SCALE = 1;
const DEFAULT_MAX_STEP_SECONDS = 0.1;
const CLOCK_EPSILON = 1e-9;

export interface SimulationOptions {
  plan?: TrackPlan;
  switches?: SwitchSnapshot;
  startClockSeconds?: number;
  timeScale?: number;
  maxStepSeconds?: number;
}

export interface TrainStopped {
  id: string;
  reason: string;
}

export interface TickResult {
  clockSeconds: number;
  spawned: string[];
  despawned: string[];
  /** Trains that ran out of orders during this tick. */
  finished: string[];
  stopped: TrainStopped[];
  effects: Effect[];
}

export interface TrainSnapshot {
  id: string;
  spawnPoint: SpawnPointId;
  consist: Car[];
  description: string;
  position: number;
  speed: number;
  reverser: Reverser;
  programCounter: number;
  programLength: number;
  currentOrder?: string;
  trainState: TrainState;
  waitTimer: number;
  pose?: Pose;
  routeLength: number;
  routeTermination: RouteTermination;
}

export interface PendingTrain {
  id: string;
  spawnPoint: SpawnPointId;
  departureMinute: number;
}

export interface WorldSnapshot {
  plan: string;
  clockSeconds: number;
  clock: string;
  timeScale: number;
  switches: Record<string, SwitchPosition>;
  pending: PendingTrain[];
  trains: TrainSnapshot[];
}

export function formatClock(seconds: number): string {
  const daySeconds = ((Math.floor(seconds) % 86400) + 86400) % 86400;
  const hours = Math.floor(daySeconds / 3600);
  const minutes = Math.floor((daySeconds % 3600) / 60);
  const secs = daySeconds % 60;
  return [hours, minutes, secs].map((value) => String(value).padStart(2, "0")).join(":");
}

export function departureSeconds(train: Pick<ScheduledTrain, "departureMinute">): number {
  return OPERATING_DAY_START_SECONDS + train.departureMinute * 60;
}

function snapshotTrain(train: ActiveTrain): TrainSnapshot {
  const order = train.program[train.programCounter];
  return {
    id: train.id,
    spawnPoint: train.spawnPoint,
    consist: train.consist.map((car) => ({ ...car })),
    description: describeConsist(train.consist),
    position: train.position,
    speed: train.speed,
    reverser: train.reverser,
    programCounter: train.programCounter,
    programLength: train.program.length,
    currentOrder: order ? describeOrder(order) : undefined,
    trainState: { ...train.trainState },
    waitTimer: train.waitTimer,
    pose: positionOnRoute(train.position, train.route),
    routeLength: train.route.totalLength,
    routeTermination: train.route.termination
  };
}

/**
 * Owns the shared world: the clock, the live switch snapshot, the timetable
 * and the trains on the layout. Each tick is cut into equal substeps and
 * every active train is stepped with the same delta.
 */
export class SidingsSimulation {
  private readonly plan: TrackPlan;
  private readonly maxStepSeconds: number;
  private timeScaleValue: number;
  private clock: number;
  private switchState: Record<string, SwitchPosition>;
  private readonly pendingTrains: ScheduledTrain[] = [];
  private readonly activeTrains = new Map<string, ActiveTrain>();

  private constructor(params: {
    plan: TrackPlan;
    switches: Record<string, SwitchPosition>;
    startClockSeconds: number;
    timeScale: number;
    maxStepSeconds: number;
  }) {
    this.plan = params.plan;
    this.switchState = params.switches;
    this.clock = params.startClockSeconds;
    this.timeScaleValue = params.timeScale;
    this.maxStepSeconds = params.maxStepSeconds;
  }

  static create(options: SimulationOptions = {}): SidingsSimulation {
    const timeScale = options.timeScale ?? DEFAULT_TIME_SCALE;
    const maxStepSeconds = options.maxStepSeconds ?? DEFAULT_MAX_STEP_SECONDS;
    if (!(timeScale > 0)) {
      throw new Error(`timeScale must be positive, got ${timeScale}`);
    }
    if (!(maxStepSeconds > 0)) {
      throw new Error(`maxStepSeconds must be positive, got ${maxStepSeconds}`);
    }

    return new SidingsSimulation({
      plan: options.plan ?? sawmillPlan,
      switches: { ...(options.switches ?? {}) },
      startClockSeconds: options.startClockSeconds ?? OPERATING_DAY_START_SECONDS,
      timeScale,
      maxStepSeconds
    });
  }

  get clockSeconds(): number {
    return this.clock;
  }

  get timeScale(): number {
    return this.timeScaleValue;
  }

  get switches(): SwitchSnapshot {
    return { ...this.switchState };
  }

  setTimeScale(timeScale: number): void {
    if (!(timeScale > 0)) {
      throw new Error(`timeScale must be positive, got ${timeScale}`);
    }
    this.timeScaleValue = timeScale;
  }

  /** Throws a switch by hand. Trains already on the layout keep their routes. */
  setSwitch(switchId: string, position: SwitchPosition): void {
    this.switchState = { ...this.switchState, [switchId]: position };
  }

  /** Validates and queues a train; it spawns once its departure minute comes round. */
  schedule(input: unknown): ScheduledTrain {
    const train = assertScheduledTrain(input);
    if (this.activeTrains.has(train.id) || this.pendingTrains.some((pending) => pending.id === train.id)) {
      throw new Error(`Train ${train.id} is already scheduled`);
    }

    const index = this.pendingTrains.findIndex((pending) => pending.departureMinute > train.departureMinute);
    if (index === -1) {
      this.pendingTrains.push(train);
    } else {
      this.pendingTrains.splice(index, 0, train);
    }
    return train;
  }

  getTrain(id: string): ActiveTrain | undefined {
    return this.activeTrains.get(id);
  }

  tick(realSeconds: number): TickResult {
    if (!Number.isFinite(realSeconds)) {
      throw new Error(`tick expects a finite number of seconds, got ${realSeconds}`);
    }

    const result: TickResult = {
      clockSeconds: this.clock,
      spawned: [],
      despawned: [],
      finished: [],
      stopped: [],
      effects: []
    };
    if (realSeconds <= 0) {
      return result;
    }

    const simSeconds = realSeconds * this.timeScaleValue;
    const substeps = Math.max(1, Math.ceil(simSeconds / this.maxStepSeconds - CLOCK_EPSILON));
    const deltaSeconds = simSeconds / substeps;
    const startClock = this.clock;
    for (let index = 0; index < substeps; index += 1) {
      // Derive from the tick start so repeated substeps do not drift.
      this.clock = index === substeps - 1 ? startClock + simSeconds : startClock + deltaSeconds * (index + 1);
      this.substep(deltaSeconds, result);
    }

    result.clockSeconds = this.clock;
    return result;
  }

  getWorld(): WorldSnapshot {
    return {
      plan: this.plan.name,
      clockSeconds: this.clock,
      clock: formatClock(this.clock),
      timeScale: this.timeScaleValue,
      switches: { ...this.switchState },
      pending: this.pendingTrains.map((train) => ({
        id: train.id,
        spawnPoint: train.spawnPoint,
        departureMinute: train.departureMinute
      })),
      trains: [...this.activeTrains.values()].map(snapshotTrain)
    };
  }

  private substep(deltaSeconds: number, result: TickResult): void {
    this.spawnDueTrains(result);

    for (const train of [...this.activeTrains.values()]) {
      const previousState = train.trainState.state;
      const { train: next, effects } = step(deltaSeconds, train, this.plan);

      for (const effect of effects) {
        this.applyEffect(effect);
        result.effects.push(effect);
      }

      if (previousState !== "stopped" && next.trainState.state === "stopped") {
        result.stopped.push({ id: next.id, reason: next.trainState.reason });
      }
      if (previousState === "executing" && next.trainState.state === "waiting_for_orders") {
        result.finished.push(next.id);
      }

      if (hasLeftRoute(next)) {
        this.activeTrains.delete(next.id);
        result.despawned.push(next.id);
        continue;
      }
      this.activeTrains.set(next.id, next);
    }
  }

  private spawnDueTrains(result: TickResult): void {
    while (this.pendingTrains.length > 0) {
      const next = this.pendingTrains[0];
      if (!next || departureSeconds(next) > this.clock + CLOCK_EPSILON) {
        return;
      }
      this.pendingTrains.shift();
      this.activeTrains.set(next.id, spawnTrain(next, this.switchState, this.plan));
      result.spawned.push(next.id);
    }
  }

  private applyEffect(effect: Effect): void {
    switch (effect.type) {
      case "set_switch":
        this.switchState = { ...this.switchState, [effect.switchId]: effect.position };
        return;
    }
  }
}
