import {
  FAILURE_MESSAGES,
  cannotReachMessage,
  consistLength,
  type Effect,
  type SpotId
} from "@sidings/protocol";
import { sawmillPlan, spotPosition, type TrackPlan } from "@sidings/track";

import {
  ACCELERATION,
  ARRIVAL_THRESHOLD,
  EMERGENCY_BRAKING,
  MAX_SPEED,
  NORMAL_BRAKING,
  brakingDistance,
  trapezoidDistance
} from "./physics.js";
import { waitTimerFor, type ActiveTrain } from "./train.js";

export interface StepResult {
  train: ActiveTrain;
  effects: Effect[];
}

interface Motion {
  position: number;
  speed: number;
}

function directionSign(train: ActiveTrain): 1 | -1 {
  return train.reverser === "forward" ? 1 : -1;
}

function advanceProgram(train: ActiveTrain): ActiveTrain {
  const nextCounter = train.programCounter + 1;
  if (nextCounter >= train.program.length) {
    return {
      ...train,
      programCounter: train.program.length,
      trainState: { state: "waiting_for_orders" },
      waitTimer: 0
    };
  }
  return {
    ...train,
    programCounter: nextCounter,
    trainState: { state: "executing" },
    waitTimer: waitTimerFor(train.program[nextCounter])
  };
}

function stopTrain(train: ActiveTrain, reason: string): ActiveTrain {
  return { ...train, speed: 0, trainState: { state: "stopped", reason } };
}

/**
 * Emergency override near the forward end of the route. Works from the speed
 * and position at the start of the tick, and never lets the train pass the
 * route's end.
 */
function applyBufferStopBrake(train: ActiveTrain, desired: Motion, deltaSeconds: number): Motion {
  if (train.reverser !== "forward") {
    return desired;
  }

  const totalLength = train.route.totalLength;
  const margin = totalLength - train.position;
  if (train.speed <= 0 || margin >= brakingDistance(train.speed, EMERGENCY_BRAKING) + consistLength(train.consist)) {
    return { ...desired, position: Math.min(totalLength, desired.position) };
  }

  const speed = Math.max(0, train.speed - EMERGENCY_BRAKING * deltaSeconds);
  const position = train.position + trapezoidDistance(train.speed, speed, deltaSeconds);
  return { speed, position: Math.min(totalLength, position) };
}

function arrive(train: ActiveTrain, target: number): ActiveTrain {
  return advanceProgram({ ...train, position: target, speed: 0 });
}

function moveTo(deltaSeconds: number, train: ActiveTrain, spot: SpotId, plan: TrackPlan): ActiveTrain {
  const target = spotPosition(spot, train.route, plan);
  if (target === undefined) {
    return stopTrain(train, cannotReachMessage(spot));
  }

  const direction = directionSign(train);
  const distanceToTarget = (target - train.position) * direction;
  if (Math.abs(distanceToTarget) < ARRIVAL_THRESHOLD) {
    return arrive(train, target);
  }

  let desired: Motion;
  if (distanceToTarget > 0) {
    const speed =
      brakingDistance(train.speed, NORMAL_BRAKING) >= distanceToTarget
        ? Math.max(0, train.speed - NORMAL_BRAKING * deltaSeconds)
        : Math.min(MAX_SPEED, train.speed + ACCELERATION * deltaSeconds);
    desired = {
      speed,
      position: train.position + direction * trapezoidDistance(train.speed, speed, deltaSeconds)
    };
  } else {
    // Overshot: hold here until the re-check below settles it.
    desired = { speed: 0, position: train.position };
  }

  const motion = applyBufferStopBrake(train, desired, deltaSeconds);
  const remaining = Math.abs(target - motion.position);
  if (remaining < ARRIVAL_THRESHOLD || (desired.speed === 0 && remaining < 2 * ARRIVAL_THRESHOLD)) {
    return arrive(train, target);
  }

  return { ...train, ...motion };
}

function waitSeconds(deltaSeconds: number, train: ActiveTrain): ActiveTrain {
  const remaining = train.waitTimer - deltaSeconds;
  if (remaining <= 0) {
    return advanceProgram({ ...train, speed: 0, waitTimer: 0 });
  }
  return { ...train, speed: 0, waitTimer: remaining };
}

/** A train with no orders left rolls to a stand under normal braking. */
function coast(deltaSeconds: number, train: ActiveTrain): ActiveTrain {
  if (train.speed <= 0) {
    return { ...train, speed: 0 };
  }
  const speed = Math.max(0, train.speed - NORMAL_BRAKING * deltaSeconds);
  const desired: Motion = {
    speed,
    position: train.position + directionSign(train) * trapezoidDistance(train.speed, speed, deltaSeconds)
  };
  return { ...train, ...applyBufferStopBrake(train, desired, deltaSeconds) };
}

function executeOrder(deltaSeconds: number, train: ActiveTrain, plan: TrackPlan): StepResult {
  const order = train.program[train.programCounter];
  if (!order) {
    return { train: { ...train, trainState: { state: "waiting_for_orders" } }, effects: [] };
  }

  switch (order.type) {
    case "move_to":
      return { train: moveTo(deltaSeconds, train, order.spot, plan), effects: [] };
    case "set_reverser":
      return { train: advanceProgram({ ...train, reverser: order.position }), effects: [] };
    case "set_switch":
      return {
        train: advanceProgram(train),
        effects: [{ type: "set_switch", switchId: order.switchId, position: order.position }]
      };
    case "wait_seconds":
      return { train: waitSeconds(deltaSeconds, train), effects: [] };
    case "couple":
      return { train: stopTrain(train, FAILURE_MESSAGES.coupleNoAdjacentCars), effects: [] };
    case "uncouple":
      return { train: stopTrain(train, FAILURE_MESSAGES.uncoupleUnsupported), effects: [] };
  }
}

/**
 * Advances one train by `deltaSeconds`. Pure: switch changes come back as
 * effects for the caller to fold into the world. Only the current order is
 * evaluated, so chained instant orders take one call each.
 */
export function step(deltaSeconds: number, train: ActiveTrain, plan: TrackPlan = sawmillPlan): StepResult {
  switch (train.trainState.state) {
    case "stopped":
      return { train: { ...train, speed: 0 }, effects: [] };
    case "waiting_for_orders":
      return { train: coast(deltaSeconds, train), effects: [] };
    case "executing":
      return executeOrder(deltaSeconds, train, plan);
  }
}
