export {
  ACCELERATION,
  ARRIVAL_THRESHOLD,
  EMERGENCY_BRAKING,
  MAX_SPEED,
  NORMAL_BRAKING,
  brakingDistance,
  trapezoidDistance
} from "./physics.js";

export { hasLeftRoute, spawnTrain, waitTimerFor } from "./train.js";
export type { ActiveTrain } from "./train.js";

export { step } from "./step.js";
export type { StepResult } from "./step.js";

export { OPERATING_DAY_START_SECONDS, SidingsSimulation, departureSeconds, formatClock } from "./simulation.js";
export type {
  PendingTrain,
  SimulationOptions,
  TickResult,
  TrainSnapshot,
  TrainStopped,
  WorldSnapshot
} from "./simulation.js";
