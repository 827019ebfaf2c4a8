export interface Vec2 {
  x: number;
  y: number;
}

export type SwitchPosition = "normal" | "reverse";
export type Reverser = "forward" | "reverse";

// Live switch state is always handed to the router as an explicit snapshot.
// Switches missing from the snapshot read as "normal".
export type SwitchSnapshot = Readonly<Record<string, SwitchPosition>>;

export type SpotId = "platform" | "team_track" | "east_tunnel" | "west_tunnel";

export type SpawnPointId = "east" | "west";

export type StockType = "locomotive" | "passenger_car" | "flatbed" | "boxcar";

export interface Car {
  id: string;
  type: StockType;
}

export type Order =
  | { type: "move_to"; spot: SpotId }
  | { type: "set_reverser"; position: Reverser }
  | { type: "set_switch"; switchId: string; position: SwitchPosition }
  | { type: "wait_seconds"; seconds: number }
  | { type: "couple" }
  | { type: "uncouple"; carCount: number };

export type TrainState =
  | { state: "executing" }
  | { state: "waiting_for_orders" }
  | { state: "stopped"; reason: string };

export type Effect = { type: "set_switch"; switchId: string; position: SwitchPosition };

export interface ScheduledTrain {
  id: string;
  spawnPoint: SpawnPointId;
  /** Minutes after the start of the operating day (06:00). */
  departureMinute: number;
  consist: Car[];
  program: Order[];
}

export interface ValidationResult<T> {
  ok: boolean;
  errors: string[];
  value?: T;
}

export const SPOT_IDS: SpotId[] = ["platform", "team_track", "east_tunnel", "west_tunnel"];
export const SPAWN_POINT_IDS: SpawnPointId[] = ["east", "west"];
export const STOCK_TYPES: StockType[] = ["locomotive", "passenger_car", "flatbed", "boxcar"];

const SWITCH_POSITIONS: SwitchPosition[] = ["normal", "reverse"];
const REVERSER_POSITIONS: Reverser[] = ["forward", "reverse"];

export const SPOT_NAMES: Record<SpotId, string> = {
  platform: "Platform",
  team_track: "Team Track",
  east_tunnel: "East Tunnel",
  west_tunnel: "West Tunnel"
};

export const SPAWN_POINT_NAMES: Record<SpawnPointId, string> = {
  east: "East Station",
  west: "West Station"
};

/** Coupled length of each stock type, in metres. */
export const STOCK_LENGTHS: Record<StockType, number> = {
  locomotive: 20,
  passenger_car: 18,
  flatbed: 15,
  boxcar: 15
};

export const FAILURE_MESSAGES = {
  coupleNoAdjacentCars: "Couple: no adjacent cars found",
  uncoupleUnsupported: "Uncouple: not yet supported",
  // Reserved: no code path raises these yet.
  uncoupleWhileMoving: "Uncouple: cannot uncouple while moving",
  uncoupleNothingToUncouple: "Uncouple: nothing to uncouple",
  uncoupleDetachLocomotive: "Uncouple: cannot detach the locomotive"
} as const;

export function cannotReachMessage(spot: SpotId): string {
  return `Cannot reach ${SPOT_NAMES[spot]}`;
}

export function consistLength(consist: readonly Car[]): number {
  return consist.reduce((total, car) => total + STOCK_LENGTHS[car.type], 0);
}

export function describeOrder(order: Order): string {
  switch (order.type) {
    case "move_to":
      return `Move To ${SPOT_NAMES[order.spot]}`;
    case "set_reverser":
      return order.position === "forward" ? "Set Reverser Forward" : "Set Reverser Reverse";
    case "set_switch":
      return `Set ${order.switchId} ${order.position === "normal" ? "Normal" : "Diverging"}`;
    case "wait_seconds":
      return `Wait ${order.seconds} seconds`;
    case "couple":
      return "Couple";
    case "uncouple":
      return order.carCount === 1 ? "Uncouple 1 car" : `Uncouple ${order.carCount} cars`;
  }
}

/** Short consist summary such as "1 loco, 2 boxcar". */
export function describeConsist(consist: readonly Car[]): string {
  if (consist.length === 0) {
    return "empty";
  }
  const counts = new Map<StockType, number>();
  for (const car of consist) {
    counts.set(car.type, (counts.get(car.type) ?? 0) + 1);
  }
  const labels: Record<StockType, string> = {
    locomotive: "loco",
    passenger_car: "coach",
    flatbed: "flatbed",
    boxcar: "boxcar"
  };
  return STOCK_TYPES.filter((type) => counts.has(type))
    .map((type) => `${counts.get(type)} ${labels[type]}`)
    .join(", ");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isOneOf<T extends string>(values: readonly T[], value: unknown): value is T {
  return typeof value === "string" && values.some((candidate) => candidate === value);
}

function validateOrderInto(input: unknown, prefix: string, errors: string[]): Order | undefined {
  if (!isRecord(input)) {
    errors.push(`${prefix} must be an object`);
    return undefined;
  }

  switch (input.type) {
    case "move_to": {
      if (!isOneOf(SPOT_IDS, input.spot)) {
        errors.push(`${prefix}.spot must be one of ${SPOT_IDS.join("|")}`);
        return undefined;
      }
      return { type: "move_to", spot: input.spot };
    }
    case "set_reverser": {
      if (!isOneOf(REVERSER_POSITIONS, input.position)) {
        errors.push(`${prefix}.position must be forward|reverse`);
        return undefined;
      }
      return { type: "set_reverser", position: input.position };
    }
    case "set_switch": {
      const switchId = input.switchId;
      const position = input.position;
      if (typeof switchId !== "string" || switchId.length === 0) {
        errors.push(`${prefix}.switchId must be a non-empty string`);
        return undefined;
      }
      if (!isOneOf(SWITCH_POSITIONS, position)) {
        errors.push(`${prefix}.position must be normal|reverse`);
        return undefined;
      }
      return { type: "set_switch", switchId, position };
    }
    case "wait_seconds": {
      const seconds = input.seconds;
      if (typeof seconds !== "number" || !Number.isFinite(seconds) || seconds < 0) {
        errors.push(`${prefix}.seconds must be a non-negative number`);
        return undefined;
      }
      return { type: "wait_seconds", seconds };
    }
    case "couple":
      return { type: "couple" };
    case "uncouple": {
      const carCount = input.carCount;
      if (typeof carCount !== "number" || !Number.isInteger(carCount) || carCount < 1) {
        errors.push(`${prefix}.carCount must be a positive integer`);
        return undefined;
      }
      return { type: "uncouple", carCount };
    }
    default:
      errors.push(`${prefix}.type must be one of move_to|set_reverser|set_switch|wait_seconds|couple|uncouple`);
      return undefined;
  }
}

export function validateOrder(input: unknown): ValidationResult<Order> {
  const errors: string[] = [];
  const value = validateOrderInto(input, "order", errors);
  if (errors.length > 0 || !value) {
    return { ok: false, errors };
  }
  return { ok: true, errors: [], value };
}

function validateProgramInto(input: unknown, prefix: string, errors: string[]): Order[] | undefined {
  if (!Array.isArray(input)) {
    errors.push(`${prefix} must be an array of orders`);
    return undefined;
  }
  const orders: Order[] = [];
  input.forEach((raw, index) => {
    const order = validateOrderInto(raw, `${prefix}[${index}]`, errors);
    if (order) {
      orders.push(order);
    }
  });
  return orders;
}

export function validateProgram(input: unknown): ValidationResult<Order[]> {
  const errors: string[] = [];
  const value = validateProgramInto(input, "program", errors);
  if (errors.length > 0 || !value) {
    return { ok: false, errors };
  }
  return { ok: true, errors: [], value };
}

function validateConsistInto(input: unknown, prefix: string, errors: string[]): Car[] | undefined {
  if (!Array.isArray(input)) {
    errors.push(`${prefix} must be an array of cars`);
    return undefined;
  }
  const cars: Car[] = [];
  input.forEach((raw, index) => {
    if (!isRecord(raw)) {
      errors.push(`${prefix}[${index}] must be an object`);
      return;
    }
    const id = raw.id;
    const type = raw.type;
    if (typeof id !== "string" || id.length === 0) {
      errors.push(`${prefix}[${index}].id must be a non-empty string`);
      return;
    }
    if (!isOneOf(STOCK_TYPES, type)) {
      errors.push(`${prefix}[${index}].type must be one of ${STOCK_TYPES.join("|")}`);
      return;
    }
    cars.push({ id, type });
  });

  if (input.length > 0 && !cars.some((car) => car.type === "locomotive")) {
    errors.push(`${prefix} must include a locomotive`);
  }
  if (input.length === 0) {
    errors.push(`${prefix} must not be empty`);
  }
  return cars;
}

export function validateScheduledTrain(input: unknown): ValidationResult<ScheduledTrain> {
  const errors: string[] = [];
  if (!isRecord(input)) {
    return { ok: false, errors: ["train must be an object"] };
  }

  const id = input.id;
  if (typeof id !== "string" || id.length === 0) {
    errors.push("id must be a non-empty string");
  }

  const spawnPoint = input.spawnPoint;
  if (!isOneOf(SPAWN_POINT_IDS, spawnPoint)) {
    errors.push("spawnPoint must be east|west");
  }

  const departureMinute = input.departureMinute ?? 0;
  if (typeof departureMinute !== "number" || !Number.isFinite(departureMinute) || departureMinute < 0) {
    errors.push("departureMinute must be a non-negative number");
  }

  const consist = validateConsistInto(input.consist, "consist", errors);
  const program = validateProgramInto(input.program ?? [], "program", errors);

  if (
    errors.length > 0 ||
    typeof id !== "string" ||
    !isOneOf(SPAWN_POINT_IDS, spawnPoint) ||
    typeof departureMinute !== "number" ||
    !consist ||
    !program
  ) {
    return { ok: false, errors };
  }

  return {
    ok: true,
    errors: [],
    value: { id, spawnPoint, departureMinute, consist, program }
  };
}

export function assertScheduledTrain(input: unknown): ScheduledTrain {
  const result = validateScheduledTrain(input);
  if (!result.ok || !result.value) {
    const message = result.errors.join("; ") || "Unknown validation error";
    throw new Error(`Invalid ScheduledTrain: ${message}`);
  }
  return result.value;
}

export function validateSwitchSnapshot(input: unknown): ValidationResult<Record<string, SwitchPosition>> {
  if (input === undefined) {
    return { ok: true, errors: [], value: {} };
  }
  if (!isRecord(input)) {
    return { ok: false, errors: ["switches must be an object"] };
  }
  const errors: string[] = [];
  const value: Record<string, SwitchPosition> = {};
  for (const [switchId, position] of Object.entries(input)) {
    if (!isOneOf(SWITCH_POSITIONS, position)) {
      errors.push(`switches.${switchId} must be normal|reverse`);
      continue;
    }
    value[switchId] = position;
  }
  if (errors.length > 0) {
    return { ok: false, errors };
  }
  return { ok: true, errors: [], value };
}
