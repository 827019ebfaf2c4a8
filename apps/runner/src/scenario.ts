import fs from "node:fs/promises";

import {
  validateScheduledTrain,
  validateSwitchSnapshot,
  type ScheduledTrain,
  type SwitchPosition,
  type ValidationResult
} from "@sidings/protocol";

export interface Scenario {
  name: string;
  timeScale: number;
  switches: Record<string, SwitchPosition>;
  trains: ScheduledTrain[];
}

export const DEFAULT_SCENARIO_NAME = "Untitled scenario";

/** The built-in Morning Run shipped with the runner. */
export const MORNING_RUN_PATH = new URL("../scenarios/morning-run.json", import.meta.url);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function validateScenario(input: unknown): ValidationResult<Scenario> {
  if (!isRecord(input)) {
    return { ok: false, errors: ["scenario must be an object"] };
  }

  const errors: string[] = [];

  const name = input.name ?? DEFAULT_SCENARIO_NAME;
  if (typeof name !== "string" || name.trim().length === 0) {
    errors.push("name must be a non-empty string");
  }

  const timeScale = input.timeScale ?? 1;
  if (typeof timeScale !== "number" || !Number.isFinite(timeScale) || timeScale <= 0) {
    errors.push("timeScale must be a positive number");
  }

  const switches = validateSwitchSnapshot(input.switches);
  errors.push(...switches.errors);

  const trains: ScheduledTrain[] = [];
  if (!Array.isArray(input.trains)) {
    errors.push("trains must be an array");
  } else {
    const seen = new Set<string>();
    input.trains.forEach((raw, index) => {
      const result = validateScheduledTrain(raw);
      if (!result.ok || !result.value) {
        errors.push(...result.errors.map((message) => `trains[${index}]: ${message}`));
        return;
      }
      if (seen.has(result.value.id)) {
        errors.push(`trains[${index}]: id ${result.value.id} is used more than once`);
        return;
      }
      seen.add(result.value.id);
      trains.push(result.value);
    });
  }

  if (errors.length > 0 || typeof name !== "string" || typeof timeScale !== "number" || !switches.value) {
    return { ok: false, errors };
  }

  return {
    ok: true,
    errors: [],
    value: { name, timeScale, switches: switches.value, trains }
  };
}

export async function loadScenario(source: string | URL): Promise<Scenario> {
  const label = typeof source === "string" ? source : source.pathname;
  const text = await fs.readFile(source, "utf8");

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new Error(`Scenario ${label} is not valid JSON: ${detail}`);
  }

  const result = validateScenario(raw);
  if (!result.ok || !result.value) {
    throw new Error(`Invalid scenario ${label}: ${result.errors.join("; ")}`);
  }
  return result.value;
}
