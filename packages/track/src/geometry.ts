import type { Vec2 } from "@sidings/protocol";

/**
 * Attachment point of a track element. `orientation` points outward: it is the
 * heading of a train leaving the element through this connector.
 *
 * Coordinates are screen metres with y growing downward, so a positive sweep
 * turns clockwise on screen (to the right of the direction of travel).
 */
export interface Connector {
  position: Vec2;
  orientation: number;
}

export type TurnoutHand = "left" | "right";

export type TrackElementType =
  | { kind: "straight"; length: number }
  | { kind: "curve"; radius: number; sweep: number }
  | {
      kind: "turnout";
      switchId: string;
      throughLength: number;
      radius: number;
      sweep: number;
      hand: TurnoutHand;
    }
  | { kind: "end" };

export type TrackElementKind = TrackElementType["kind"];

/** A pair of connector indices a train may pass between, in either direction. */
export type Traversal = readonly [number, number];

export const POSITION_TOLERANCE = 0.01;
export const ANGLE_TOLERANCE = Math.PI / 180;

const TWO_PI = Math.PI * 2;

/** Wraps an angle into (-π, π]. */
export function normalizeAngle(angle: number): number {
  let result = angle % TWO_PI;
  if (result <= -Math.PI) {
    result += TWO_PI;
  } else if (result > Math.PI) {
    result -= TWO_PI;
  }
  return result;
}

export function angleDifference(a: number, b: number): number {
  return Math.abs(normalizeAngle(a - b));
}

export function distanceBetween(a: Vec2, b: Vec2): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}

export function pointsCoincide(a: Vec2, b: Vec2, tolerance = POSITION_TOLERANCE): boolean {
  return distanceBetween(a, b) <= tolerance;
}

export function connectorCount(type: TrackElementType): number {
  switch (type.kind) {
    case "straight":
    case "curve":
      return 2;
    case "turnout":
      return 3;
    case "end":
      return 1;
  }
}

export function traversals(type: TrackElementType): Traversal[] {
  switch (type.kind) {
    case "straight":
    case "curve":
      return [[0, 1]];
    case "turnout":
      return [
        [0, 1],
        [0, 2]
      ];
    case "end":
      return [];
  }
}

/** Signed sweep of a turnout's diverging leg, with the hand applied. */
export function divergingSweep(type: Extract<TrackElementType, { kind: "turnout" }>): number {
  return type.hand === "left" ? -type.sweep : type.sweep;
}

/** Nominal length of the element's primary traversal (0 → 1). */
export function elementLength(type: TrackElementType): number {
  switch (type.kind) {
    case "straight":
      return type.length;
    case "curve":
      return type.radius * Math.abs(type.sweep);
    case "turnout":
      return type.throughLength;
    case "end":
      return 0;
  }
}

export function travelHeading(connector: Connector): number {
  return normalizeAngle(connector.orientation + Math.PI);
}

export function advance(point: Vec2, heading: number, length: number): Vec2 {
  return {
    x: point.x + length * Math.cos(heading),
    y: point.y + length * Math.sin(heading)
  };
}

/**
 * Centre of the arc a train follows when it enters at `entry` and turns by
 * `sweep` (positive turns toward heading + π/2).
 */
export function arcCenter(entry: Connector, radius: number, sweep: number): Vec2 {
  const heading = travelHeading(entry);
  const side = sweep >= 0 ? Math.PI / 2 : -Math.PI / 2;
  return advance(entry.position, heading + side, radius);
}

function rotateAround(point: Vec2, center: Vec2, angle: number): Vec2 {
  const dx = point.x - center.x;
  const dy = point.y - center.y;
  const cos = Math.cos(angle);
  const sin = Math.sin(angle);
  return {
    x: center.x + dx * cos - dy * sin,
    y: center.y + dx * sin + dy * cos
  };
}

function straightExit(entry: Connector, length: number): Connector {
  const heading = travelHeading(entry);
  return {
    position: advance(entry.position, heading, length),
    orientation: heading
  };
}

function curveExit(entry: Connector, radius: number, sweep: number): Connector {
  const center = arcCenter(entry, radius, sweep);
  return {
    position: rotateAround(entry.position, center, sweep),
    orientation: normalizeAngle(travelHeading(entry) + sweep)
  };
}

/**
 * Derives every connector of an element from its connector 0. Pure and total:
 * the result always has `connectorCount(type)` entries.
 */
export function computeConnectors(connector0: Connector, type: TrackElementType): Connector[] {
  const first: Connector = {
    position: { ...connector0.position },
    orientation: normalizeAngle(connector0.orientation)
  };

  switch (type.kind) {
    case "straight":
      return [first, straightExit(first, type.length)];
    case "curve":
      return [first, curveExit(first, type.radius, type.sweep)];
    case "turnout":
      return [first, straightExit(first, type.throughLength), curveExit(first, type.radius, divergingSweep(type))];
    case "end":
      return [first];
  }
}
