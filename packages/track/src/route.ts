import type { SwitchPosition, SwitchSnapshot, Vec2 } from "@sidings/protocol";

import {
  arcCenter,
  divergingSweep,
  normalizeAngle,
  travelHeading,
  type Connector,
  type TrackElementType
} from "./geometry.js";
import { findConnected, findElement, type ConnectorRef, type ElementId, type Layout, type PlacedElement } from "./layout.js";

export type SegmentGeometry =
  | { kind: "straight"; start: Vec2; end: Vec2; orientation: number }
  | { kind: "arc"; center: Vec2; radius: number; startAngle: number; signedSweep: number };

export interface RouteSegment {
  elementId: ElementId;
  length: number;
  startDistance: number;
  geometry: SegmentGeometry;
  entryConnector: number;
  exitConnector: number;
}

/**
 * Why the walk stopped: an End element (portal or buffer stop), a connector
 * with nothing attached, an element/entry pair seen before, or the segment
 * budget running out.
 */
export type RouteTermination = "reached_end" | "open_end" | "cycle_detected" | "too_long";

export interface Route {
  segments: RouteSegment[];
  totalLength: number;
  termination: RouteTermination;
}

export interface BuildRouteOptions {
  maxSegments?: number;
}

export const DEFAULT_MAX_SEGMENTS = 256;

export function switchPositionFor(switches: SwitchSnapshot, switchId: string): SwitchPosition {
  return switches[switchId] ?? "normal";
}

/**
 * Connector a train leaves through after entering at `entryIndex`. Facing
 * moves at a turnout toe follow the switch; trailing moves from either heel
 * always run out through the toe.
 */
export function exitConnector(
  type: TrackElementType,
  entryIndex: number,
  switches: SwitchSnapshot
): number | undefined {
  switch (type.kind) {
    case "straight":
    case "curve":
      if (entryIndex === 0) return 1;
      if (entryIndex === 1) return 0;
      return undefined;
    case "turnout":
      if (entryIndex === 0) {
        return switchPositionFor(switches, type.switchId) === "reverse" ? 2 : 1;
      }
      if (entryIndex === 1 || entryIndex === 2) return 0;
      return undefined;
    case "end":
      return undefined;
  }
}

function traversalArc(type: TrackElementType, entryIndex: number, exitIndex: number): { radius: number; sweep: number } | undefined {
  if (type.kind === "curve") {
    return { radius: type.radius, sweep: entryIndex === 0 ? type.sweep : -type.sweep };
  }
  if (type.kind === "turnout" && (entryIndex === 2 || exitIndex === 2)) {
    const sweep = divergingSweep(type);
    return { radius: type.radius, sweep: entryIndex === 0 ? sweep : -sweep };
  }
  return undefined;
}

function arcGeometry(entry: Connector, exit: Connector, radius: number, sweep: number): SegmentGeometry {
  // Re-derive the centre from the entry so the segment agrees with computeConnectors.
  const center = arcCenter(entry, radius, sweep);
  const startAngle = Math.atan2(entry.position.y - center.y, entry.position.x - center.x);
  const endAngle = Math.atan2(exit.position.y - center.y, exit.position.x - center.x);

  let signedSweep = normalizeAngle(endAngle - startAngle);
  if (sweep > 0 && signedSweep < 0) {
    signedSweep += Math.PI * 2;
  } else if (sweep < 0 && signedSweep > 0) {
    signedSweep -= Math.PI * 2;
  }

  return { kind: "arc", center, radius, startAngle, signedSweep };
}

/**
 * One element's contribution to a route, for a train entering at
 * `entryIndex` and leaving at `exitIndex`.
 */
export function traverseElement(
  element: PlacedElement,
  entryIndex: number,
  exitIndex: number,
  startDistance: number
): RouteSegment {
  const entry = element.connectors[entryIndex];
  const exit = element.connectors[exitIndex];
  if (!entry || !exit) {
    throw new Error(`Element ${element.id} has no traversal ${entryIndex} -> ${exitIndex}`);
  }

  const arc = traversalArc(element.type, entryIndex, exitIndex);
  if (arc) {
    return {
      elementId: element.id,
      length: arc.radius * Math.abs(arc.sweep),
      startDistance,
      geometry: arcGeometry(entry, exit, arc.radius, arc.sweep),
      entryConnector: entryIndex,
      exitConnector: exitIndex
    };
  }

  const length =
    element.type.kind === "straight"
      ? element.type.length
      : element.type.kind === "turnout"
        ? element.type.throughLength
        : 0;

  return {
    elementId: element.id,
    length,
    startDistance,
    geometry: {
      kind: "straight",
      start: { ...entry.position },
      end: { ...exit.position },
      orientation: travelHeading(entry)
    },
    entryConnector: entryIndex,
    exitConnector: exitIndex
  };
}

/**
 * Walks the layout from a start connector (normally a portal's), resolving
 * turnouts through the given switch snapshot. Pure: the same inputs always
 * give the same route. The walk never throws; `termination` says why it ended.
 */
export function buildRoute(
  startElementId: ElementId,
  startConnectorIndex: number,
  switches: SwitchSnapshot,
  layout: Layout,
  options: BuildRouteOptions = {}
): Route {
  const maxSegments = options.maxSegments ?? DEFAULT_MAX_SEGMENTS;
  const segments: RouteSegment[] = [];
  const visited = new Set<string>();
  let distance = 0;

  let entry: ConnectorRef | undefined = findConnected(layout, {
    elementId: startElementId,
    connectorIndex: startConnectorIndex
  });
  let termination: RouteTermination = "open_end";

  while (entry) {
    const element = findElement(layout, entry.elementId);
    if (!element) {
      termination = "open_end";
      break;
    }
    if (element.type.kind === "end") {
      termination = "reached_end";
      break;
    }

    const key = `${element.id}:${entry.connectorIndex}`;
    if (visited.has(key)) {
      termination = "cycle_detected";
      break;
    }
    if (segments.length >= maxSegments) {
      termination = "too_long";
      break;
    }
    visited.add(key);

    const exitIndex = exitConnector(element.type, entry.connectorIndex, switches);
    if (exitIndex === undefined) {
      termination = "open_end";
      break;
    }

    const segment = traverseElement(element, entry.connectorIndex, exitIndex, distance);
    segments.push(segment);
    distance += segment.length;

    entry = findConnected(layout, { elementId: element.id, connectorIndex: exitIndex });
  }

  return { segments, totalLength: distance, termination };
}
