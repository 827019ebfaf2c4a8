import type { SpawnPointId, SpotId, Vec2 } from "@sidings/protocol";

import { pointsCoincide } from "./geometry.js";
import { geometryStart, pointOnGeometry } from "./interpolate.js";
import { findElement, type ConnectorRef, type ElementId, type Layout } from "./layout.js";
import { traverseElement, type Route } from "./route.js";
import { sawmillPlan } from "./sawmill.js";

export interface SpotDefinition {
  id: SpotId;
  elementId: ElementId;
  /** Distance from the element's connector 0, along its primary traversal. */
  localDistance: number;
  elementLength: number;
  /** Tunnel mouths resolve against the route's first or last segment. */
  portal: boolean;
}

export interface TrackPlan {
  name: string;
  layout: Layout;
  spots: Record<SpotId, SpotDefinition>;
  spawnPoints: Record<SpawnPointId, ConnectorRef>;
}

function lastSegmentElement(route: Route): ElementId | undefined {
  return route.segments[route.segments.length - 1]?.elementId;
}

/**
 * Route distance of a named spot, or undefined when the spot's element is not
 * on this route (e.g. the platform while the switch sends the train along the
 * main line).
 */
export function spotPosition(spotId: SpotId, route: Route, plan: TrackPlan = sawmillPlan): number | undefined {
  const spot = plan.spots[spotId];

  if (spot.portal) {
    if (route.segments[0]?.elementId === spot.elementId) {
      return 0;
    }
    if (lastSegmentElement(route) === spot.elementId) {
      return route.totalLength;
    }
  }

  const element = findElement(plan.layout, spot.elementId);
  if (!element) {
    return undefined;
  }
  const connector0 = element.connectors[0];

  for (const segment of route.segments) {
    if (segment.elementId !== spot.elementId) {
      continue;
    }
    const native = connector0 !== undefined && pointsCoincide(geometryStart(segment.geometry), connector0.position);
    const local = native ? spot.localDistance : spot.elementLength - spot.localDistance;
    return segment.startDistance + local;
  }

  return undefined;
}

/** Physical point of a spot on its element, independent of any route. */
export function spotLocation(spot: SpotDefinition, layout: Layout): Vec2 | undefined {
  const element = findElement(layout, spot.elementId);
  if (!element || element.connectors.length < 2) {
    return undefined;
  }
  const segment = traverseElement(element, 0, 1, 0);
  const t = segment.length === 0 ? 0 : spot.localDistance / segment.length;
  return pointOnGeometry(segment.geometry, t).position;
}
