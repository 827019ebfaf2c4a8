import type { Vec2 } from "@sidings/protocol";

import { normalizeAngle } from "./geometry.js";
import type { Route, RouteSegment, SegmentGeometry } from "./route.js";

export interface Pose {
  position: Vec2;
  orientation: number;
}

export function pointOnGeometry(geometry: SegmentGeometry, t: number): Pose {
  if (geometry.kind === "straight") {
    return {
      position: {
        x: geometry.start.x + (geometry.end.x - geometry.start.x) * t,
        y: geometry.start.y + (geometry.end.y - geometry.start.y) * t
      },
      orientation: geometry.orientation
    };
  }

  const angle = geometry.startAngle + t * geometry.signedSweep;
  const tangent = geometry.signedSweep >= 0 ? Math.PI / 2 : -Math.PI / 2;
  return {
    position: {
      x: geometry.center.x + geometry.radius * Math.cos(angle),
      y: geometry.center.y + geometry.radius * Math.sin(angle)
    },
    orientation: normalizeAngle(angle + tangent)
  };
}

/** Where a segment's geometry begins (its entry point). */
export function geometryStart(geometry: SegmentGeometry): Vec2 {
  return pointOnGeometry(geometry, 0).position;
}

function segmentContaining(distance: number, route: Route): RouteSegment | undefined {
  // Routes are a handful of segments; a linear scan is enough.
  for (const segment of route.segments) {
    if (distance <= segment.startDistance + segment.length) {
      return segment;
    }
  }
  return route.segments[route.segments.length - 1];
}

/** Pose at `distance` metres along the route, or undefined off either end. */
export function positionOnRoute(distance: number, route: Route): Pose | undefined {
  if (!Number.isFinite(distance) || distance < 0 || distance > route.totalLength) {
    return undefined;
  }

  const segment = segmentContaining(distance, route);
  if (!segment) {
    return undefined;
  }

  const t = segment.length === 0 ? 0 : (distance - segment.startDistance) / segment.length;
  return pointOnGeometry(segment.geometry, Math.min(1, Math.max(0, t)));
}
