export {
  ANGLE_TOLERANCE,
  POSITION_TOLERANCE,
  advance,
  angleDifference,
  arcCenter,
  computeConnectors,
  connectorCount,
  distanceBetween,
  divergingSweep,
  elementLength,
  normalizeAngle,
  pointsCoincide,
  travelHeading,
  traversals
} from "./geometry.js";
export type { Connector, TrackElementKind, TrackElementType, Traversal, TurnoutHand } from "./geometry.js";

export {
  connect,
  emptyLayout,
  findConnected,
  findElement,
  getConnector,
  placeElement,
  placeElementAt,
  validateLayout
} from "./layout.js";
export type {
  Connection,
  ConnectorRef,
  ElementId,
  Layout,
  LayoutValidationResult,
  PlaceResult,
  PlacedElement
} from "./layout.js";

export { DEFAULT_MAX_SEGMENTS, buildRoute, exitConnector, switchPositionFor, traverseElement } from "./route.js";
export type { BuildRouteOptions, Route, RouteSegment, RouteTermination, SegmentGeometry } from "./route.js";

export { geometryStart, pointOnGeometry, positionOnRoute } from "./interpolate.js";
export type { Pose } from "./interpolate.js";

export { spotLocation, spotPosition } from "./spots.js";
export type { SpotDefinition, TrackPlan } from "./spots.js";

export { SAWMILL_ELEMENTS, SAWMILL_SWITCH_ID, sawmillLayout, sawmillPlan } from "./sawmill.js";
