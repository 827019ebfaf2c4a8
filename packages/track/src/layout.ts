import {
  ANGLE_TOLERANCE,
  POSITION_TOLERANCE,
  angleDifference,
  computeConnectors,
  connectorCount,
  distanceBetween,
  normalizeAngle,
  type Connector,
  type TrackElementType
} from "./geometry.js";

export type ElementId = number;

export interface ConnectorRef {
  elementId: ElementId;
  connectorIndex: number;
}

export interface PlacedElement {
  id: ElementId;
  type: TrackElementType;
  connectors: Connector[];
}

export interface Connection {
  from: ConnectorRef;
  to: ConnectorRef;
}

export interface Layout {
  elements: PlacedElement[];
  connections: Connection[];
}

export interface PlaceResult {
  layout: Layout;
  id: ElementId;
}

export interface LayoutValidationResult {
  ok: boolean;
  errors: string[];
}

export function emptyLayout(): Layout {
  return { elements: [], connections: [] };
}

function nextElementId(layout: Layout): ElementId {
  return layout.elements.reduce((max, element) => Math.max(max, element.id + 1), 0);
}

function describeRef(ref: ConnectorRef): string {
  return `${ref.elementId}:${ref.connectorIndex}`;
}

function sameRef(a: ConnectorRef, b: ConnectorRef): boolean {
  return a.elementId === b.elementId && a.connectorIndex === b.connectorIndex;
}

export function placeElement(layout: Layout, type: TrackElementType, connector0: Connector): PlaceResult {
  const id = nextElementId(layout);
  const element: PlacedElement = {
    id,
    type,
    connectors: computeConnectors(connector0, type)
  };
  return {
    layout: { ...layout, elements: [...layout.elements, element] },
    id
  };
}

/**
 * Places an element so that its connector 0 mates with an existing connector,
 * and records the connection between them.
 */
export function placeElementAt(layout: Layout, type: TrackElementType, target: ConnectorRef): PlaceResult {
  const targetConnector = getConnector(layout, target);
  if (!targetConnector) {
    throw new Error(`Cannot place element at unknown connector ${describeRef(target)}`);
  }

  const connector0: Connector = {
    position: { ...targetConnector.position },
    orientation: normalizeAngle(targetConnector.orientation + Math.PI)
  };

  const placed = placeElement(layout, type, connector0);
  return {
    layout: connect(placed.layout, target, { elementId: placed.id, connectorIndex: 0 }),
    id: placed.id
  };
}

export function connect(layout: Layout, a: ConnectorRef, b: ConnectorRef): Layout {
  for (const ref of [a, b]) {
    if (!getConnector(layout, ref)) {
      throw new Error(`Cannot connect unknown connector ${describeRef(ref)}`);
    }
  }
  return {
    ...layout,
    connections: [...layout.connections, { from: { ...a }, to: { ...b } }]
  };
}

export function findElement(layout: Layout, id: ElementId): PlacedElement | undefined {
  return layout.elements.find((element) => element.id === id);
}

export function getConnector(layout: Layout, ref: ConnectorRef): Connector | undefined {
  return findElement(layout, ref.elementId)?.connectors[ref.connectorIndex];
}

/** The connector joined to `ref`, looking at connections recorded from either side. */
export function findConnected(layout: Layout, ref: ConnectorRef): ConnectorRef | undefined {
  for (const connection of layout.connections) {
    if (sameRef(connection.from, ref)) {
      return connection.to;
    }
    if (sameRef(connection.to, ref)) {
      return connection.from;
    }
  }
  return undefined;
}

/**
 * Continuity check for a layout: every connection must join two existing
 * connectors at the same point, facing opposite ways.
 */
export function validateLayout(layout: Layout): LayoutValidationResult {
  const errors: string[] = [];
  const seenIds = new Set<ElementId>();

  for (const element of layout.elements) {
    if (seenIds.has(element.id)) {
      errors.push(`element ${element.id} is defined more than once`);
    }
    seenIds.add(element.id);

    const expected = connectorCount(element.type);
    if (element.connectors.length !== expected) {
      errors.push(`element ${element.id} has ${element.connectors.length} connectors, expected ${expected}`);
    }
  }

  const usage = new Map<string, number>();
  for (const connection of layout.connections) {
    const label = `${describeRef(connection.from)} -> ${describeRef(connection.to)}`;
    const from = getConnector(layout, connection.from);
    const to = getConnector(layout, connection.to);
    if (!from || !to) {
      errors.push(`connection ${label} references a missing connector`);
      continue;
    }

    for (const ref of [connection.from, connection.to]) {
      const key = describeRef(ref);
      usage.set(key, (usage.get(key) ?? 0) + 1);
    }

    const gap = distanceBetween(from.position, to.position);
    if (gap > POSITION_TOLERANCE) {
      errors.push(`connection ${label} is ${gap.toFixed(3)}m apart`);
    }

    const misalignment = angleDifference(from.orientation, to.orientation + Math.PI);
    if (misalignment > ANGLE_TOLERANCE) {
      errors.push(`connection ${label} is misaligned by ${((misalignment * 180) / Math.PI).toFixed(2)} degrees`);
    }
  }

  for (const [key, count] of usage) {
    if (count > 1) {
      errors.push(`connector ${key} is used by ${count} connections`);
    }
  }

  return { ok: errors.length === 0, errors };
}
