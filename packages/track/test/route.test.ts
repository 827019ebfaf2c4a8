import { describe, expect, it } from "vitest";

import {
  SAWMILL_ELEMENTS,
  SAWMILL_SWITCH_ID,
  buildRoute,
  emptyLayout,
  connect,
  placeElement,
  placeElementAt,
  positionOnRoute,
  sawmillLayout,
  type Layout
} from "../src/index.js";

const EASTBOUND = { position: { x: 0, y: 0 }, orientation: Math.PI };

function eastRoute(position: "normal" | "reverse") {
  return buildRoute(SAWMILL_ELEMENTS.eastPortal, 0, { [SAWMILL_SWITCH_ID]: position }, sawmillLayout);
}

function loopLayout(): Layout {
  let layout = placeElement(emptyLayout(), { kind: "curve", radius: 10, sweep: Math.PI / 2 }, EASTBOUND).layout;
  for (let id = 0; id < 3; id += 1) {
    layout = placeElementAt(layout, { kind: "curve", radius: 10, sweep: Math.PI / 2 }, { elementId: id, connectorIndex: 1 }).layout;
  }
  return connect(layout, { elementId: 3, connectorIndex: 1 }, { elementId: 0, connectorIndex: 0 });
}

function straightChain(count: number): Layout {
  let layout = placeElement(emptyLayout(), { kind: "end" }, { position: { x: 0, y: 0 }, orientation: 0 }).layout;
  for (let id = 0; id < count; id += 1) {
    layout = placeElementAt(layout, { kind: "straight", length: 10 }, { elementId: id, connectorIndex: id === 0 ? 0 : 1 }).layout;
  }
  return layout;
}

describe("buildRoute on the Sawmill", () => {
  it("runs the main line when the switch is normal", () => {
    const route = eastRoute("normal");

    expect(route.segments.map((segment) => segment.elementId)).toEqual([1, 2, 3]);
    expect(route.totalLength).toBeCloseTo(500);
    expect(route.termination).toBe("reached_end");
  });

  it("treats a missing switch entry as normal", () => {
    const route = buildRoute(SAWMILL_ELEMENTS.eastPortal, 0, {}, sawmillLayout);
    expect(route.segments.map((segment) => segment.elementId)).toEqual([1, 2, 3]);
  });

  it("takes the siding to the buffer stop when the switch is reversed", () => {
    const route = eastRoute("reverse");

    expect(route.segments.map((segment) => segment.elementId)).toEqual([1, 2, 5, 6, 7]);
    expect(route.segments[1]?.length).toBeCloseTo(30.4);
    expect(route.segments[2]?.length).toBeCloseTo(30.4);
    expect(route.totalLength).toBeCloseTo(530.8);
    expect(route.termination).toBe("reached_end");
  });

  it("accumulates start distances", () => {
    const starts = eastRoute("reverse").segments.map((segment) => segment.startDistance);
    const expected = [0, 250, 280.4, 310.8, 410.8];

    expect(starts).toHaveLength(expected.length);
    expected.forEach((value, index) => {
      expect(starts[index]).toBeCloseTo(value);
    });
  });

  it("ignores the switch on a trailing move from the west", () => {
    for (const position of ["normal", "reverse"] as const) {
      const route = buildRoute(SAWMILL_ELEMENTS.westPortal, 0, { [SAWMILL_SWITCH_ID]: position }, sawmillLayout);
      expect(route.segments.map((segment) => segment.elementId)).toEqual([3, 2, 1]);
      expect(route.totalLength).toBeCloseTo(500);
    }
  });

  it("connects the siding smoothly to the turnout", () => {
    const route = eastRoute("reverse");
    const beforeJoin = positionOnRoute(280.4 - 1e-6, route);
    const afterJoin = positionOnRoute(280.4 + 1e-6, route);

    expect(beforeJoin?.position.x).toBeCloseTo(219.7295, 3);
    expect(beforeJoin?.position.y).toBeCloseTo(-2.4268, 3);
    expect(afterJoin?.orientation).toBeCloseTo(beforeJoin?.orientation ?? Number.NaN, 4);
  });

  it("stays well inside the segment budget", () => {
    expect(eastRoute("reverse").segments.length).toBeLessThan(20);
  });
});

describe("buildRoute termination", () => {
  it("stops at a connector with nothing attached", () => {
    const layout = placeElementAt(
      placeElement(emptyLayout(), { kind: "end" }, { position: { x: 0, y: 0 }, orientation: 0 }).layout,
      { kind: "straight", length: 50 },
      { elementId: 0, connectorIndex: 0 }
    ).layout;

    const route = buildRoute(0, 0, {}, layout);
    expect(route.totalLength).toBe(50);
    expect(route.termination).toBe("open_end");
  });

  it("detects a loop instead of walking forever", () => {
    const route = buildRoute(0, 0, {}, loopLayout());

    expect(route.segments.map((segment) => segment.elementId)).toEqual([3, 2, 1, 0]);
    expect(route.totalLength).toBeCloseTo(20 * Math.PI);
    expect(route.termination).toBe("cycle_detected");
  });

  it("gives up at the segment budget", () => {
    const route = buildRoute(0, 0, {}, straightChain(30), { maxSegments: 20 });

    expect(route.segments).toHaveLength(20);
    expect(route.totalLength).toBe(200);
    expect(route.termination).toBe("too_long");
  });

  it("walks a long chain under the default budget", () => {
    const route = buildRoute(0, 0, {}, straightChain(30));

    expect(route.segments).toHaveLength(30);
    expect(route.termination).toBe("open_end");
  });

  it("is empty when the start connector leads nowhere", () => {
    const layout = placeElement(emptyLayout(), { kind: "end" }, EASTBOUND).layout;
    expect(buildRoute(0, 0, {}, layout)).toEqual({ segments: [], totalLength: 0, termination: "open_end" });
  });
});
