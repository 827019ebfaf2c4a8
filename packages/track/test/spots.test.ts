import { SPOT_IDS } from "@sidings/protocol";
import { describe, expect, it } from "vitest";

import {
  SAWMILL_ELEMENTS,
  SAWMILL_SWITCH_ID,
  buildRoute,
  positionOnRoute,
  sawmillLayout,
  sawmillPlan,
  spotLocation,
  spotPosition,
  type TrackPlan
} from "../src/index.js";

const eastNormal = buildRoute(SAWMILL_ELEMENTS.eastPortal, 0, { [SAWMILL_SWITCH_ID]: "normal" }, sawmillLayout);
const eastReverse = buildRoute(SAWMILL_ELEMENTS.eastPortal, 0, { [SAWMILL_SWITCH_ID]: "reverse" }, sawmillLayout);
const west = buildRoute(SAWMILL_ELEMENTS.westPortal, 0, {}, sawmillLayout);

describe("positionOnRoute", () => {
  it("is undefined off either end", () => {
    expect(positionOnRoute(-1, eastNormal)).toBeUndefined();
    expect(positionOnRoute(eastNormal.totalLength + 0.001, eastNormal)).toBeUndefined();
    expect(positionOnRoute(Number.NaN, eastNormal)).toBeUndefined();
  });

  it("interpolates along a straight", () => {
    const pose = positionOnRoute(125, eastNormal);

    expect(pose?.position.x).toBeCloseTo(375);
    expect(pose?.position.y).toBeCloseTo(0);
    expect(pose?.orientation).toBeCloseTo(Math.PI);
  });

  it("reaches both ends of the route", () => {
    expect(positionOnRoute(0, eastNormal)?.position.x).toBeCloseTo(500);
    expect(positionOnRoute(eastNormal.totalLength, eastNormal)?.position.x).toBeCloseTo(0);
  });

  it("follows the siding arcs", () => {
    const pose = positionOnRoute(250 + 30.4, eastReverse);

    expect(pose?.position.x).toBeCloseTo(219.7295, 3);
    expect(pose?.position.y).toBeCloseTo(-2.4268, 3);
    expect(pose?.orientation).toBeCloseTo(-2.98159, 4);
  });

  it("lands on the platform road parallel to the main line", () => {
    const pose = positionOnRoute(370.8, eastReverse);

    expect(pose?.position.x).toBeCloseTo(129.4591, 3);
    expect(pose?.position.y).toBeCloseTo(-4.8536, 3);
    expect(Math.abs(pose?.orientation ?? 0)).toBeCloseTo(Math.PI);
  });
});

describe("spotPosition", () => {
  it("places siding spots only on the diverging route", () => {
    expect(spotPosition("platform", eastReverse)).toBeCloseTo(370.8);
    expect(spotPosition("team_track", eastReverse)).toBeCloseTo(450.8);
    expect(spotPosition("platform", eastNormal)).toBeUndefined();
    expect(spotPosition("team_track", eastNormal)).toBeUndefined();
    expect(spotPosition("platform", west)).toBeUndefined();
  });

  it("puts tunnel mouths at the ends of the route", () => {
    expect(spotPosition("east_tunnel", eastNormal)).toBe(0);
    expect(spotPosition("west_tunnel", eastNormal)).toBe(eastNormal.totalLength);
    expect(spotPosition("west_tunnel", eastReverse)).toBeUndefined();
    expect(spotPosition("west_tunnel", west)).toBe(0);
    expect(spotPosition("east_tunnel", west)).toBe(west.totalLength);
  });

  it("mirrors a spot on an element travelled backwards", () => {
    const plan: TrackPlan = {
      ...sawmillPlan,
      spots: {
        ...sawmillPlan.spots,
        platform: {
          id: "platform",
          elementId: SAWMILL_ELEMENTS.mainlineWest,
          localDistance: 20,
          elementLength: 220,
          portal: false
        }
      }
    };

    expect(spotPosition("platform", eastNormal, plan)).toBeCloseTo(300);
    expect(spotPosition("platform", west, plan)).toBeCloseTo(200);
  });

  it("agrees with the physical spot location on every route", () => {
    for (const route of [eastNormal, eastReverse, west]) {
      for (const spotId of SPOT_IDS) {
        const distance = spotPosition(spotId, route);
        if (distance === undefined) {
          continue;
        }
        const onRoute = positionOnRoute(distance, route);
        const physical = spotLocation(sawmillPlan.spots[spotId], sawmillLayout);

        expect(onRoute?.position.x).toBeCloseTo(physical?.x ?? Number.NaN, 6);
        expect(onRoute?.position.y).toBeCloseTo(physical?.y ?? Number.NaN, 6);
      }
    }
  });
});
