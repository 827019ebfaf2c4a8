import { emptyLayout, placeElement, placeElementAt, type Layout } from "./layout.js";
import type { TrackPlan } from "./spots.js";

export const SAWMILL_SWITCH_ID = "main";

// Element ids follow placement order.
export const SAWMILL_ELEMENTS = {
  eastPortal: 0,
  mainlineEast: 1,
  turnout: 2,
  mainlineWest: 3,
  westPortal: 4,
  sidingCurve: 5,
  platformRoad: 6,
  teamTrack: 7,
  bufferStop: 8
} as const;

const MAINLINE_EAST_LENGTH = 250;
const TURNOUT_THROUGH_LENGTH = 30;
const MAINLINE_WEST_LENGTH = 220;
const TURNOUT_RADIUS = 190;
const TURNOUT_SWEEP = 0.16;
const PLATFORM_ROAD_LENGTH = 100;
const TEAM_TRACK_LENGTH = 120;

/**
 * The Sawmill: a 500 m main line between two tunnel mouths, with a right-hand
 * turnout ("main") leading to a platform road and a team track that ends in a
 * buffer stop.
 */
function buildSawmillLayout(): Layout {
  let layout = emptyLayout();

  // Trains leave the east portal heading west.
  layout = placeElement(layout, { kind: "end" }, { position: { x: 500, y: 0 }, orientation: Math.PI }).layout;
  layout = placeElementAt(layout, { kind: "straight", length: MAINLINE_EAST_LENGTH }, { elementId: 0, connectorIndex: 0 }).layout;
  layout = placeElementAt(
    layout,
    {
      kind: "turnout",
      switchId: SAWMILL_SWITCH_ID,
      throughLength: TURNOUT_THROUGH_LENGTH,
      radius: TURNOUT_RADIUS,
      sweep: TURNOUT_SWEEP,
      hand: "right"
    },
    { elementId: 1, connectorIndex: 1 }
  ).layout;
  layout = placeElementAt(layout, { kind: "straight", length: MAINLINE_WEST_LENGTH }, { elementId: 2, connectorIndex: 1 }).layout;
  layout = placeElementAt(layout, { kind: "end" }, { elementId: 3, connectorIndex: 1 }).layout;

  // Reverse curve back to parallel with the main line.
  layout = placeElementAt(
    layout,
    { kind: "curve", radius: TURNOUT_RADIUS, sweep: -TURNOUT_SWEEP },
    { elementId: 2, connectorIndex: 2 }
  ).layout;
  layout = placeElementAt(layout, { kind: "straight", length: PLATFORM_ROAD_LENGTH }, { elementId: 5, connectorIndex: 1 }).layout;
  layout = placeElementAt(layout, { kind: "straight", length: TEAM_TRACK_LENGTH }, { elementId: 6, connectorIndex: 1 }).layout;
  layout = placeElementAt(layout, { kind: "end" }, { elementId: 7, connectorIndex: 1 }).layout;

  return layout;
}

export const sawmillLayout: Layout = buildSawmillLayout();

export const sawmillPlan: TrackPlan = {
  name: "Sawmill",
  layout: sawmillLayout,
  spots: {
    platform: {
      id: "platform",
      elementId: SAWMILL_ELEMENTS.platformRoad,
      localDistance: 60,
      elementLength: PLATFORM_ROAD_LENGTH,
      portal: false
    },
    team_track: {
      id: "team_track",
      elementId: SAWMILL_ELEMENTS.teamTrack,
      localDistance: 40,
      elementLength: TEAM_TRACK_LENGTH,
      portal: false
    },
    east_tunnel: {
      id: "east_tunnel",
      elementId: SAWMILL_ELEMENTS.mainlineEast,
      localDistance: 0,
      elementLength: MAINLINE_EAST_LENGTH,
      portal: true
    },
    west_tunnel: {
      id: "west_tunnel",
      elementId: SAWMILL_ELEMENTS.mainlineWest,
      localDistance: MAINLINE_WEST_LENGTH,
      elementLength: MAINLINE_WEST_LENGTH,
      portal: true
    }
  },
  spawnPoints: {
    east: { elementId: SAWMILL_ELEMENTS.eastPortal, connectorIndex: 0 },
    west: { elementId: SAWMILL_ELEMENTS.westPortal, connectorIndex: 0 }
  }
};
