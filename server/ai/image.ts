import type { AssessmentItem } from "../../shared/schema.js";

export interface LabelledPoint {
  label: string;
  x: number;
  y: number;
}

/** What a renderer needs to draw the coordinate plane for an item */
export interface CoordinatePlaneRequest {
  kind: "coordinate-plane";
  title: string;
  xRange: [number, number];
  yRange: [number, number];
  points: LabelledPoint[];
}

const AXIS_LIMIT = 6;

export function buildImageRequest(item: AssessmentItem): CoordinatePlaneRequest | null {
  if (!item.hasImage || !item.pointsData) return null;

  const points = Object.entries(item.pointsData)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([label, [x, y]]) => ({ label, x, y }));

  return {
    kind: "coordinate-plane",
    title: "Coordinate Plane",
    xRange: [-AXIS_LIMIT, AXIS_LIMIT],
    yRange: [-AXIS_LIMIT, AXIS_LIMIT],
    points,
  };
}
