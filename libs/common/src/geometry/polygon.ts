import { Point } from './box';

/**
 * Ray-casting point-in-polygon test (horizontal ray towards +x).
 * Assumes a simple polygon; points exactly on an edge or vertex may land on either side.
 */
export function pointInPolygon(point: Point, polygon: readonly Point[]): boolean {
  if (polygon.length < 3) {
    return false;
  }

  let inside = false;
  for (let i = 0, j = polygon.length - 1; i < polygon.length; j = i++) {
    const a = polygon[i];
    const b = polygon[j];
    if (a.y > point.y !== b.y > point.y) {
      const xCross = ((b.x - a.x) * (point.y - a.y)) / (b.y - a.y) + a.x;
      if (point.x < xCross) {
        inside = !inside;
      }
    }
  }
  return inside;
}
