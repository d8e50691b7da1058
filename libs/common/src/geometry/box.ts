/**
 * Axis-aligned rectangle in image pixel space.
 */
export interface Box {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

export interface Point {
  x: number;
  y: number;
}

export function boxWidth(box: Box): number {
  return box.right - box.left;
}

export function boxHeight(box: Box): number {
  return box.bottom - box.top;
}

export function boxCenter(box: Box): Point {
  return { x: (box.left + box.right) / 2, y: (box.top + box.bottom) / 2 };
}

export function boxFromCenter(cx: number, cy: number, width: number, height: number): Box {
  return {
    left: cx - width / 2,
    top: cy - height / 2,
    right: cx + width / 2,
    bottom: cy + height / 2,
  };
}

/**
 * Intersection-over-Union of two boxes; 0 when the union has no area.
 */
export function iou(a: Box, b: Box): number {
  const x1 = Math.max(a.left, b.left);
  const y1 = Math.max(a.top, b.top);
  const x2 = Math.min(a.right, b.right);
  const y2 = Math.min(a.bottom, b.bottom);

  const intersection = Math.max(0, x2 - x1) * Math.max(0, y2 - y1);
  const union = boxWidth(a) * boxHeight(a) + boxWidth(b) * boxHeight(b) - intersection;

  return union > 0 ? intersection / union : 0;
}
