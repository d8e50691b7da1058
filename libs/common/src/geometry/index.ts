export { boxCenter, boxFromCenter, boxHeight, boxWidth, iou } from './box';
export type { Box, Point } from './box';
export { pointInPolygon } from './polygon';
