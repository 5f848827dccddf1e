import type { Bounds, Point } from './track-data.model';

export interface ViewportTransform {
  scale: number;
  translateX: number;
  translateY: number;
  rotationRad: number;
  /** Center the geometry is rotated about (center of the unrotated bounds). */
  pivot: Point;
  /** World bounds after rotation, the box the scale was fitted to. */
  fittedBounds: Bounds;
}

export interface ViewportOptions {
  leftMargin: number;
  rightMargin: number;
  padding: number;
  rotationDeg: number;
}

export interface UsableArea {
  left: number;
  right: number;
  bottom: number;
  top: number;
}
