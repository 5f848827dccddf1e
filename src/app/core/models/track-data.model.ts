export interface Point {
  x: number;
  y: number;
}

export interface Bounds {
  xMin: number;
  xMax: number;
  yMin: number;
  yMax: number;
}

/**
 * One lap of position samples in recording order.
 * Parallel arrays; `drs` is missing when the source lap carries no DRS channel.
 */
export interface LapSample {
  x: readonly number[];
  y: readonly number[];
  drs?: readonly number[];
}

/** Inclusive index range into the samples of a lap. */
export interface DrsZone {
  startIndex: number;
  endIndex: number;
}

export interface TrackGeometry {
  centerline: readonly Point[];
  inner: readonly Point[];
  outer: readonly Point[];
  bounds: Bounds;
  drsZones: readonly DrsZone[];
  trackWidth: number;
}

export interface ResampledCurve {
  points: readonly Point[];
  /** Cumulative arclength per point, `distances[0] === 0`. */
  distances: readonly number[];
  totalLength: number;
}

/** A DRS zone expressed as arclength along the reference curve. */
export interface DrsSpan {
  startDistance: number;
  endDistance: number;
}
