import { BehaviorSubject } from 'rxjs';
import { z } from 'zod';
import { DRS_ACTIVE_CODES } from '../constants/telemetry.constants';
import { InsufficientDataError } from '../errors/replay-errors';
import { err, ok, type Result } from '../errors/result';
import type {
  Bounds,
  DrsSpan,
  DrsZone,
  LapSample,
  Point,
  ResampledCurve,
  TrackGeometry,
} from '../models/track-data.model';
import {
  BOUNDARY_RESOLUTION,
  buildResampledCurve,
  mapIndexToResolution,
  REFERENCE_RESOLUTION,
  resample,
  toPoints,
} from '../utils/curve-interpolation';

export const DEFAULT_TRACK_WIDTH = 200;

/* ===================================================== */
/* GEOMETRY                                              */
/* ===================================================== */

/** Central differences inside, one-sided at both ends. */
function gradient(values: readonly number[]): number[] {
  const n = values.length;
  const g = new Array<number>(n);

  g[0] = values[1] - values[0];
  g[n - 1] = values[n - 1] - values[n - 2];
  for (let i = 1; i < n - 1; i++) {
    g[i] = (values[i + 1] - values[i - 1]) / 2;
  }

  return g;
}

/** Unit tangents per sample. A zero-length tangent stays (0, 0). */
export function computeTangents(points: readonly Point[]): Point[] {
  const dx = gradient(points.map((p) => p.x));
  const dy = gradient(points.map((p) => p.y));

  return dx.map((tx, i) => {
    const ty = dy[i];
    const norm = Math.hypot(tx, ty) || 1.0;
    return { x: tx / norm, y: ty / norm };
  });
}

export function computeBounds(...curves: (readonly Point[])[]): Bounds {
  let xMin = Infinity;
  let xMax = -Infinity;
  let yMin = Infinity;
  let yMax = -Infinity;

  for (const curve of curves) {
    for (const p of curve) {
      if (p.x < xMin) xMin = p.x;
      if (p.x > xMax) xMax = p.x;
      if (p.y < yMin) yMin = p.y;
      if (p.y > yMax) yMax = p.y;
    }
  }

  return { xMin, xMax, yMin, yMax };
}

/**
 * Contiguous runs of active DRS codes. A zone closes on the first inactive
 * sample; a zone still open at the end of the lap closes on the last sample.
 */
export function extractDrsZones(drs: readonly number[]): DrsZone[] {
  const zones: DrsZone[] = [];
  let start: number | null = null;

  for (let i = 0; i < drs.length; i++) {
    if (DRS_ACTIVE_CODES.has(drs[i])) {
      if (start === null) start = i;
      continue;
    }

    if (start !== null) {
      zones.push({ startIndex: start, endIndex: i - 1 });
      start = null;
    }
  }

  if (start !== null) {
    zones.push({ startIndex: start, endIndex: drs.length - 1 });
  }

  return zones;
}

/**
 * Centerline, boundary offsets, bounds and DRS zones of one reference lap.
 * Fails with `InsufficientDataError` below two samples.
 */
export function buildTrackGeometry(
  lap: LapSample,
  trackWidth: number = DEFAULT_TRACK_WIDTH,
): Result<TrackGeometry, InsufficientDataError> {
  const centerline = toPoints(lap.x, lap.y);
  if (centerline.length < 2) {
    return err(new InsufficientDataError(centerline.length));
  }

  const half = trackWidth / 2;
  const tangents = computeTangents(centerline);

  const outer: Point[] = [];
  const inner: Point[] = [];
  centerline.forEach((c, i) => {
    // left-hand normal
    const nx = -tangents[i].y;
    const ny = tangents[i].x;
    outer.push({ x: c.x + nx * half, y: c.y + ny * half });
    inner.push({ x: c.x - nx * half, y: c.y - ny * half });
  });

  const drs = lap.drs ? lap.drs.slice(0, centerline.length) : [];

  return ok(
    Object.freeze({
      centerline: Object.freeze(centerline),
      inner: Object.freeze(inner),
      outer: Object.freeze(outer),
      bounds: Object.freeze(computeBounds(centerline, inner, outer)),
      drsZones: Object.freeze(extractDrsZones(drs)),
      trackWidth,
    }),
  );
}

/* ===================================================== */
/* DRS ZONE MAPPING                                      */
/* ===================================================== */

const drsZoneInputSchema = z
  .object({
    startIndex: z.number().int().nonnegative(),
    endIndex: z.number().int().nonnegative(),
  })
  .refine((zone) => zone.startIndex <= zone.endIndex, {
    message: 'DRS zone is inverted',
  });

/**
 * Keep the well-formed zones. Non-numeric or inverted bounds drop that one
 * zone only.
 */
export function sanitizeDrsZones(zones: readonly unknown[]): DrsZone[] {
  const valid: DrsZone[] = [];

  for (const zone of zones) {
    const parsed = drsZoneInputSchema.safeParse(zone);
    if (parsed.success) {
      valid.push(parsed.data);
    } else {
      console.warn('[TrackGeometry] discarding malformed DRS zone', zone);
    }
  }

  return valid;
}

/** Re-index zones from raw lap resolution into a resampled curve. */
export function mapZonesToResolution(
  zones: readonly unknown[],
  sourceLength: number,
  targetLength: number,
): DrsZone[] {
  return sanitizeDrsZones(zones).map((zone) => ({
    startIndex: mapIndexToResolution(zone.startIndex, sourceLength, targetLength),
    endIndex: mapIndexToResolution(zone.endIndex, sourceLength, targetLength),
  }));
}

/* ===================================================== */
/* SERVICE                                               */
/* ===================================================== */

export interface BoundaryCurves {
  inner: Point[];
  outer: Point[];
}

interface CachedTrack {
  key: string;
  geometry: TrackGeometry;
  reference: ResampledCurve;
  boundaries: BoundaryCurves;
  drsSpans: DrsSpan[];
}

export interface TrackGeometryOptions {
  trackWidth?: number;
  boundaryResolution?: number;
  referenceResolution?: number;
}

/**
 * Holds the geometry of the current reference lap.
 * Rebuilt only when the reference lap key changes.
 */
export class TrackGeometryService {
  private trackSubject = new BehaviorSubject<TrackGeometry | null>(null);

  /** Public observable */
  geometry$ = this.trackSubject.asObservable();

  private current: CachedTrack | null = null;

  private readonly trackWidth: number;
  private readonly boundaryResolution: number;
  private readonly referenceResolution: number;

  constructor(options: TrackGeometryOptions = {}) {
    this.trackWidth = options.trackWidth ?? DEFAULT_TRACK_WIDTH;
    this.boundaryResolution = options.boundaryResolution ?? BOUNDARY_RESOLUTION;
    this.referenceResolution =
      options.referenceResolution ?? REFERENCE_RESOLUTION;
  }

  /**
   * Build (or reuse) the geometry for a reference lap.
   * On failure the previous geometry stays in place.
   */
  load(
    key: string,
    lap: LapSample,
  ): Result<TrackGeometry, InsufficientDataError> {
    if (this.current?.key === key) {
      return ok(this.current.geometry);
    }

    const built = buildTrackGeometry(lap, this.trackWidth);
    if (!built.ok) {
      console.warn(`[TrackGeometry] ${key}: ${built.error.message}`);
      return built;
    }

    const geometry = built.value;
    const reference = buildResampledCurve(
      geometry.centerline,
      this.referenceResolution,
    );

    this.current = {
      key,
      geometry,
      reference,
      boundaries: {
        inner: resample(geometry.inner, this.boundaryResolution),
        outer: resample(geometry.outer, this.boundaryResolution),
      },
      drsSpans: this.toSpans(geometry, reference),
    };

    console.log(
      `[TrackGeometry] ${key}: ${geometry.centerline.length} samples,`,
      `${geometry.drsZones.length} DRS zone(s), length ${reference.totalLength.toFixed(1)}`,
    );

    this.trackSubject.next(geometry);
    return built;
  }

  getGeometry(): TrackGeometry | null {
    return this.current?.geometry ?? null;
  }

  getReferenceKey(): string | null {
    return this.current?.key ?? null;
  }

  /** High-resolution centerline for distance lookups. */
  getReferenceCurve(): ResampledCurve | null {
    return this.current?.reference ?? null;
  }

  /** Boundaries resampled for drawing. */
  getBoundaryCurves(): BoundaryCurves | null {
    return this.current?.boundaries ?? null;
  }

  getDrsSpans(): DrsSpan[] {
    return this.current?.drsSpans ?? [];
  }

  /**
   * DRS spans already reached at `currentDistance`; a zone the car is
   * inside is cut at the car.
   */
  revealedDrsSpans(currentDistance: number): DrsSpan[] {
    return this.getDrsSpans()
      .filter((span) => currentDistance >= span.startDistance)
      .map((span) => ({
        startDistance: span.startDistance,
        endDistance: Math.min(span.endDistance, currentDistance),
      }));
  }

  clear(): void {
    this.current = null;
    this.trackSubject.next(null);
  }

  private toSpans(
    geometry: TrackGeometry,
    reference: ResampledCurve,
  ): DrsSpan[] {
    const zones = mapZonesToResolution(
      geometry.drsZones,
      geometry.centerline.length,
      reference.points.length,
    );

    return zones.map((zone) => ({
      startDistance: reference.distances[zone.startIndex],
      endDistance: reference.distances[zone.endIndex],
    }));
  }
}
