import { BehaviorSubject } from 'rxjs';
import type {
  EntityId,
  EntityState,
  Frame,
} from '../models/race-telemetry.model';
import type {
  Bounds,
  DrsZone,
  Point,
  TrackGeometry,
} from '../models/track-data.model';
import type {
  UsableArea,
  ViewportOptions,
  ViewportTransform,
} from '../models/viewport.model';
import { BOUNDARY_RESOLUTION, resample } from '../utils/curve-interpolation';
import { isAbsent, resolveEntityState } from '../utils/field-resolver';
import {
  computeBounds,
  mapZonesToResolution,
  type BoundaryCurves,
} from './track-geometry.service';

export const DEFAULT_VIEWPORT_OPTIONS: ViewportOptions = {
  leftMargin: 340,
  rightMargin: 0,
  padding: 0.05,
  rotationDeg: 0,
};

export interface ProjectedEntity {
  id: EntityId;
  screen: Point;
  state: EntityState;
}

function centerOf(bounds: Bounds): Point {
  return {
    x: (bounds.xMin + bounds.xMax) / 2,
    y: (bounds.yMin + bounds.yMax) / 2,
  };
}

function toRadians(deg: number): number {
  // whole turns are treated as no rotation at all
  const normalized = deg % 360;
  return normalized === 0 ? 0 : (normalized * Math.PI) / 180;
}

/**
 * World → screen mapping for the track view.
 *
 * Geometry is rotated about the center of its unrotated bounds, scaled to fit
 * the rotated bounds into the viewport minus the side UI margins, and
 * translated so that unrotated center lands in the middle of that area. Screen
 * copies of the boundary curves are rebuilt on resize / rotation change only.
 */
export class ViewportProjectorService {
  private transformSubject = new BehaviorSubject<ViewportTransform | null>(
    null,
  );
  transform$ = this.transformSubject.asObservable();

  private options: ViewportOptions;

  private geometry: TrackGeometry | null = null;
  private boundaries: BoundaryCurves | null = null;
  private boundaryZones: DrsZone[] = [];

  private viewportWidth = 0;
  private viewportHeight = 0;

  private cosRot = 1;
  private sinRot = 0;

  /* ---------- SCREEN CACHES ---------- */
  screenInner: Point[] = [];
  screenOuter: Point[] = [];
  screenDrsSegments: Point[][] = [];

  constructor(options: Partial<ViewportOptions> = {}) {
    this.options = { ...DEFAULT_VIEWPORT_OPTIONS, ...options };
    this.updateRotation();
  }

  /* ===================================================== */
  /* CONFIGURATION                                         */
  /* ===================================================== */

  /**
   * Attach the geometry to draw. `boundaries` are the resampled curves the
   * screen caches are built from; they default to a fresh resample.
   */
  setGeometry(geometry: TrackGeometry, boundaries?: BoundaryCurves): void {
    this.geometry = geometry;
    this.boundaries = boundaries ?? {
      inner: resample(geometry.inner, BOUNDARY_RESOLUTION),
      outer: resample(geometry.outer, BOUNDARY_RESOLUTION),
    };
    this.boundaryZones = mapZonesToResolution(
      geometry.drsZones,
      geometry.centerline.length,
      this.boundaries.outer.length,
    );
    this.refresh();
  }

  setRotation(rotationDeg: number): void {
    this.options = { ...this.options, rotationDeg };
    this.updateRotation();
    this.refresh();
  }

  setMargins(leftMargin: number, rightMargin: number): void {
    this.options = { ...this.options, leftMargin, rightMargin };
    this.refresh();
  }

  getOptions(): ViewportOptions {
    return { ...this.options };
  }

  getTransform(): ViewportTransform | null {
    return this.transformSubject.value;
  }

  /* ===================================================== */
  /* FIT                                                   */
  /* ===================================================== */

  /**
   * Recalculate scale and translation for a viewport size.
   * Returns `null` until geometry is attached.
   */
  recompute(viewportWidth: number, viewportHeight: number): ViewportTransform | null {
    this.viewportWidth = viewportWidth;
    this.viewportHeight = viewportHeight;

    const geometry = this.geometry;
    if (!geometry) return null;

    const { leftMargin, rightMargin, padding } = this.options;
    const pivot = centerOf(geometry.bounds);
    const rotationRad = toRadians(this.options.rotationDeg);

    // Rotated geometry needs its own bounds; the unrotated box would clip it.
    const fittedBounds =
      rotationRad === 0
        ? geometry.bounds
        : computeBounds(
            ...[geometry.centerline, geometry.inner, geometry.outer].map(
              (curve) => curve.map((p) => this.rotate(p, pivot)),
            ),
          );

    const worldW = Math.max(1.0, fittedBounds.xMax - fittedBounds.xMin);
    const worldH = Math.max(1.0, fittedBounds.yMax - fittedBounds.yMin);

    // Reserve side UI before padding so the track never sits under a panel
    const innerW = Math.max(1.0, viewportWidth - leftMargin - rightMargin);
    const usableW = innerW * (1 - 2 * padding);
    const usableH = viewportHeight * (1 - 2 * padding);

    const scale = Math.min(usableW / worldW, usableH / worldH);

    // the pivot is fixed under rotation
    const screenCx = leftMargin + innerW / 2;
    const screenCy = viewportHeight / 2;

    const transform: ViewportTransform = {
      scale,
      translateX: screenCx - scale * pivot.x,
      translateY: screenCy - scale * pivot.y,
      rotationRad,
      pivot,
      fittedBounds,
    };

    this.transformSubject.next(transform);
    this.rebuildScreenCaches();

    return transform;
  }

  /** Padded region the fitted track must stay inside. */
  usableArea(): UsableArea {
    const { leftMargin, rightMargin, padding } = this.options;
    const innerW = Math.max(1.0, this.viewportWidth - leftMargin - rightMargin);

    return {
      left: leftMargin + innerW * padding,
      right: leftMargin + innerW * (1 - padding),
      bottom: this.viewportHeight * padding,
      top: this.viewportHeight * (1 - padding),
    };
  }

  /* ===================================================== */
  /* PROJECTION                                            */
  /* ===================================================== */

  /** Rotate about the unrotated bounds center, then scale and translate. */
  project(x: number, y: number): Point {
    const transform = this.transformSubject.value;
    if (!transform) return { x, y };

    const rotated =
      transform.rotationRad === 0
        ? { x, y }
        : this.rotate({ x, y }, transform.pivot);

    return this.toScreen(rotated, transform);
  }

  /** Scale/translate a point already in the rotated world frame. */
  toScreen(point: Point, transform: ViewportTransform): Point {
    return {
      x: transform.scale * point.x + transform.translateX,
      y: transform.scale * point.y + transform.translateY,
    };
  }

  /** Screen positions of every entity with a resolvable x/y. */
  projectEntities(frame: Frame): ProjectedEntity[] {
    const projected: ProjectedEntity[] = [];

    for (const [id, record] of Object.entries(frame.entities)) {
      const state = resolveEntityState(record);
      if (isAbsent(state.x) || isAbsent(state.y)) continue;

      projected.push({ id, screen: this.project(state.x, state.y), state });
    }

    return projected;
  }

  /* ===================================================== */
  /* INTERNALS                                             */
  /* ===================================================== */

  private refresh(): void {
    if (this.viewportWidth > 0 && this.viewportHeight > 0) {
      this.recompute(this.viewportWidth, this.viewportHeight);
    }
  }

  private updateRotation(): void {
    const rad = toRadians(this.options.rotationDeg);
    this.cosRot = Math.cos(rad);
    this.sinRot = Math.sin(rad);
  }

  private rotate(p: Point, pivot: Point): Point {
    const tx = p.x - pivot.x;
    const ty = p.y - pivot.y;
    return {
      x: tx * this.cosRot - ty * this.sinRot + pivot.x,
      y: tx * this.sinRot + ty * this.cosRot + pivot.y,
    };
  }

  private rebuildScreenCaches(): void {
    if (!this.boundaries) return;

    this.screenInner = this.boundaries.inner.map((p) => this.project(p.x, p.y));
    this.screenOuter = this.boundaries.outer.map((p) => this.project(p.x, p.y));

    this.screenDrsSegments = this.boundaryZones
      .filter((zone) => zone.startIndex < zone.endIndex)
      .map((zone) =>
        this.screenOuter.slice(zone.startIndex, zone.endIndex + 1),
      );
  }
}
