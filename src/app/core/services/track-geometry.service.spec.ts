import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { InsufficientDataError } from '../errors/replay-errors';
import type { TrackGeometry } from '../models/track-data.model';
import { rectangleLap, straightLap } from '../testing/track-fixtures';
import {
  buildTrackGeometry,
  computeTangents,
  extractDrsZones,
  mapZonesToResolution,
  sanitizeDrsZones,
  TrackGeometryService,
} from './track-geometry.service';

function unwrap(lap = rectangleLap(), width = 200): TrackGeometry {
  const result = buildTrackGeometry(lap, width);
  if (!result.ok) throw result.error;
  return result.value;
}

describe('extractDrsZones', () => {
  it('finds each contiguous run of active codes', () => {
    expect(extractDrsZones([0, 0, 10, 10, 12, 0, 0, 14, 14, 0])).toEqual([
      { startIndex: 2, endIndex: 4 },
      { startIndex: 7, endIndex: 8 },
    ]);
  });

  it('closes a zone still open at the end of the lap', () => {
    expect(extractDrsZones([0, 10, 10])).toEqual([
      { startIndex: 1, endIndex: 2 },
    ]);
    expect(extractDrsZones([14])).toEqual([{ startIndex: 0, endIndex: 0 }]);
  });

  it('ignores inactive codes', () => {
    expect(extractDrsZones([0, 1, 8, 9, 11])).toEqual([]);
    expect(extractDrsZones([])).toEqual([]);
  });
});

describe('buildTrackGeometry', () => {
  it('fails below two samples', () => {
    const result = buildTrackGeometry({ x: [5], y: [5] }, 200);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(InsufficientDataError);
      expect(result.error.sampleCount).toBe(1);
      expect(result.error.code).toBe('INSUFFICIENT_DATA');
    }
  });

  it('offsets both boundaries half the track width either side', () => {
    const geometry = unwrap(rectangleLap(), 200);
    const tangents = computeTangents(geometry.centerline);

    geometry.centerline.forEach((c, i) => {
      const outer = geometry.outer[i];
      const inner = geometry.inner[i];

      expect(Math.hypot(outer.x - inner.x, outer.y - inner.y)).toBeCloseTo(200, 9);
      expect((outer.x + inner.x) / 2).toBeCloseTo(c.x, 9);
      expect((outer.y + inner.y) / 2).toBeCloseTo(c.y, 9);

      // perpendicular to the local tangent
      const dot =
        (outer.x - c.x) * tangents[i].x + (outer.y - c.y) * tangents[i].y;
      expect(dot).toBeCloseTo(0, 9);
    });
  });

  it('uses the left-hand normal on a straight edge', () => {
    const geometry = unwrap(rectangleLap(), 200);

    // (500, 0) on the bottom edge, travelling +x
    expect(geometry.centerline[5]).toEqual({ x: 500, y: 0 });
    expect(geometry.outer[5]).toEqual({ x: 500, y: 100 });
    expect(geometry.inner[5]).toEqual({ x: 500, y: -100 });
  });

  it('bounds the centerline and both boundaries', () => {
    expect(unwrap(rectangleLap(), 200).bounds).toEqual({
      xMin: -100,
      xMax: 1100,
      yMin: -100,
      yMax: 700,
    });
  });

  it('keeps boundaries on the centerline where the tangent vanishes', () => {
    const geometry = unwrap({ x: [5, 5], y: [5, 5] }, 200);

    expect(geometry.inner).toEqual([
      { x: 5, y: 5 },
      { x: 5, y: 5 },
    ]);
    expect(geometry.bounds).toEqual({ xMin: 5, xMax: 5, yMin: 5, yMax: 5 });
  });

  it('reads DRS zones from the lap and freezes the result', () => {
    const geometry = unwrap(
      straightLap(10, [0, 0, 10, 10, 12, 0, 0, 14, 14, 0]),
    );

    expect(geometry.drsZones).toEqual([
      { startIndex: 2, endIndex: 4 },
      { startIndex: 7, endIndex: 8 },
    ]);
    expect(Object.isFrozen(geometry)).toBe(true);
    expect(Object.isFrozen(geometry.centerline)).toBe(true);
  });

  it('has no DRS zones when the lap has no DRS channel', () => {
    expect(unwrap(straightLap(4)).drsZones).toEqual([]);
  });
});

describe('DRS zone mapping', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('drops malformed zones one by one', () => {
    const zones = sanitizeDrsZones([
      { startIndex: 2, endIndex: 4 },
      { startIndex: 'a', endIndex: 3 },
      { startIndex: 9, endIndex: 3 },
      null,
      { startIndex: 1.5, endIndex: 2 },
      { startIndex: 6, endIndex: 6 },
    ]);

    expect(zones).toEqual([
      { startIndex: 2, endIndex: 4 },
      { startIndex: 6, endIndex: 6 },
    ]);
    expect(console.warn).toHaveBeenCalledTimes(4);
  });

  it('maps raw indices into a resampled resolution', () => {
    expect(
      mapZonesToResolution([{ startIndex: 2, endIndex: 4 }], 10, 100),
    ).toEqual([{ startIndex: 20, endIndex: 40 }]);
  });
});

describe('TrackGeometryService', () => {
  let service: TrackGeometryService;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    service = new TrackGeometryService({
      boundaryResolution: 50,
      referenceResolution: 10,
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('rebuilds only when the reference lap changes', () => {
    const seen: (TrackGeometry | null)[] = [];
    service.geometry$.subscribe((g) => seen.push(g));

    const first = service.load('q1', rectangleLap());
    const again = service.load('q1', rectangleLap(2000, 2000));

    expect(first.ok && again.ok && first.value === again.value).toBe(true);
    expect(seen).toHaveLength(2);
    expect(service.getReferenceKey()).toBe('q1');
  });

  it('keeps the previous geometry when a lap is too short', () => {
    service.load('q1', rectangleLap());
    const before = service.getGeometry();

    const result = service.load('q2', { x: [1], y: [2] });

    expect(result.ok).toBe(false);
    expect(service.getGeometry()).toBe(before);
    expect(service.getReferenceKey()).toBe('q1');
  });

  it('resamples boundaries and the reference curve', () => {
    service.load('q1', rectangleLap());

    expect(service.getBoundaryCurves()?.inner).toHaveLength(50);
    expect(service.getBoundaryCurves()?.outer).toHaveLength(50);
    expect(service.getReferenceCurve()?.points).toHaveLength(10);
  });

  it('reveals DRS spans up to the current distance', () => {
    service.load('q1', straightLap(10, [0, 0, 10, 10, 10, 0, 0, 0, 0, 0]));

    expect(service.getDrsSpans()).toEqual([
      { startDistance: 200, endDistance: 400 },
    ]);
    expect(service.revealedDrsSpans(100)).toEqual([]);
    expect(service.revealedDrsSpans(300)).toEqual([
      { startDistance: 200, endDistance: 300 },
    ]);
    expect(service.revealedDrsSpans(800)).toEqual([
      { startDistance: 200, endDistance: 400 },
    ]);
  });

  it('clears the current geometry', () => {
    service.load('q1', rectangleLap());
    service.clear();

    expect(service.getGeometry()).toBeNull();
    expect(service.getReferenceCurve()).toBeNull();
  });
});
