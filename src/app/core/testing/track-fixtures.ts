import type { Frame, TelemetryRecord } from '../models/race-telemetry.model';
import type { LapSample } from '../models/track-data.model';

/**
 * Closed rectangular lap, counter-clockwise from (0, 0), one sample every
 * `step` units. The start sample is repeated at the end.
 */
export function rectangleLap(width = 1000, height = 600, step = 100): LapSample {
  const x: number[] = [];
  const y: number[] = [];

  for (let px = 0; px < width; px += step) {
    x.push(px);
    y.push(0);
  }
  for (let py = 0; py < height; py += step) {
    x.push(width);
    y.push(py);
  }
  for (let px = width; px > 0; px -= step) {
    x.push(px);
    y.push(height);
  }
  for (let py = height; py > 0; py -= step) {
    x.push(0);
    y.push(py);
  }
  x.push(0);
  y.push(0);

  return { x, y, drs: x.map(() => 0) };
}

/** Straight lap along the x axis, `count` samples 100 units apart. */
export function straightLap(count: number, drs?: number[]): LapSample {
  const x = Array.from({ length: count }, (_, i) => i * 100);
  return { x, y: x.map(() => 0), drs };
}

/** Frames `dt` seconds apart, each holding the same entities. */
export function timedFrames(
  count: number,
  dt: number,
  entities: (i: number) => Record<string, TelemetryRecord> = () => ({}),
): Frame[] {
  return Array.from({ length: count }, (_, i) => ({
    timestamp: i * dt,
    entities: entities(i),
  }));
}
