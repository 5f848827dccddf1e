import type { Absent } from '../utils/field-resolver';

export type EntityId = string;

export type TelemetryValue = number | boolean | string;

/**
 * Raw per-entity record as delivered by the telemetry source.
 * Field names vary between releases, so lookups go through the field resolver.
 */
export type TelemetryRecord = Readonly<
  Record<string, TelemetryValue | null | undefined>
>;

export interface Frame {
  /** Seconds; `null` when the source dropped the timestamp. */
  timestamp: number | null;
  entities: Readonly<Record<EntityId, TelemetryRecord>>;
}

/** Typed view of a telemetry record. Absent fields stay ABSENT, never 0. */
export interface EntityState {
  x: number | Absent;
  y: number | Absent;
  speed: number | Absent;
  gear: number | Absent;
  throttle: number | Absent;
  brake: number | Absent;
  drs: number | Absent;
  lap: number | Absent;
  relDist: number | Absent;
  distance: number | Absent;
  position: number | Absent;
}

export interface TelemetrySegment {
  key: string;
  frames: readonly Frame[];
}
