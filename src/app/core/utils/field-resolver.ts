import type {
  EntityState,
  TelemetryRecord,
  TelemetryValue,
} from '../models/race-telemetry.model';

/** Marks a field no candidate name resolved. Never equal to 0 or false. */
export const ABSENT: unique symbol = Symbol('absent');
export type Absent = typeof ABSENT;

export type TelemetryField =
  | 'x'
  | 'y'
  | 'speed'
  | 'gear'
  | 'throttle'
  | 'brake'
  | 'drs'
  | 'lap'
  | 'relDist'
  | 'distance'
  | 'position';

/** Known spellings per field, in lookup order. */
export const FIELD_ALIASES: Readonly<Record<TelemetryField, readonly string[]>> =
  {
    x: ['x', 'X'],
    y: ['y', 'Y'],
    speed: ['speed', 'Speed'],
    gear: ['gear', 'nGear', 'Gear'],
    throttle: ['throttle', 'Throttle'],
    brake: ['brake', 'Brake'],
    drs: ['drs', 'DRS'],
    lap: ['lap', 'LapNumber'],
    relDist: ['rel_dist', 'relDist', 'RelativeDistance'],
    distance: ['dist', 'distance', 'Distance'],
    position: ['position', 'Position'],
  };

export function isAbsent<T>(value: T | Absent): value is Absent {
  return value === ABSENT;
}

/**
 * First candidate whose value is neither `null` nor `undefined`.
 * `0`, `false` and `''` are values.
 */
export function resolveField(
  record: TelemetryRecord | null | undefined,
  candidates: readonly string[],
): TelemetryValue | Absent {
  if (!record) return ABSENT;

  for (const key of candidates) {
    const value = record[key];
    if (value !== null && value !== undefined) {
      return value;
    }
  }

  return ABSENT;
}

export function resolveTelemetryField(
  record: TelemetryRecord | null | undefined,
  field: TelemetryField,
): TelemetryValue | Absent {
  return resolveField(record, FIELD_ALIASES[field]);
}

/**
 * Numeric view of a field. Booleans map to 1/0 (brake on some feeds),
 * numeric strings are parsed, anything else is ABSENT.
 */
export function resolveNumber(
  record: TelemetryRecord | null | undefined,
  field: TelemetryField,
): number | Absent {
  const value = resolveTelemetryField(record, field);
  if (value === ABSENT) return ABSENT;

  if (typeof value === 'boolean') return value ? 1 : 0;

  if (typeof value === 'string') {
    if (value.trim() === '') return ABSENT;
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : ABSENT;
  }

  return Number.isFinite(value) ? value : ABSENT;
}

export function resolveEntityState(
  record: TelemetryRecord | null | undefined,
): EntityState {
  return {
    x: resolveNumber(record, 'x'),
    y: resolveNumber(record, 'y'),
    speed: resolveNumber(record, 'speed'),
    gear: resolveNumber(record, 'gear'),
    throttle: resolveNumber(record, 'throttle'),
    brake: resolveNumber(record, 'brake'),
    drs: resolveNumber(record, 'drs'),
    lap: resolveNumber(record, 'lap'),
    relDist: resolveNumber(record, 'relDist'),
    distance: resolveNumber(record, 'distance'),
    position: resolveNumber(record, 'position'),
  };
}
