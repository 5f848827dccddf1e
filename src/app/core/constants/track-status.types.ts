// track-status.types.ts
import type { TimelineEventKind } from '../models/track-status.model';

export type TrackStatusType =
  | 'GREEN'
  | 'YELLOW'
  | 'SC'
  | 'RED'
  | 'VSC'
  | 'VSC_ENDING';

export const TRACK_STATUS_MAP: Readonly<Record<string, TrackStatusType>> = {
  '1': 'GREEN',
  '2': 'YELLOW',
  '4': 'SC',
  '5': 'RED',
  '6': 'VSC',
  '7': 'VSC_ENDING', // ending → drawn as VSC until GREEN follows
};

/** Statuses that produce a timeline band. GREEN clears, it is not an event. */
export const STATUS_EVENT_KIND: Readonly<
  Record<TrackStatusType, TimelineEventKind | null>
> = {
  GREEN: null,
  YELLOW: 'CAUTION',
  SC: 'SAFETY_CAR',
  RED: 'RED_FLAG',
  VSC: 'VIRTUAL_SAFETY_CAR',
  VSC_ENDING: 'VIRTUAL_SAFETY_CAR',
};
