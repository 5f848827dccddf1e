import { BehaviorSubject } from 'rxjs';
import { z } from 'zod';
import { DEFAULT_FPS } from '../constants/telemetry.constants';
import {
  STATUS_EVENT_KIND,
  TRACK_STATUS_MAP,
} from '../constants/track-status.types';
import type { Frame } from '../models/race-telemetry.model';
import type {
  StatusInterval,
  TimelineEvent,
  TimelineEventKind,
} from '../models/track-status.model';
import { isAbsent, resolveNumber } from '../utils/field-resolver';

export interface EventExtractorOptions {
  /** Dropout detection looks at every n-th frame only. */
  stride?: number;
  /** Frames per second used to turn status times into frame indices. */
  statusSampleRate?: number;
  /** Length given to a status interval that has no end yet. */
  openStatusDurationSeconds?: number;
}

const EVENT_LABELS: Record<Exclude<TimelineEventKind, 'DROPOUT'>, string> = {
  CAUTION: 'Yellow flag',
  SAFETY_CAR: 'Safety car',
  RED_FLAG: 'Red flag',
  VIRTUAL_SAFETY_CAR: 'Virtual safety car',
};

const statusIntervalSchema = z.object({
  status: z.union([z.string(), z.number()]),
  startTime: z.number().finite(),
  endTime: z.number().finite().nullable(),
});

/**
 * Timeline annotations for a loaded session: entities dropping out of the
 * stream and flag / safety car periods.
 */
export class EventExtractorService {
  private eventsSubject = new BehaviorSubject<TimelineEvent[]>([]);
  events$ = this.eventsSubject.asObservable();

  private readonly stride: number;
  private readonly statusSampleRate: number;
  private readonly openStatusDurationSeconds: number;

  constructor(options: EventExtractorOptions = {}) {
    this.stride = Math.max(1, Math.floor(options.stride ?? 25));
    this.statusSampleRate = options.statusSampleRate ?? DEFAULT_FPS;
    this.openStatusDurationSeconds = options.openStatusDurationSeconds ?? 10;
  }

  extract(
    frames: readonly Frame[],
    statusIntervals: readonly StatusInterval[],
    totalLaps: number,
  ): TimelineEvent[] {
    if (!frames.length) {
      this.eventsSubject.next([]);
      return [];
    }

    const events = [
      ...this.detectDropouts(frames, totalLaps),
      ...this.mapStatusIntervals(statusIntervals, frames.length),
    ].sort((a, b) => a.frame - b.frame);

    this.eventsSubject.next(events);
    return events;
  }

  getEvents(): TimelineEvent[] {
    return this.eventsSubject.value;
  }

  clear(): void {
    this.eventsSubject.next([]);
  }

  /* ===================================================== */
  /* DROPOUTS                                              */
  /* ===================================================== */

  private detectDropouts(
    frames: readonly Frame[],
    totalLaps: number,
  ): TimelineEvent[] {
    const events: TimelineEvent[] = [];
    let previous: Set<string> | null = null;
    let previousIndex = 0;

    for (let i = 0; i < frames.length; i += this.stride) {
      const present = new Set(Object.keys(frames[i].entities));

      if (previous) {
        for (const id of previous) {
          if (present.has(id)) continue;

          // lap from the last sampled frame the entity was seen in
          const lap = resolveNumber(frames[previousIndex].entities[id], 'lap');
          const event: TimelineEvent = { kind: 'DROPOUT', frame: i, label: id };
          if (!isAbsent(lap)) {
            event.lap = totalLaps > 0 ? Math.min(lap, totalLaps) : lap;
          }
          events.push(event);
        }
      }

      previous = present;
      previousIndex = i;
    }

    return events;
  }

  /* ===================================================== */
  /* FLAGS                                                 */
  /* ===================================================== */

  private mapStatusIntervals(
    intervals: readonly StatusInterval[],
    frameCount: number,
  ): TimelineEvent[] {
    const events: TimelineEvent[] = [];

    for (const raw of intervals) {
      const parsed = statusIntervalSchema.safeParse(raw);
      if (!parsed.success) {
        console.warn('[EventExtractor] skipping malformed status interval', raw);
        continue;
      }

      const interval = parsed.data;
      const statusType = TRACK_STATUS_MAP[String(interval.status)];
      const kind = statusType ? STATUS_EVENT_KIND[statusType] : null;
      if (!kind || kind === 'DROPOUT') continue;

      const startFrame = Math.trunc(interval.startTime * this.statusSampleRate);
      let endFrame =
        interval.endTime !== null
          ? Math.trunc(interval.endTime * this.statusSampleRate)
          : startFrame +
            Math.round(this.openStatusDurationSeconds * this.statusSampleRate);

      // entirely before the first frame or after the last
      if (endFrame <= 0 || startFrame >= frameCount) continue;

      endFrame = Math.min(endFrame, frameCount);

      events.push({
        kind,
        frame: Math.max(0, startFrame),
        endFrame,
        label: EVENT_LABELS[kind],
      });
    }

    return events;
  }
}
