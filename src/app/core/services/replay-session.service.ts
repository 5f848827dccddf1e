import { BehaviorSubject, type Observable, type Subscription } from 'rxjs';
import {
  parseReplayConfig,
  type ReplayConfig,
} from '../config/replay-config';
import type { InsufficientDataError } from '../errors/replay-errors';
import type { Result } from '../errors/result';
import type { PlaybackState } from '../models/playback-state.model';
import type {
  EntityId,
  Frame,
  TelemetrySegment,
} from '../models/race-telemetry.model';
import type {
  DrsSpan,
  LapSample,
  TrackGeometry,
} from '../models/track-data.model';
import type {
  StatusInterval,
  TimelineEvent,
} from '../models/track-status.model';
import { distanceAlong } from '../utils/curve-interpolation';
import { isAbsent, resolveEntityState } from '../utils/field-resolver';
import { TimelineScale } from '../utils/timeline-scale';
import { EventExtractorService } from './event-extractor.service';
import { PlaybackClockService } from './playback-clock.service';
import {
  TelemetryLoadGateService,
  type SegmentLoader,
} from './telemetry-load-gate.service';
import { TrackGeometryService } from './track-geometry.service';
import {
  ViewportProjectorService,
  type ProjectedEntity,
} from './viewport-projector.service';

export type TelemetryStatus = 'idle' | 'loading' | 'ready' | 'unavailable';

export type SpeedPreset = 0.5 | 1 | 2 | 4;

export interface ReplaySnapshot {
  playback: PlaybackState;
  segmentKey: string | null;
  telemetry: TelemetryStatus;
  frame: Frame | null;
  entities: ProjectedEntity[];
}

export interface SessionData {
  frames: readonly Frame[];
  statusIntervals: readonly StatusInterval[];
  totalLaps: number;
}

const SESSION_KEY = 'session';

/**
 * Wires geometry, viewport, clock, events and the load gate together and
 * drives them from a single per-tick entry point.
 *
 * MUST be ticked from the render loop; background loads only land on the
 * next `tick`.
 */
export class ReplaySessionService {
  readonly config: ReplayConfig;

  readonly track: TrackGeometryService;
  readonly projector: ViewportProjectorService;
  readonly clock: PlaybackClockService;
  readonly events: EventExtractorService;
  readonly gate: TelemetryLoadGateService<readonly Frame[]>;

  private snapshotSubject: BehaviorSubject<ReplaySnapshot>;
  /** Emits after every tick and control change */
  frame$: Observable<ReplaySnapshot>;

  private timeline: TimelineScale;

  private frames: readonly Frame[] = [];
  private selectedKey: string | null = null;
  private telemetry: TelemetryStatus = 'idle';
  private segmentCache = new Map<string, readonly Frame[]>();

  private loadingSub: Subscription;

  constructor(config: ReplayConfig = parseReplayConfig()) {
    this.config = config;

    this.track = new TrackGeometryService({
      trackWidth: config.trackWidth,
      boundaryResolution: config.boundaryResolution,
      referenceResolution: config.referenceResolution,
    });
    this.projector = new ViewportProjectorService({
      leftMargin: config.leftMargin,
      rightMargin: config.rightMargin,
      padding: config.padding,
      rotationDeg: config.rotationDeg,
    });
    this.clock = new PlaybackClockService({
      fps: config.fps,
      minSpeed: config.minSpeed,
      maxSpeed: config.maxSpeed,
    });
    this.events = new EventExtractorService({
      stride: config.dropoutStride,
      statusSampleRate: config.statusSampleRate,
      openStatusDurationSeconds: config.openStatusDurationSeconds,
    });
    this.gate = new TelemetryLoadGateService<readonly Frame[]>();

    this.timeline = new TimelineScale({
      leftMargin: config.leftMargin,
      rightMargin: config.rightMargin,
    });

    this.snapshotSubject = new BehaviorSubject<ReplaySnapshot>(
      this.buildSnapshot(),
    );
    this.frame$ = this.snapshotSubject.asObservable();

    this.loadingSub = this.gate.loading$.subscribe((loading) => {
      if (loading) this.telemetry = 'loading';
    });
  }

  /* ===================================================== */
  /* TRACK + VIEWPORT                                      */
  /* ===================================================== */

  /**
   * Use a lap as the track reference. On failure nothing changes and the
   * caller should try another lap.
   */
  setReferenceLap(
    key: string,
    lap: LapSample,
  ): Result<TrackGeometry, InsufficientDataError> {
    const previousKey = this.track.getReferenceKey();
    const result = this.track.load(key, lap);

    if (result.ok && previousKey !== key) {
      const boundaries = this.track.getBoundaryCurves();
      this.projector.setGeometry(result.value, boundaries ?? undefined);
    }

    return result;
  }

  resize(width: number, height: number): void {
    this.projector.recompute(width, height);
    this.timeline.resize(width);
  }

  setRotation(rotationDeg: number): void {
    this.projector.setRotation(rotationDeg);
  }

  /* ===================================================== */
  /* TELEMETRY                                             */
  /* ===================================================== */

  /** Whole-session frames (race replay). Events are extracted once here. */
  loadSession(data: SessionData): TimelineEvent[] {
    this.selectedKey = SESSION_KEY;
    this.applyFrames(data.frames, false);
    return this.events.extract(data.frames, data.statusIntervals, data.totalLaps);
  }

  /** Make a segment resident so selecting it needs no load. */
  cacheSegment(segment: TelemetrySegment): void {
    this.segmentCache.set(segment.key, segment.frames);
  }

  /**
   * Select a telemetry segment. Resident segments apply at once; others go
   * through the load gate and apply on a later tick. Returns `false` when the
   * request was dropped.
   */
  selectSegment(key: string, loader?: SegmentLoader<readonly Frame[]>): boolean {
    const cached = this.segmentCache.get(key);
    if (cached) {
      this.selectedKey = key;
      this.applyFrames(cached, this.config.autoStartCached);
      return true;
    }

    if (!loader) {
      this.selectedKey = key;
      this.setUnavailable(key, 'no loader for segment');
      this.emit();
      return false;
    }

    if (!this.gate.request(key, loader)) return false;

    this.selectedKey = key;
    this.emit();
    return true;
  }

  /** Forget the selection; a load still in flight will be discarded. */
  clearSelection(): void {
    this.selectedKey = null;
    this.frames = [];
    this.telemetry = 'idle';
    this.clock.unload();
    this.timeline.setTotalFrames(0);
    this.emit();
  }

  /* ===================================================== */
  /* PER-TICK                                              */
  /* ===================================================== */

  tick(elapsedSeconds: number): ReplaySnapshot {
    const outcome = this.gate.take(this.selectedKey);

    if (outcome?.status === 'loaded') {
      this.segmentCache.set(outcome.key, outcome.payload);
      this.applyFrames(outcome.payload, false);
    } else if (outcome?.status === 'unavailable') {
      this.setUnavailable(outcome.key, outcome.reason);
    }

    if (this.telemetry === 'loading' && !this.gate.isLoading() && !outcome) {
      // load finished for a selection that has since changed
      this.telemetry = this.frames.length ? 'ready' : 'idle';
    }

    this.clock.advance(elapsedSeconds);
    return this.emit();
  }

  /* ===================================================== */
  /* CONTROLS                                              */
  /* ===================================================== */

  togglePause(): void {
    this.clock.togglePause();
    this.emit();
  }

  seek(frame: number): void {
    this.clock.seek(frame);
    this.emit();
  }

  /** Seek to the frame under an x position of the progress bar. */
  scrubTo(x: number): boolean {
    if (!this.frames.length || !this.timeline.contains(x)) return false;
    this.seek(this.timeline.xToFrame(x));
    return true;
  }

  stepForward(): void {
    this.clock.step(this.config.stepFrames);
    this.emit();
  }

  stepBackward(): void {
    this.clock.step(-this.config.stepFrames);
    this.emit();
  }

  speedUp(): number {
    const speed = this.clock.speedUp();
    this.emit();
    return speed;
  }

  slowDown(): number {
    const speed = this.clock.slowDown();
    this.emit();
    return speed;
  }

  setSpeedPreset(preset: SpeedPreset): number {
    const speed = this.clock.setSpeed(preset);
    this.emit();
    return speed;
  }

  restart(): void {
    this.clock.restart();
    this.emit();
  }

  /* ===================================================== */
  /* QUERIES                                               */
  /* ===================================================== */

  snapshot(): ReplaySnapshot {
    return this.snapshotSubject.value;
  }

  getTimeline(): TimelineScale {
    return this.timeline;
  }

  /** Progress bar x of every timeline event, for marker drawing. */
  eventMarkers(): { event: TimelineEvent; x: number; endX?: number }[] {
    return this.events.getEvents().map((event) => ({
      event,
      x: this.timeline.frameToX(event.frame),
      endX:
        event.endFrame !== undefined
          ? this.timeline.frameToX(event.endFrame)
          : undefined,
    }));
  }

  /**
   * DRS spans an entity has already reached on the current frame. Uses the
   * reported lap distance when present, else the nearest reference sample.
   */
  revealedDrsSpans(entityId: EntityId): DrsSpan[] {
    const frame = this.currentFrame();
    const curve = this.track.getReferenceCurve();
    if (!frame || !curve) return [];

    const state = resolveEntityState(frame.entities[entityId]);
    let distance: number;

    if (!isAbsent(state.distance)) {
      distance = state.distance;
    } else if (!isAbsent(state.x) && !isAbsent(state.y)) {
      distance = distanceAlong(curve, { x: state.x, y: state.y });
    } else {
      return [];
    }

    return this.track.revealedDrsSpans(distance);
  }

  destroy(): void {
    this.loadingSub.unsubscribe();
    this.gate.reset();
    this.clearSelection();
    this.events.clear();
    this.track.clear();
  }

  /* ===================================================== */
  /* INTERNALS                                             */
  /* ===================================================== */

  private applyFrames(frames: readonly Frame[], autoStart: boolean): void {
    this.frames = frames;
    this.telemetry = frames.length ? 'ready' : 'unavailable';
    this.clock.load(
      frames.map((f) => f.timestamp),
      { autoStart },
    );
    this.timeline.setTotalFrames(frames.length);
    this.emit();
  }

  private setUnavailable(key: string, reason: string): void {
    console.warn(`[ReplaySession] ${key}: telemetry unavailable (${reason})`);
    this.frames = [];
    this.telemetry = 'unavailable';
    this.clock.unload();
    this.timeline.setTotalFrames(0);
  }

  private currentFrame(): Frame | null {
    return this.frames[this.clock.getFrameIndex()] ?? null;
  }

  private buildSnapshot(): ReplaySnapshot {
    const frame = this.currentFrame();
    return {
      playback: this.clock.snapshot(),
      segmentKey: this.selectedKey,
      telemetry: this.telemetry,
      frame,
      entities:
        frame && this.projector.getTransform()
          ? this.projector.projectEntities(frame)
          : [],
    };
  }

  private emit(): ReplaySnapshot {
    const snapshot = this.buildSnapshot();
    this.snapshotSubject.next(snapshot);
    return snapshot;
  }
}
