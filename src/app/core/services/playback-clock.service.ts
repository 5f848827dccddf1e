import { BehaviorSubject, distinctUntilChanged, map } from 'rxjs';
import { DEFAULT_FPS } from '../constants/telemetry.constants';
import type {
  PlaybackMode,
  PlaybackState,
  SpeedChange,
} from '../models/playback-state.model';

export interface PlaybackClockOptions {
  /** Frame rate assumed when the sequence carries no timestamps. */
  fps?: number;
  minSpeed?: number;
  maxSpeed?: number;
}

export interface LoadOptions {
  /** Start playing immediately instead of waiting for the user. */
  autoStart?: boolean;
}

const EMPTY_STATE: PlaybackState = {
  frameIndex: 0,
  frameCount: 0,
  playTime: 0,
  playbackSpeed: 1,
  paused: true,
  mode: 'time',
};

/**
 * Forward-fill missing timestamps and force the sequence to be
 * non-decreasing so it can be binary searched. `null` when no frame has a
 * usable timestamp.
 */
export function normalizeTimestamps(
  raw: readonly (number | null | undefined)[],
): number[] | null {
  const firstValid = raw.find(
    (t): t is number => typeof t === 'number' && Number.isFinite(t),
  );
  if (firstValid === undefined) return null;

  const out: number[] = [];
  let last = firstValid;
  for (const t of raw) {
    if (typeof t === 'number' && Number.isFinite(t) && t > last) {
      last = t;
    }
    out.push(last);
  }
  return out;
}

/** Index of the first element strictly greater than `value`. */
function upperBound(sorted: readonly number[], value: number): number {
  let lo = 0;
  let hi = sorted.length;
  while (lo < hi) {
    const mid = (lo + hi) >> 1;
    if (sorted[mid] <= value) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

/**
 * Turns elapsed wall time into a frame index over a timestamped sequence.
 *
 * ✔ Speed-safe (any multiplier ≥ minSpeed)
 * ✔ Seek / step keep play time in sync with the frame
 * ✔ Auto-pause on the last frame
 */
export class PlaybackClockService {
  private stateSubject = new BehaviorSubject<PlaybackState>(EMPTY_STATE);

  /** Observable for HUD / controls */
  state$ = this.stateSubject.asObservable();
  isPaused$ = this.state$.pipe(
    map((s) => s.paused),
    distinctUntilChanged(),
  );
  frameIndex$ = this.state$.pipe(
    map((s) => s.frameIndex),
    distinctUntilChanged(),
  );

  private timestamps: number[] = [];

  /** Fractional frames not yet applied in fps mode. */
  private frameCarry = 0;

  private readonly fps: number;
  private readonly minSpeed: number;
  private readonly maxSpeed: number;

  constructor(options: PlaybackClockOptions = {}) {
    this.fps = options.fps ?? DEFAULT_FPS;
    this.minSpeed = options.minSpeed ?? 0.1;
    this.maxSpeed = options.maxSpeed ?? 256;
  }

  /* ===================================================== */
  /* LOAD / RESET                                          */
  /* ===================================================== */

  load(
    timestamps: readonly (number | null | undefined)[],
    options: LoadOptions = {},
  ): void {
    const normalized = normalizeTimestamps(timestamps);
    const mode: PlaybackMode = normalized ? 'time' : 'fps';

    this.timestamps = normalized ?? [];
    this.frameCarry = 0;

    this.stateSubject.next({
      frameIndex: 0,
      frameCount: timestamps.length,
      playTime: this.timeOf(0),
      playbackSpeed: 1,
      paused: !options.autoStart || timestamps.length === 0,
      mode,
    });
  }

  unload(): void {
    this.timestamps = [];
    this.frameCarry = 0;
    this.stateSubject.next(EMPTY_STATE);
  }

  restart(): void {
    const s = this.stateSubject.value;
    this.frameCarry = 0;
    this.stateSubject.next({
      ...s,
      frameIndex: 0,
      playTime: this.timeOf(0),
      playbackSpeed: 1,
      paused: true,
    });
  }

  /* ===================================================== */
  /* PER-TICK ADVANCE                                      */
  /* ===================================================== */

  advance(elapsedSeconds: number): PlaybackState {
    const s = this.stateSubject.value;
    if (s.paused || s.frameCount === 0) return s;

    const elapsed =
      Number.isFinite(elapsedSeconds) && elapsedSeconds > 0 ? elapsedSeconds : 0;
    const last = s.frameCount - 1;

    let frameIndex: number;
    let playTime: number;

    if (s.mode === 'time') {
      const first = this.timestamps[0];
      const end = this.timestamps[last];
      playTime = Math.min(
        Math.max(s.playTime + elapsed * s.playbackSpeed, first),
        end,
      );
      frameIndex = Math.max(
        0,
        Math.min(upperBound(this.timestamps, playTime) - 1, last),
      );

      // Inside a run of equal (forward-filled) timestamps the frame only
      // moves once play time passes the run, or reaches the end.
      const reachedEnd = elapsed > 0 && playTime >= end;
      if (
        !reachedEnd &&
        this.timestamps[frameIndex] === this.timestamps[s.frameIndex]
      ) {
        frameIndex = s.frameIndex;
      }
    } else {
      // no timestamps at all → step at a fixed rate
      const exact = this.frameCarry + elapsed * this.fps * s.playbackSpeed;
      const stepBy = Math.round(exact);
      this.frameCarry = exact - stepBy;
      frameIndex = Math.min(last, s.frameIndex + stepBy);
      playTime = s.playTime + elapsed * s.playbackSpeed;
    }

    const next: PlaybackState = {
      ...s,
      frameIndex,
      playTime,
      paused: frameIndex >= last,
    };
    this.stateSubject.next(next);
    return next;
  }

  /* ===================================================== */
  /* USER CONTROLS                                         */
  /* ===================================================== */

  /** Jump to a frame (timeline scrub). Play time follows the frame. */
  seek(frame: number): void {
    const s = this.stateSubject.value;
    if (s.frameCount === 0 || !Number.isFinite(frame)) return;

    const frameIndex = this.clampFrame(Math.round(frame));
    this.frameCarry = 0;
    this.stateSubject.next({
      ...s,
      frameIndex,
      playTime: this.timeOf(frameIndex),
    });
  }

  /** Move by whole frames; the pause state is left alone. */
  step(deltaFrames: number): void {
    const s = this.stateSubject.value;
    if (!Number.isFinite(deltaFrames)) return;
    this.seek(s.frameIndex + Math.trunc(deltaFrames));
  }

  setSpeed(value: number, change: SpeedChange = 'replace'): number {
    const s = this.stateSubject.value;
    if (!Number.isFinite(value)) return s.playbackSpeed;

    const requested = change === 'multiply' ? s.playbackSpeed * value : value;
    const playbackSpeed = Math.min(
      this.maxSpeed,
      Math.max(this.minSpeed, requested),
    );

    this.stateSubject.next({ ...s, playbackSpeed });
    return playbackSpeed;
  }

  speedUp(): number {
    return this.setSpeed(2, 'multiply');
  }

  slowDown(): number {
    return this.setSpeed(0.5, 'multiply');
  }

  togglePause(): void {
    const s = this.stateSubject.value;
    if (s.frameCount === 0) return;
    this.stateSubject.next({ ...s, paused: !s.paused });
  }

  play(): void {
    const s = this.stateSubject.value;
    if (s.frameCount === 0 || !s.paused) return;
    this.stateSubject.next({ ...s, paused: false });
  }

  pause(): void {
    const s = this.stateSubject.value;
    if (s.paused) return;
    this.stateSubject.next({ ...s, paused: true });
  }

  /* ===================================================== */
  /* SNAPSHOTS                                             */
  /* ===================================================== */

  snapshot(): PlaybackState {
    return this.stateSubject.value;
  }

  isPaused(): boolean {
    return this.stateSubject.value.paused;
  }

  getFrameIndex(): number {
    return this.stateSubject.value.frameIndex;
  }

  /** True once the last frame has been reached. */
  isComplete(): boolean {
    const s = this.stateSubject.value;
    return s.frameCount > 0 && s.frameIndex >= s.frameCount - 1;
  }

  private clampFrame(frame: number): number {
    const last = this.stateSubject.value.frameCount - 1;
    return Math.max(0, Math.min(frame, last));
  }

  private timeOf(frameIndex: number): number {
    if (this.timestamps.length) {
      return this.timestamps[frameIndex];
    }
    return frameIndex / this.fps;
  }
}
