import { beforeEach, describe, expect, it } from 'vitest';
import {
  normalizeTimestamps,
  PlaybackClockService,
} from './playback-clock.service';

describe('normalizeTimestamps', () => {
  it('forward-fills and never goes backwards', () => {
    expect(normalizeTimestamps([null, 1, null, 0.5, 2])).toEqual([1, 1, 1, 1, 2]);
  });

  it('returns null when nothing is usable', () => {
    expect(normalizeTimestamps([null, undefined, NaN])).toBeNull();
    expect(normalizeTimestamps([])).toBeNull();
  });
});

describe('PlaybackClockService', () => {
  let clock: PlaybackClockService;

  beforeEach(() => {
    clock = new PlaybackClockService();
  });

  describe('time mode', () => {
    beforeEach(() => {
      clock.load([0, 0.04, 0.08, 0.12], { autoStart: true });
    });

    it('resolves the last frame at or before play time', () => {
      clock.advance(0.03);
      expect(clock.getFrameIndex()).toBe(0);

      clock.advance(0.02);
      expect(clock.getFrameIndex()).toBe(1);
      expect(clock.snapshot().playTime).toBeCloseTo(0.05, 12);
    });

    it('scales elapsed time by speed and pauses at the end', () => {
      clock.setSpeed(2);
      const state = clock.advance(0.1);

      expect(state.playTime).toBe(0.12);
      expect(state.frameIndex).toBe(3);
      expect(state.paused).toBe(true);
      expect(clock.isComplete()).toBe(true);
    });

    it('ignores negative and non-finite elapsed time', () => {
      clock.advance(0.05);
      clock.advance(-1);
      clock.advance(NaN);

      expect(clock.getFrameIndex()).toBe(1);
      expect(clock.snapshot().playTime).toBeCloseTo(0.05, 12);
    });

    it('does not move while paused', () => {
      clock.togglePause();
      clock.advance(1);

      expect(clock.getFrameIndex()).toBe(0);
      expect(clock.isPaused()).toBe(true);
    });

    it('seeks to a clamped frame and syncs play time', () => {
      clock.seek(2.6);
      expect(clock.getFrameIndex()).toBe(3);
      expect(clock.snapshot().playTime).toBe(0.12);

      clock.seek(-5);
      expect(clock.getFrameIndex()).toBe(0);

      clock.seek(99);
      expect(clock.getFrameIndex()).toBe(3);
    });

    it('steps without touching the pause state', () => {
      clock.seek(3);
      clock.step(-1);

      expect(clock.getFrameIndex()).toBe(2);
      expect(clock.snapshot().playTime).toBe(0.08);
      expect(clock.isPaused()).toBe(false);
    });

    it('restarts paused at normal speed', () => {
      clock.setSpeed(4);
      clock.advance(0.05);
      clock.restart();

      expect(clock.snapshot()).toMatchObject({
        frameIndex: 0,
        playTime: 0,
        playbackSpeed: 1,
        paused: true,
      });
    });
  });

  it('handles repeated and missing timestamps', () => {
    clock.load([null, 1, 1, 2], { autoStart: true });
    clock.advance(0.5);

    expect(clock.snapshot().mode).toBe('time');
    expect(clock.getFrameIndex()).toBe(0);

    clock.advance(0.5);
    expect(clock.getFrameIndex()).toBe(3);
    expect(clock.isPaused()).toBe(true);
  });

  describe('runs of equal timestamps', () => {
    beforeEach(() => {
      clock.load([0, 0.04, 0.04, 0.08, 0.12], { autoStart: true });
    });

    it('leaves the state alone under zero elapsed time', () => {
      clock.seek(1);
      const before = clock.snapshot();

      expect(clock.advance(0)).toEqual(before);
      expect(clock.getFrameIndex()).toBe(1);
    });

    it('keeps a stepped frame until play time leaves the run', () => {
      clock.seek(2);
      clock.step(-1);
      clock.advance(0);
      expect(clock.getFrameIndex()).toBe(1);

      clock.advance(0.01);
      expect(clock.getFrameIndex()).toBe(1);

      clock.advance(0.035);
      expect(clock.getFrameIndex()).toBe(3);
    });

    it('still reaches and pauses on a repeated last timestamp', () => {
      clock.load([0, 1, 1], { autoStart: true });
      clock.seek(1);
      clock.advance(0);
      expect(clock.getFrameIndex()).toBe(1);
      expect(clock.isPaused()).toBe(false);

      clock.advance(0.5);
      expect(clock.getFrameIndex()).toBe(2);
      expect(clock.isPaused()).toBe(true);
    });
  });

  it('does not move under zero elapsed time in fps mode', () => {
    clock.load(new Array<null>(10).fill(null), { autoStart: true });
    clock.advance(0.02);
    const before = clock.getFrameIndex();

    clock.advance(0);
    expect(clock.getFrameIndex()).toBe(before);
  });

  describe('fps mode', () => {
    beforeEach(() => {
      clock.load(new Array<null>(100).fill(null), { autoStart: true });
    });

    it('steps at the fallback frame rate', () => {
      expect(clock.snapshot().mode).toBe('fps');

      clock.advance(0.2);
      expect(clock.getFrameIndex()).toBe(5);
    });

    it('carries fractional frames between ticks', () => {
      clock.advance(0.2);
      clock.advance(1 / 60);
      clock.advance(1 / 60);
      clock.advance(1 / 60);

      expect(clock.getFrameIndex()).toBe(6);
      expect(clock.snapshot().playTime).toBeCloseTo(0.25, 12);
    });

    it('seeks in frame time', () => {
      clock.seek(50);
      expect(clock.snapshot().playTime).toBe(2);
    });
  });

  describe('speed', () => {
    beforeEach(() => {
      clock.load([0, 1]);
    });

    it('doubles and halves within limits', () => {
      for (let i = 0; i < 7; i++) clock.speedUp();
      expect(clock.snapshot().playbackSpeed).toBe(128);

      clock.speedUp();
      clock.speedUp();
      expect(clock.snapshot().playbackSpeed).toBe(256);

      clock.setSpeed(1);
      for (let i = 0; i < 4; i++) clock.slowDown();
      expect(clock.snapshot().playbackSpeed).toBe(0.1);
    });

    it('clamps replaced values and ignores non-finite ones', () => {
      expect(clock.setSpeed(0)).toBe(0.1);
      expect(clock.setSpeed(2)).toBe(2);
      expect(clock.setSpeed(NaN)).toBe(2);
    });
  });

  it('stays paused when loaded empty', () => {
    clock.load([], { autoStart: true });
    clock.togglePause();
    clock.play();

    expect(clock.isPaused()).toBe(true);
    expect(clock.isComplete()).toBe(false);
    expect(clock.advance(1).frameIndex).toBe(0);
  });

  it('starts paused unless asked to auto-start', () => {
    const seen: boolean[] = [];
    clock.isPaused$.subscribe((p) => seen.push(p));

    clock.load([0, 1, 2]);
    clock.play();
    clock.pause();

    expect(seen).toEqual([true, false, true]);
  });
});
