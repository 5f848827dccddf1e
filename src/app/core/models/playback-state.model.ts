/** `time` resolves frames from timestamps, `fps` steps at a fixed rate. */
export type PlaybackMode = 'time' | 'fps';

export interface PlaybackState {
  frameIndex: number;
  frameCount: number;
  playTime: number;
  playbackSpeed: number;
  paused: boolean;
  mode: PlaybackMode;
}

export type SpeedChange = 'replace' | 'multiply';
