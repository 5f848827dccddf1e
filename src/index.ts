export * from './app/core/config/replay-config';
export * from './app/core/constants/telemetry.constants';
export * from './app/core/constants/track-status.types';
export * from './app/core/errors/replay-errors';
export * from './app/core/errors/result';
export type * from './app/core/models/playback-state.model';
export type * from './app/core/models/race-telemetry.model';
export type * from './app/core/models/track-data.model';
export type * from './app/core/models/track-status.model';
export type * from './app/core/models/viewport.model';
export * from './app/core/services/event-extractor.service';
export * from './app/core/services/playback-clock.service';
export * from './app/core/services/replay-session.service';
export * from './app/core/services/telemetry-load-gate.service';
export * from './app/core/services/track-geometry.service';
export * from './app/core/services/viewport-projector.service';
export * from './app/core/utils/curve-interpolation';
export * from './app/core/utils/field-resolver';
export * from './app/core/utils/timeline-scale';
