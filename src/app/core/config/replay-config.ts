import { z } from 'zod';
import { ConfigError } from '../errors/replay-errors';
import { DEFAULT_FPS } from '../constants/telemetry.constants';

export const replayConfigSchema = z
  .object({
    // Geometry
    trackWidth: z.number().positive().default(200),
    boundaryResolution: z.number().int().min(2).default(2000),
    referenceResolution: z.number().int().min(2).default(4000),

    // Viewport
    padding: z.number().min(0).lt(0.5).default(0.05),
    leftMargin: z.number().min(0).default(340),
    rightMargin: z.number().min(0).default(0),
    rotationDeg: z.number().finite().default(0),

    // Playback
    fps: z.number().positive().default(DEFAULT_FPS),
    minSpeed: z.number().positive().default(0.1),
    maxSpeed: z.number().positive().default(256),
    stepFrames: z.number().int().positive().default(10),
    autoStartCached: z.boolean().default(true),

    // Timeline events
    dropoutStride: z.number().int().positive().default(25),
    statusSampleRate: z.number().positive().default(DEFAULT_FPS),
    openStatusDurationSeconds: z.number().positive().default(10),
  })
  .refine((c) => c.maxSpeed >= c.minSpeed, {
    message: 'maxSpeed must not be below minSpeed',
    path: ['maxSpeed'],
  });

export type ReplayConfig = z.infer<typeof replayConfigSchema>;
export type ReplayConfigInput = z.input<typeof replayConfigSchema>;

export function parseReplayConfig(input: ReplayConfigInput = {}): ReplayConfig {
  const parsed = replayConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.errors.map((e) => ({
      field: e.path.join('.'),
      message: e.message,
    }));
    throw new ConfigError(
      `Invalid replay config: ${issues.map((i) => `${i.field} ${i.message}`).join('; ')}`,
      issues,
    );
  }
  return parsed.data;
}
