/** DRS channel values meaning the flap is open (or opening). */
export const DRS_ACTIVE_CODES: ReadonlySet<number> = new Set([10, 12, 14]);

/** Sample rate of the replay frame stream. */
export const DEFAULT_FPS = 25;
