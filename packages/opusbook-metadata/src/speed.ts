import { createLogger, type OpusbookLogger } from "@opusbook/common";

/** Lowest accepted speed change in percent; -100 would stop the audio. */
export const MIN_SPEED_PERCENT = -99;

const defaultLogger = createLogger("speed");

/**
 * Tempo multiplier for a signed speed change in percent (50 => 1.5).
 * The same factor scales the audio and every chapter timestamp.
 */
export function resolveSpeedFactor(speedPercent: number, logger: OpusbookLogger = defaultLogger): number {
  let speed = speedPercent;
  if (speed < MIN_SPEED_PERCENT) {
    logger.warn(`Invalid speed ${speedPercent}%: truncating to ${MIN_SPEED_PERCENT}%`);
    speed = MIN_SPEED_PERCENT;
  }
  return 1 + speed / 100;
}
