import { existsSync } from 'node:fs';
import { GlobalFonts } from '@napi-rs/canvas';
import { ConfigError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/** Family name the overlay draws with once the configured font file is registered. */
export const OVERLAY_FONT_FAMILY = 'GrindpostSerif';

/** Must run before any paid API call: a missing font is a configuration error. */
export function registerFonts(fontPath: string): void {
  if (!existsSync(fontPath)) {
    throw new ConfigError(`Missing font file: ${fontPath}`);
  }
  const registered = GlobalFonts.registerFromPath(fontPath, OVERLAY_FONT_FAMILY);
  if (!registered) {
    throw new ConfigError(`Font file could not be loaded: ${fontPath}`);
  }
  logger.info('font_registered', { family: OVERLAY_FONT_FAMILY, fontPath });
}
