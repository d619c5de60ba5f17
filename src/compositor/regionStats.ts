import sharp from 'sharp';
import type { Rect } from './layout.js';

export type LuminanceStats = {
  mean: number;
  /** Flatness score: lower is calmer. */
  stdev: number;
};

/**
 * Mean and standard deviation of luma (0..255) inside `region`.
 * `stats()` reads the pipeline input, so the crop is rendered to its own buffer first.
 */
export async function regionLuminance(image: Buffer, region: Rect): Promise<LuminanceStats> {
  const cropped = await sharp(image)
    .extract({
      left: Math.max(0, Math.round(region.left)),
      top: Math.max(0, Math.round(region.top)),
      width: Math.max(1, Math.round(region.width)),
      height: Math.max(1, Math.round(region.height)),
    })
    .greyscale()
    .png()
    .toBuffer();
  const stats = await sharp(cropped).stats();

  const luma = stats.channels[0];
  if (!luma) throw new Error('region stats returned no channels');
  return { mean: luma.mean, stdev: luma.stdev };
}
