import { createCanvas } from '@napi-rs/canvas';
import sharp from 'sharp';
import { logger } from '../utils/logger.js';
import { OVERLAY_FONT_FAMILY } from './fonts.js';
import {
  TYPOGRAPHY,
  baseFontSize,
  candidateTops,
  cropTo4x5,
  fitText,
  lineHeightFor,
  paletteFor,
  pickFlattest,
  placeLines,
  scaleFor,
  type Palette,
  type PlacedLine,
  type Rect,
  type TextMeasurer,
} from './layout.js';
import { regionLuminance, type LuminanceStats } from './regionStats.js';

export type TextPosition = 'top' | 'bottom';

export type CompositeOptions = {
  /** Pins the text to the upper or lower zone instead of scoring both. */
  position?: TextPosition;
};

export type TextLayout = {
  width: number;
  height: number;
  box: Rect;
  candidates: number[];
  scores: number[];
  chosen: number;
  fontSize: number;
  lineHeight: number;
  lines: PlacedLine[];
  overflow: boolean;
  palette: Palette;
  region: LuminanceStats;
};

export type CompositeResult = {
  image: Buffer;
  layout: TextLayout;
};

export interface TextCompositor {
  composite(rawImage: Buffer, text: string, opts?: CompositeOptions): Promise<CompositeResult>;
}

export type CompositorOptions = {
  watermarkText: string;
  fontFamily?: string;
  /** Overrides canvas text measurement (layout is computed from this). */
  measure?: TextMeasurer;
};

function fontSpec(size: number, family: string): string {
  return `${size}px "${family}"`;
}

export function createCanvasMeasurer(family: string): TextMeasurer {
  const ctx = createCanvas(1, 1).getContext('2d');
  return (text, fontSize) => {
    ctx.font = fontSpec(fontSize, family);
    return ctx.measureText(text).width;
  };
}

/**
 * Adaptive text overlay: crop to 4:5, score the candidate zones for flatness,
 * wrap and shrink the line to fit, pick a palette from the zone's brightness,
 * then stamp highlights, text and the watermark and encode JPEG q95.
 */
export class TypographyCompositor implements TextCompositor {
  private readonly family: string;
  private readonly measure: TextMeasurer;

  constructor(private readonly opts: CompositorOptions) {
    this.family = opts.fontFamily ?? OVERLAY_FONT_FAMILY;
    this.measure = opts.measure ?? createCanvasMeasurer(this.family);
  }

  async layout(cropped: Buffer, width: number, height: number, text: string, opts?: CompositeOptions): Promise<TextLayout> {
    const scale = scaleFor(width);
    const base = baseFontSize(text, scale);
    const baseLineHeight = lineHeightFor(base);

    const boxWidth = Math.floor(width * TYPOGRAPHY.boxWidthRatio);
    const boxHeight = Math.min(height, baseLineHeight * TYPOGRAPHY.boxLines);
    const boxLeft = Math.floor((width - boxWidth) / 2);

    const candidates = candidateTops(height, boxHeight);
    const regions = await Promise.all(
      candidates.map(top => regionLuminance(cropped, { left: boxLeft, top, width: boxWidth, height: boxHeight }))
    );
    const scores = regions.map(r => r.stdev);

    let chosen = pickFlattest(scores);
    if (opts?.position) chosen = opts.position === 'top' ? 0 : candidates.length - 1;
    const region = regions[chosen] ?? { mean: 0, stdev: 0 };
    const box: Rect = { left: boxLeft, top: candidates[chosen] ?? 0, width: boxWidth, height: boxHeight };

    const fitted = fitText(
      text,
      { width: boxWidth, height: boxHeight },
      { base, min: Math.max(1, Math.round(TYPOGRAPHY.minFontSize * scale)), step: TYPOGRAPHY.shrinkStep },
      this.measure
    );
    if (fitted.overflow) {
      logger.warn('text_overflows_box', { fontSize: fitted.fontSize, lines: fitted.lines.length });
    }

    const pad = { x: Math.round(TYPOGRAPHY.padX * scale), y: Math.round(TYPOGRAPHY.padY * scale) };
    return {
      width,
      height,
      box,
      candidates,
      scores,
      chosen,
      fontSize: fitted.fontSize,
      lineHeight: fitted.lineHeight,
      lines: placeLines(fitted, box, width, pad),
      overflow: fitted.overflow,
      palette: paletteFor(region.mean),
      region,
    };
  }

  private renderOverlay(layout: TextLayout): Buffer {
    const { width, height } = layout;
    const canvas = createCanvas(width, height);
    const ctx = canvas.getContext('2d');
    ctx.textBaseline = 'top';

    ctx.font = fontSpec(layout.fontSize, this.family);
    for (const line of layout.lines) {
      const h = line.highlight;
      ctx.fillStyle = layout.palette.highlight;
      ctx.fillRect(h.left, h.top, h.width, h.height);
      ctx.fillStyle = layout.palette.text;
      ctx.fillText(line.text, line.x, line.y);
    }

    const scale = scaleFor(width);
    const markSize = Math.max(1, Math.round(TYPOGRAPHY.watermarkFontSize * scale));
    const mark = this.opts.watermarkText;
    if (mark) {
      const markWidth = this.measure(mark, markSize);
      ctx.font = fontSpec(markSize, this.family);
      ctx.fillStyle = `rgba(255,255,255,${TYPOGRAPHY.watermarkAlpha.toFixed(3)})`;
      ctx.fillText(
        mark,
        Math.floor((width - markWidth) / 2),
        height - Math.round(TYPOGRAPHY.watermarkBottomOffset * scale)
      );
    }

    return canvas.toBuffer('image/png');
  }

  async composite(rawImage: Buffer, text: string, opts?: CompositeOptions): Promise<CompositeResult> {
    const meta = await sharp(rawImage).metadata();
    if (!meta.width || !meta.height) throw new Error('image has no dimensions');

    const crop = cropTo4x5(meta.width, meta.height);
    const cropped = await sharp(rawImage).extract(crop).png().toBuffer();

    const layout = await this.layout(cropped, crop.width, crop.height, text, opts);
    logger.info('text_layout', {
      size: `${crop.width}x${crop.height}`,
      chosenTop: layout.box.top,
      scores: layout.scores.map(s => Number(s.toFixed(2))),
      fontSize: layout.fontSize,
      lines: layout.lines.length,
      tone: layout.palette.tone,
    });

    const image = await sharp(cropped)
      .composite([{ input: this.renderOverlay(layout), top: 0, left: 0 }])
      .flatten({ background: { r: 0, g: 0, b: 0 } })
      .jpeg({ quality: 95 })
      .toBuffer();

    return { image, layout };
  }
}
