/** Rendered width in pixels of `text` at `fontSize`. */
export type TextMeasurer = (text: string, fontSize: number) => number;

export type Rect = { left: number; top: number; width: number; height: number };

/** Reference width the typography constants are tuned for. */
export const REFERENCE_WIDTH = 1024;

export const TYPOGRAPHY = {
  shortTextMaxChars: 90,
  shortFontSize: 38,
  longFontSize: 34,
  minFontSize: 20,
  shrinkStep: 2,
  lineHeightRatio: 1.35,
  boxWidthRatio: 0.7,
  boxLines: 4,
  /** Upper "sky" and lower "body" zones; the subject sits in between. */
  candidateOffsets: [0.1, 0.75],
  padX: 20,
  padY: 10,
  darkThreshold: 130,
  watermarkFontSize: 26,
  watermarkBottomOffset: 58,
  watermarkAlpha: 130 / 255,
} as const;

/** Centered 4:5 crop, trimming equal margins from whichever side is too long. */
export function cropTo4x5(width: number, height: number): Rect {
  const targetHeight = Math.floor((width * 5) / 4);
  if (targetHeight <= height) {
    return { left: 0, top: Math.floor((height - targetHeight) / 2), width, height: targetHeight };
  }
  const targetWidth = Math.floor((height * 4) / 5);
  return { left: Math.floor((width - targetWidth) / 2), top: 0, width: targetWidth, height };
}

export function scaleFor(width: number): number {
  return width / REFERENCE_WIDTH;
}

export function baseFontSize(text: string, scale = 1): number {
  const size = text.length <= TYPOGRAPHY.shortTextMaxChars ? TYPOGRAPHY.shortFontSize : TYPOGRAPHY.longFontSize;
  return Math.max(1, Math.round(size * scale));
}

export function lineHeightFor(fontSize: number): number {
  return Math.round(fontSize * TYPOGRAPHY.lineHeightRatio);
}

/**
 * Greedy word wrap: keep adding words while the line fits `maxWidth`.
 * No hyphenation; a single word wider than the box gets a line to itself.
 */
export function wrapWords(text: string, maxWidth: number, fontSize: number, measure: TextMeasurer): string[] {
  const words = text.split(/\s+/).filter(Boolean);
  const lines: string[] = [];
  let current = '';

  for (const w of words) {
    const candidate = current ? `${current} ${w}` : w;
    if (!current || measure(candidate, fontSize) <= maxWidth) {
      current = candidate;
    } else {
      lines.push(current);
      current = w;
    }
  }
  if (current) lines.push(current);
  return lines;
}

export type FittedText = {
  fontSize: number;
  lineHeight: number;
  lines: string[];
  widths: number[];
  /** True when the minimum size still overflows the box; no words are dropped either way. */
  overflow: boolean;
};

/**
 * Wraps at the base size and shrinks in steps until the block fits the box
 * (height and width), stopping at the minimum size.
 */
export function fitText(
  text: string,
  box: { width: number; height: number },
  sizes: { base: number; min: number; step: number },
  measure: TextMeasurer
): FittedText {
  const min = Math.min(sizes.base, sizes.min);
  const step = Math.max(1, sizes.step);
  let size = sizes.base;

  for (;;) {
    const lines = wrapWords(text, box.width, size, measure);
    const widths = lines.map(l => measure(l, size));
    const lineHeight = lineHeightFor(size);
    const fits = lines.length * lineHeight <= box.height && widths.every(w => w <= box.width);
    if (fits || size <= min) {
      return { fontSize: size, lineHeight, lines, widths, overflow: !fits };
    }
    size = Math.max(min, size - step);
  }
}

/** Top edge for each candidate zone, clamped so the box stays inside the image. */
export function candidateTops(imageHeight: number, boxHeight: number): number[] {
  const maxTop = Math.max(0, imageHeight - boxHeight);
  return TYPOGRAPHY.candidateOffsets.map(f => Math.min(maxTop, Math.max(0, Math.floor(imageHeight * f))));
}

/** Index of the lowest score; ties keep the earlier candidate. */
export function pickFlattest(scores: readonly number[]): number {
  let best = 0;
  for (let i = 1; i < scores.length; i++) {
    if (scores[i] < scores[best]) best = i;
  }
  return best;
}

export type Palette = {
  text: string;
  highlight: string;
  tone: 'light-on-dark' | 'dark-on-light';
};

/** Light text on a dark highlight over dark regions, and the reverse over bright ones. */
export function paletteFor(meanLuminance: number): Palette {
  if (meanLuminance < TYPOGRAPHY.darkThreshold) {
    return { text: 'rgba(255,255,255,1)', highlight: 'rgba(0,0,0,0.9)', tone: 'light-on-dark' };
  }
  return { text: 'rgba(17,17,17,1)', highlight: 'rgba(255,255,255,0.9)', tone: 'dark-on-light' };
}

export type PlacedLine = {
  text: string;
  /** Top-left of the glyph run (textBaseline = top). */
  x: number;
  y: number;
  width: number;
  highlight: Rect;
};

/** Centers each line horizontally and the whole block vertically inside the box. */
export function placeLines(
  fitted: FittedText,
  box: Rect,
  imageWidth: number,
  pad: { x: number; y: number }
): PlacedLine[] {
  let y = box.top + Math.floor((box.height - fitted.lines.length * fitted.lineHeight) / 2);
  return fitted.lines.map((text, i) => {
    const width = fitted.widths[i] ?? 0;
    const x = Math.floor((imageWidth - width) / 2);
    const glyphTop = y + Math.floor((fitted.lineHeight - fitted.fontSize) / 2);
    const placed: PlacedLine = {
      text,
      x,
      y: glyphTop,
      width,
      highlight: {
        left: x - pad.x,
        top: glyphTop - pad.y,
        width: width + 2 * pad.x,
        height: fitted.fontSize + 2 * pad.y,
      },
    };
    y += fitted.lineHeight;
    return placed;
  });
}
