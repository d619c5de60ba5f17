import sharp from 'sharp';
import type { ImageSize } from '../../config/index.js';
import { UpstreamError, errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { err, ok, type Result } from '../../utils/result.js';

export type GeneratedImage = {
  bytes: Buffer;
  mimeType: string;
};

export interface ImageSource {
  generate(prompt: string): Promise<Result<GeneratedImage, UpstreamError>>;
}

export type FetchLike = typeof fetch;

export type OpenAiImageOptions = {
  apiKey: string;
  baseUrl: string;
  model: string;
  size: ImageSize;
  timeoutMs: number;
  fetchImpl?: FetchLike;
  /** Delay hook for 429 backoff. */
  sleep?: (ms: number) => Promise<void>;
  maxAttempts?: number;
};

type ImagesResponse = {
  data?: Array<{ b64_json?: unknown; url?: unknown; image_url?: unknown }>;
};

function isImagesResponse(v: unknown): v is ImagesResponse {
  if (typeof v !== 'object' || v === null) return false;
  const data: unknown = Reflect.get(v, 'data');
  return data === undefined || Array.isArray(data);
}

function dataUrlToImage(dataUrl: string): GeneratedImage {
  const m = dataUrl.match(/^data:([^;]+);base64,(.+)$/);
  if (!m) throw new Error('Invalid data URL');
  return { bytes: Buffer.from(m[2] || '', 'base64'), mimeType: m[1] || 'application/octet-stream' };
}

function parseRetryAfterMs(v: string | null): number | undefined {
  if (!v) return undefined;
  const s = v.trim();
  // seconds
  if (/^\d+$/.test(s)) return Number(s) * 1000;
  // HTTP date
  const t = Date.parse(s);
  if (!Number.isNaN(t)) return Math.max(0, t - Date.now());
  return undefined;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise(r => setTimeout(r, ms));
}

function jitter(ms: number): number {
  return ms + Math.floor(Math.random() * 250);
}

/** OpenAI-compatible `/images/generations`. Accepts b64_json, a download URL, or a data URL. */
export class OpenAiImageGenerator implements ImageSource {
  private readonly fetchImpl: FetchLike;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly opts: OpenAiImageOptions) {
    this.fetchImpl = opts.fetchImpl ?? fetch;
    this.sleep = opts.sleep ?? defaultSleep;
  }

  private async fetchBytes(url: string): Promise<GeneratedImage> {
    const ac = new AbortController();
    const timeout = setTimeout(() => ac.abort(), Math.min(30_000, this.opts.timeoutMs));
    try {
      const res = await this.fetchImpl(url, { method: 'GET', signal: ac.signal });
      if (!res.ok) {
        throw new UpstreamError('image', `image download failed (${res.status})`, { status: res.status });
      }
      const ab = await res.arrayBuffer();
      return { bytes: Buffer.from(ab), mimeType: res.headers.get('content-type') || 'image/png' };
    } finally {
      clearTimeout(timeout);
    }
  }

  private async generateOnce(prompt: string): Promise<GeneratedImage> {
    const url = `${this.opts.baseUrl.replace(/\/+$/, '')}/images/generations`;
    const ac = new AbortController();
    const timeout = setTimeout(() => ac.abort(), this.opts.timeoutMs);

    try {
      const res = await this.fetchImpl(url, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.opts.apiKey}`,
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        body: JSON.stringify({
          model: this.opts.model,
          prompt,
          size: this.opts.size,
          n: 1,
        }),
        signal: ac.signal,
      });

      const json: unknown = await res.json().catch(() => ({}));
      if (!res.ok) {
        throw new UpstreamError('image', `image generation failed (${res.status})`, {
          status: res.status,
          body: JSON.stringify(json).slice(0, 300),
          retryAfterMs: parseRetryAfterMs(res.headers.get('retry-after')),
        });
      }

      const first = isImagesResponse(json) ? json.data?.[0] : undefined;
      if (typeof first?.b64_json === 'string' && first.b64_json.length > 0) {
        return { bytes: Buffer.from(first.b64_json, 'base64'), mimeType: 'image/png' };
      }
      if (typeof first?.url === 'string' && first.url.length > 0) {
        return await this.fetchBytes(first.url);
      }
      if (typeof first?.image_url === 'string' && first.image_url.startsWith('data:')) {
        return dataUrlToImage(first.image_url);
      }

      throw new UpstreamError('image', 'image generation returned no image', { body: JSON.stringify(json).slice(0, 300) });
    } finally {
      clearTimeout(timeout);
    }
  }

  async generate(prompt: string): Promise<Result<GeneratedImage, UpstreamError>> {
    const p = prompt.trim();
    if (!p) return err(new UpstreamError('image', 'image prompt is empty'));

    const maxAttempts = this.opts.maxAttempts ?? 5;
    let lastErr: UpstreamError | undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        const img = await this.generateOnce(p);
        if (img.bytes.length === 0) throw new UpstreamError('image', 'image payload is empty');
        logger.info('image_generated', { bytes: img.bytes.length, mimeType: img.mimeType, attempt });
        return ok(img);
      } catch (e) {
        lastErr = e instanceof UpstreamError ? e : new UpstreamError('image', errorMessage(e), { cause: e });
        if (lastErr.status !== 429 || attempt === maxAttempts) break;

        const base = Math.min(30_000, 1000 * 2 ** (attempt - 1)); // 1s,2s,4s,8s,16s (capped)
        const delay = jitter(lastErr.retryAfterMs ?? base);
        logger.warn('image_rate_limited', { attempt, maxAttempts, delayMs: delay });
        await this.sleep(delay);
      }
    }

    return err(lastErr ?? new UpstreamError('image', 'image generation failed'));
  }
}

/** Dry-run stand-in: a solid dark-grey portrait JPEG, no network. */
export class SyntheticImageSource implements ImageSource {
  constructor(private readonly size: { width: number; height: number } = { width: 1024, height: 1536 }) {}

  async generate(prompt: string): Promise<Result<GeneratedImage, UpstreamError>> {
    logger.info('image_dry_run', { promptChars: prompt.length, preview: prompt.slice(0, 150) });
    const bytes = await sharp({
      create: { width: this.size.width, height: this.size.height, channels: 3, background: { r: 50, g: 50, b: 50 } },
    })
      .jpeg()
      .toBuffer();
    return ok({ bytes, mimeType: 'image/jpeg' });
  }
}
