import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';

const repoRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', '..');

export const IMAGE_SIZES = ['1024x1024', '1024x1536', '1536x1024'] as const;
export type ImageSize = (typeof IMAGE_SIZES)[number];

export type CaptionMode = 'bank' | 'ai';

/** Local hour range, start inclusive, end exclusive. start > end wraps midnight. */
export type PostWindow = { startHour: number; endHour: number };

export type BotConfig = {
  openaiApiKey: string;
  openaiBaseUrl: string;
  openaiImageModel: string;
  openaiImageSize: ImageSize;
  openaiChatModel: string;
  openaiTimeoutMs: number;

  fbPageAccessToken: string;
  fbPageId: string;
  fbGraphBaseUrl: string;
  fbGraphVersion: string;
  fbPublish: boolean;
  fbCaption: string;

  timezone: string;
  dryRun: boolean;
  /** Bypasses the time-window and daily-marker gates only. */
  forcePost: boolean;
  postWindows: PostWindow[];
  maxMonthlyImages: number;
  thoughtCooldownDays: number;
  sceneCooldownDays: number;

  stateDir: string;
  contentDir: string;
  fontPath: string;
  watermarkText: string;
  captionMode: CaptionMode;
};

function isTruthy(v: string | undefined): boolean {
  const s = String(v ?? '').trim().toLowerCase();
  return s === '1' || s === 'true' || s === 'yes';
}

const intFromEnv = (label: string, min: number) =>
  z
    .string()
    .trim()
    .regex(/^\d+$/, `${label} must be a non-negative integer`)
    .transform(Number)
    .pipe(z.number().int().min(min, `${label} must be >= ${min}`));

const HourRangeSchema = z
  .string()
  .trim()
  .regex(/^\d{1,2}-\d{1,2}$/, 'expected START-END hours, e.g. 13-15')
  .transform(s => {
    const [a, b] = s.split('-');
    return { startHour: Number(a), endHour: Number(b) };
  })
  .refine(w => w.startHour >= 0 && w.startHour <= 23 && w.endHour >= 0 && w.endHour <= 24, 'hours must be in 0..24')
  .refine(w => w.startHour !== w.endHour, 'empty window');

export function parsePostWindows(raw: string): PostWindow[] {
  const parts = raw
    .split(',')
    .map(s => s.trim())
    .filter(Boolean);
  if (parts.length === 0) throw new ConfigError('POST_WINDOWS must name at least one hour range');

  return parts.map(p => {
    const parsed = HourRangeSchema.safeParse(p);
    if (!parsed.success) {
      throw new ConfigError(`Invalid POST_WINDOWS entry "${p}": ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    return parsed.data;
  });
}

function readInt(env: NodeJS.ProcessEnv, key: string, fallback: number, min: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = intFromEnv(key, min).safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues[0]?.message ?? `${key} is invalid`);
  }
  return parsed.data;
}

function isValidTimeZone(tz: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}

/**
 * Builds the configuration once at process start. Callers pass the result down explicitly.
 * Credentials are only required outside dry-run mode.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): BotConfig {
  const dryRun = isTruthy(env.DRY_RUN);

  const imageSize = (env.OPENAI_IMAGE_SIZE || '1024x1536').trim();
  const sizeParsed = z.enum(IMAGE_SIZES).safeParse(imageSize);
  if (!sizeParsed.success) {
    throw new ConfigError(`OPENAI_IMAGE_SIZE must be one of ${IMAGE_SIZES.join(', ')} (got ${imageSize})`);
  }

  const timezone = (env.TIMEZONE || 'Asia/Manila').trim();
  if (!isValidTimeZone(timezone)) {
    throw new ConfigError(`TIMEZONE is not a valid IANA zone: ${timezone}`);
  }

  const captionRaw = (env.CAPTION_MODE || 'bank').trim().toLowerCase();
  const captionParsed = z.enum(['bank', 'ai']).safeParse(captionRaw);
  if (!captionParsed.success) {
    throw new ConfigError(`CAPTION_MODE must be "bank" or "ai" (got ${captionRaw})`);
  }

  const config: BotConfig = {
    openaiApiKey: (env.OPENAI_API_KEY || '').trim(),
    openaiBaseUrl: (env.OPENAI_BASE_URL || 'https://api.openai.com/v1').trim(),
    openaiImageModel: (env.OPENAI_IMAGE_MODEL || 'gpt-image-1').trim(),
    openaiImageSize: sizeParsed.data,
    openaiChatModel: (env.OPENAI_CHAT_MODEL || 'gpt-4o-mini').trim(),
    openaiTimeoutMs: readInt(env, 'OPENAI_TIMEOUT_MS', 120_000, 1),

    fbPageAccessToken: (env.FB_PAGE_ACCESS_TOKEN || '').trim(),
    fbPageId: (env.FB_PAGE_ID || '').trim(),
    fbGraphBaseUrl: (env.FB_GRAPH_BASE_URL || 'https://graph.facebook.com').trim(),
    fbGraphVersion: (env.FB_GRAPH_VERSION || 'v19.0').trim(),
    // Default: publish immediately. FB_PUBLISH=0 leaves the photo unpublished.
    fbPublish: env.FB_PUBLISH === undefined || env.FB_PUBLISH.trim() === '' ? true : isTruthy(env.FB_PUBLISH),
    fbCaption: (env.FB_CAPTION || '').trim(),

    timezone,
    dryRun,
    forcePost: isTruthy(env.FORCE_POST),
    postWindows: parsePostWindows(env.POST_WINDOWS || '13-15'),
    maxMonthlyImages: readInt(env, 'MAX_MONTHLY_IMAGES', 30, 0),
    thoughtCooldownDays: readInt(env, 'THOUGHT_COOLDOWN_DAYS', 35, 0),
    sceneCooldownDays: readInt(env, 'SCENE_COOLDOWN_DAYS', 5, 0),

    stateDir: path.resolve(env.STATE_DIR || 'state'),
    contentDir: path.resolve(env.CONTENT_DIR || path.join(repoRoot, 'content')),
    fontPath: path.resolve(env.FONT_PATH || path.join(repoRoot, 'fonts', 'LibreBaskerville-Regular.ttf')),
    watermarkText: env.WATERMARK_TEXT || '© grindpost',
    captionMode: captionParsed.data,
  };

  if (!dryRun) {
    if (!config.openaiApiKey) throw new ConfigError('OPENAI_API_KEY missing');
    if (!config.fbPageAccessToken || !config.fbPageId) {
      throw new ConfigError('Facebook secrets missing (FB_PAGE_ACCESS_TOKEN, FB_PAGE_ID)');
    }
  }

  return Object.freeze(config);
}
