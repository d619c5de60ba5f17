import type { ContentItem, SceneDescriptor } from '../domain/types.js';
import type { ChatCompleter } from '../infra/openai/chatClient.js';
import { MalformedResponseError, UpstreamError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { err, ok, type Result } from '../utils/result.js';
import { stripCodeFences, truncate } from '../utils/text.js';

export type CaptionPosition = 'top' | 'bottom';

export type CaptionReply = {
  text: string;
  position: CaptionPosition;
  scene: string;
};

const FIELDS = ['TEXT', 'POSITION', 'SCENE'] as const;
type Field = (typeof FIELDS)[number];

/**
 * Strict parser for `TEXT: ... | POSITION: TOP|BOTTOM | SCENE: ...`.
 * Fields may be pipe-separated on one line or one per line. Every field must
 * appear exactly once and nothing else may appear.
 */
export function parseCaptionReply(raw: string): Result<CaptionReply, MalformedResponseError> {
  const body = stripCodeFences(String(raw ?? ''));
  if (!body) return err(new MalformedResponseError('empty reply', raw));

  const segments = body
    .split(/\r?\n|\|/)
    .map(s => s.trim())
    .filter(Boolean);

  const found = new Map<Field, string>();
  for (const seg of segments) {
    const m = seg.match(/^(TEXT|POSITION|SCENE)\s*:\s*(.*)$/i);
    if (!m) return err(new MalformedResponseError(`unexpected segment: ${truncate(seg, 60)}`, raw));
    const field = FIELDS.find(f => f === m[1].toUpperCase());
    if (!field) return err(new MalformedResponseError(`unknown field: ${m[1]}`, raw));
    if (found.has(field)) return err(new MalformedResponseError(`duplicate field: ${field}`, raw));
    found.set(field, m[2].trim());
  }

  for (const f of FIELDS) {
    if (!found.get(f)) return err(new MalformedResponseError(`missing field: ${f}`, raw));
  }

  const position = String(found.get('POSITION')).toUpperCase();
  if (position !== 'TOP' && position !== 'BOTTOM') {
    return err(new MalformedResponseError(`invalid POSITION: ${position}`, raw));
  }

  const reply: CaptionReply = {
    text: String(found.get('TEXT')),
    position: position === 'TOP' ? 'top' : 'bottom',
    scene: String(found.get('SCENE')),
  };
  return ok(reply);
}

export function buildCaptionPrompt(seed: ContentItem, scene: SceneDescriptor): { system: string; user: string } {
  const system = `You write one short motivational line for an image post on a page about hustle and discipline.
Blunt, confident, no hashtags, no emojis, no quotes around the line. At most 90 characters.
Reply with exactly one line in this format and nothing else:
TEXT: <the line> | POSITION: TOP or BOTTOM | SCENE: <one short visual detail to add to the background>`;

  const user = `Theme category: ${seed.category}
Reference line (write something new in the same spirit, do not copy it): ${seed.text}
Background scene: ${scene.description}${scene.details ? `, ${scene.details}` : ''}
POSITION is where the text should sit so it does not cover the character in the middle of the frame.`;

  return { system, user };
}

/** Asks the chat model for a fresh line. Transport and schema failures are both returned as errors. */
export async function writeCaption(
  complete: ChatCompleter,
  seed: ContentItem,
  scene: SceneDescriptor
): Promise<Result<CaptionReply, UpstreamError>> {
  const { system, user } = buildCaptionPrompt(seed, scene);

  let raw: string;
  try {
    raw = await complete({ system, user, temperature: 0.9, maxTokens: 120 });
  } catch (e) {
    return err(new UpstreamError('chat', `chat completion failed: ${errorMessage(e)}`, { cause: e }));
  }

  const parsed = parseCaptionReply(raw);
  if (!parsed.ok) {
    logger.warn('caption_reply_malformed', { reason: parsed.error.message, preview: truncate(raw, 120) });
    return parsed;
  }
  logger.info('caption_written', { chars: parsed.value.text.length, position: parsed.value.position });
  return parsed;
}
