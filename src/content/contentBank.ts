import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { THOUGHT_CATEGORIES, type ContentBank, type ContentItem } from '../domain/types.js';
import { ConfigError } from '../utils/errors.js';

const CategorySchema = z.enum(THOUGHT_CATEGORIES);

const ThoughtsFileSchema = z.record(CategorySchema, z.array(z.string().trim().min(1)));

const ScenesFileSchema = z
  .array(
    z.object({
      name: z.string().trim().min(1),
      description: z.string().trim().min(1),
      details: z.string().trim(),
    })
  )
  .min(1)
  .refine(scenes => new Set(scenes.map(s => s.name)).size === scenes.length, 'scene names must be unique');

const HolidaysFileSchema = z.record(
  z.string().regex(/^(0[1-9]|1[0-2])-(0[1-9]|[12]\d|3[01])$/, 'holiday keys are MM-DD'),
  z.object({
    name: z.string().trim().min(1),
    text: z.string().trim().min(1),
    scene: z.string().trim().min(1),
  })
);

const SeasonalFileSchema = z.record(z.string().regex(/^(0[1-9]|1[0-2])$/, 'seasonal keys are MM'), z.array(CategorySchema));

async function readJsonFile<T>(file: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
  let raw: string;
  try {
    raw = await fs.readFile(file, 'utf8');
  } catch (err) {
    throw new ConfigError(`Content file missing or unreadable: ${file} (${String(err)})`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Content file is not valid JSON: ${file} (${String(err)})`);
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`Content file ${file} is invalid at ${issue?.path.join('.') || '(root)'}: ${issue?.message ?? ''}`);
  }
  return parsed.data;
}

/**
 * Loads thoughts.json, scenes.json, holidays.json and seasonal.json from `dir`.
 * Duplicate thought texts collapse to the first occurrence (text is the identity).
 */
export async function loadContentBank(dir: string): Promise<ContentBank> {
  const [thoughtsFile, scenes, holidays, seasonal] = await Promise.all([
    readJsonFile(path.join(dir, 'thoughts.json'), ThoughtsFileSchema),
    readJsonFile(path.join(dir, 'scenes.json'), ScenesFileSchema),
    readJsonFile(path.join(dir, 'holidays.json'), HolidaysFileSchema),
    readJsonFile(path.join(dir, 'seasonal.json'), SeasonalFileSchema),
  ]);

  const seen = new Set<string>();
  const thoughts: ContentItem[] = [];
  for (const category of THOUGHT_CATEGORIES) {
    for (const text of thoughtsFile[category] ?? []) {
      if (seen.has(text)) continue;
      seen.add(text);
      thoughts.push({ category, text });
    }
  }
  if (thoughts.length === 0) throw new ConfigError(`No thoughts configured in ${dir}`);

  return { thoughts, scenes, holidays, seasonal };
}

/** "MM-DD" key for the holiday calendar. */
export function holidayKey(month: number, day: number): string {
  return `${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}
