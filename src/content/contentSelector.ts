import type { ContentBank, ContentItem, CooldownRecord, SceneDescriptor, Selection, StateSnapshot } from '../domain/types.js';
import { daysBetweenYmd, getLocalParts, getLocalYMD } from '../utils/time.js';
import { logger } from '../utils/logger.js';
import { holidayKey } from './contentBank.js';

/** Uniform source in [0, 1). */
export type Rng = () => number;

export type SelectOptions = {
  timezone: string;
  thoughtCooldownDays: number;
  sceneCooldownDays: number;
  rng?: Rng;
};

export function pickOne<T>(items: readonly T[], rng: Rng): T {
  if (items.length === 0) throw new Error('pickOne called with an empty list');
  return items[Math.min(items.length - 1, Math.floor(rng() * items.length))];
}

/** Never used, malformed date, or last use at least `cooldownDays` ago. */
export function isOffCooldown(history: CooldownRecord, key: string, todayYmd: string, cooldownDays: number): boolean {
  const lastUsed = history[key];
  if (!lastUsed) return true;
  const age = daysBetweenYmd(lastUsed, todayYmd);
  if (age === null) return true;
  return age >= cooldownDays;
}

/** Eligible subset, or the whole list when everything is cooling down. */
function eligibleOrAll<T>(items: readonly T[], keep: (item: T) => boolean): { pool: readonly T[]; fallback: boolean } {
  const eligible = items.filter(keep);
  return eligible.length > 0 ? { pool: eligible, fallback: false } : { pool: items, fallback: true };
}

export function holidaySceneName(holidayName: string): string {
  return `holiday_${holidayName}`;
}

/**
 * Today's holiday, unless this year's ledger already has it.
 */
export function findHoliday(now: Date, state: StateSnapshot, bank: ContentBank, timezone: string): Selection | null {
  const { year, month, day } = getLocalParts(now, timezone);
  const holiday = bank.holidays[holidayKey(month, day)];
  if (!holiday) return null;

  const used = state.holidayLedger[String(year)] ?? [];
  if (used.includes(holiday.name)) {
    logger.info('holiday_already_posted', { holiday: holiday.name, year });
    return null;
  }

  return {
    holiday,
    item: { category: 'holiday', text: holiday.text },
    scene: { name: holidaySceneName(holiday.name), description: holiday.scene, details: '' },
  };
}

/**
 * Picks a (scene, line) pair. Holiday first, then cooldown-filtered bank with
 * the month's seasonal categories preferred. Always returns a pair; an
 * exhausted bank falls back to the full list instead of failing.
 */
export function selectContent(now: Date, state: StateSnapshot, bank: ContentBank, opts: SelectOptions): Selection {
  const rng = opts.rng ?? Math.random;

  const holiday = findHoliday(now, state, bank, opts.timezone);
  if (holiday) return holiday;

  const today = getLocalYMD(now, opts.timezone);

  const content = eligibleOrAll<ContentItem>(bank.thoughts, t =>
    isOffCooldown(state.thoughtHistory, t.text, today, opts.thoughtCooldownDays)
  );
  const scenes = eligibleOrAll<SceneDescriptor>(bank.scenes, s =>
    isOffCooldown(state.sceneHistory, s.name, today, opts.sceneCooldownDays)
  );
  if (content.fallback) logger.warn('content_all_on_cooldown', { bank: bank.thoughts.length });
  if (scenes.fallback) logger.info('scenes_all_on_cooldown', { scenes: bank.scenes.length });

  const month = today.slice(5, 7);
  const preferred = bank.seasonal[month] ?? [];
  let pool = content.pool;
  // An exhausted bank is drawn from uniformly, with no seasonal weighting.
  if (preferred.length > 0 && !content.fallback) {
    const seasonal = content.pool.filter(t => t.category !== 'holiday' && preferred.includes(t.category));
    if (seasonal.length > 0) {
      pool = seasonal;
      logger.info('seasonal_preference_applied', { month, categories: preferred, pool: seasonal.length });
    }
  }

  return {
    item: pickOne(pool, rng),
    scene: pickOne(scenes.pool, rng),
  };
}
