import type { PostWindow } from '../config/index.js';
import type { StateSnapshot } from '../domain/types.js';
import type { PagePublisher } from '../infra/facebook/pagePublisher.js';
import type { StateStore } from '../state/stateStore.js';
import { describeUpstream } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { getLocalHMS, getLocalMonthKey, getLocalParts, getLocalYMD, isHourInRange } from '../utils/time.js';

export type DenyReason =
  | 'disabled'
  | 'outside_window'
  | 'already_posted_today'
  | 'monthly_cap_reached'
  | 'health_check_failed';

export type GateDecision = { allowed: true } | { allowed: false; reason: DenyReason };

export type GateOptions = {
  /** Skips the window and daily-marker checks. The kill switch and the cap still apply. */
  force: boolean;
  timezone: string;
  windows: readonly PostWindow[];
  monthlyCap: number;
};

const ALLOW: GateDecision = { allowed: true };

function deny(reason: DenyReason): GateDecision {
  return { allowed: false, reason };
}

export function isWithinWindows(hour: number, windows: readonly PostWindow[]): boolean {
  return windows.some(w => isHourInRange(hour, w.startHour, w.endHour));
}

/** Pure decision over the loaded snapshot. First failing check wins. */
export function canPost(now: Date, state: StateSnapshot, opts: GateOptions): GateDecision {
  if (state.killSwitch.status === 'disabled') return deny('disabled');

  if (!opts.force) {
    const { hour } = getLocalParts(now, opts.timezone);
    if (!isWithinWindows(hour, opts.windows)) return deny('outside_window');
    if (state.lastPostYmd === getLocalYMD(now, opts.timezone)) return deny('already_posted_today');
  }

  const used = state.monthlyUsage[getLocalMonthKey(now, opts.timezone)] ?? 0;
  if (used >= opts.monthlyCap) return deny('monthly_cap_reached');

  return ALLOW;
}

export type HealthProbeOptions = {
  force: boolean;
  timezone: string;
};

/**
 * Token probe before any paid call. A failure trips the kill switch and is
 * written to the error log; with `force` the run continues anyway.
 */
export async function runHealthProbe(
  now: Date,
  publisher: PagePublisher,
  store: StateStore,
  opts: HealthProbeOptions
): Promise<GateDecision> {
  const res = await publisher.checkToken();
  if (res.ok) {
    logger.info('health_check_ok', { pageId: res.value.id, name: res.value.name });
    return ALLOW;
  }

  const detail = describeUpstream(res.error);
  logger.error('health_check_failed', { status: res.error.status, err: res.error.message, force: opts.force });

  const at = `${getLocalYMD(now, opts.timezone)} ${getLocalHMS(now, opts.timezone)}`;
  await store.appendError({ at, message: `Health check failed: ${detail}`, stack: res.error.stack });
  await store.setKillSwitch({ status: 'disabled', reason: `health check failed: ${detail}`, at });

  return opts.force ? ALLOW : deny('health_check_failed');
}
