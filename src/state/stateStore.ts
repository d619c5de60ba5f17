import type { EngagementEntry, KillSwitchState, StateSnapshot } from '../domain/types.js';

/** Everything written after a successful publish. */
export type PostCommit = {
  /** Local date of the post (daily marker, cooldown value). */
  ymd: string;
  /** "YYYY-MM" bucket to increment. */
  monthKey: string;
  /** Content cooldown key. */
  text: string;
  /** Scene cooldown key. */
  sceneName: string;
  holiday?: { year: string; name: string };
};

export type ErrorLogEntry = {
  /** Local "YYYY-MM-DD HH:MM:SS". */
  at: string;
  message: string;
  stack?: string;
};

/**
 * Persisted bot state. Implementations must read everything in `load()` and
 * replace each record wholesale on write.
 */
export interface StateStore {
  load(): Promise<StateSnapshot>;
  getKillSwitch(): Promise<KillSwitchState>;
  setKillSwitch(state: KillSwitchState): Promise<void>;
  /**
   * Writes, in order: daily marker, monthly counter, content cooldown,
   * scene cooldown, holiday ledger (when `holiday` is set).
   */
  commitPost(commit: PostCommit): Promise<void>;
  appendEngagement(entry: EngagementEntry): Promise<void>;
  appendError(entry: ErrorLogEntry): Promise<void>;
}

export function emptySnapshot(): StateSnapshot {
  return {
    lastPostYmd: null,
    monthlyUsage: {},
    thoughtHistory: {},
    sceneHistory: {},
    holidayLedger: {},
    killSwitch: { status: 'active' },
  };
}

/** Pure read-modify-write of a snapshot; shared by the stores. */
export function applyCommit(state: StateSnapshot, commit: PostCommit): StateSnapshot {
  const next: StateSnapshot = {
    ...state,
    lastPostYmd: commit.ymd,
    monthlyUsage: { ...state.monthlyUsage, [commit.monthKey]: (state.monthlyUsage[commit.monthKey] ?? 0) + 1 },
    thoughtHistory: { ...state.thoughtHistory, [commit.text]: commit.ymd },
    sceneHistory: { ...state.sceneHistory, [commit.sceneName]: commit.ymd },
  };
  if (commit.holiday) {
    const { year, name } = commit.holiday;
    const used = state.holidayLedger[year] ?? [];
    next.holidayLedger = { ...state.holidayLedger, [year]: used.includes(name) ? used : [...used, name] };
  }
  return next;
}
