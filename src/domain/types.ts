export const THOUGHT_CATEGORIES = ['grind', 'vengeance', 'discipline', 'mindset', 'success', 'struggle'] as const;
export type ThoughtCategory = (typeof THOUGHT_CATEGORIES)[number];

/** A line from the fixed bank. Identity is the exact text; it is also the cooldown key. */
export type ContentItem = {
  category: ThoughtCategory | 'holiday';
  text: string;
};

export type SceneDescriptor = {
  /** Unique key, used for scene cooldown. */
  name: string;
  description: string;
  details: string;
};

export type HolidayRule = {
  name: string;
  text: string;
  scene: string;
};

/** Month/day → holiday, keyed "MM-DD". Exact-date match only. */
export type HolidayCalendar = Record<string, HolidayRule>;

/** Month "MM" → preferred categories. */
export type SeasonalMap = Record<string, ThoughtCategory[]>;

export type ContentBank = {
  thoughts: ContentItem[];
  scenes: SceneDescriptor[];
  holidays: HolidayCalendar;
  seasonal: SeasonalMap;
};

/** Key → last-used local date (YYYY-MM-DD). */
export type CooldownRecord = Record<string, string>;

/** "YYYY-MM" → successful posts that month. */
export type MonthlyUsage = Record<string, number>;

/** "YYYY" → holiday names already posted that year. */
export type HolidayLedger = Record<string, string[]>;

export type KillSwitchState = { status: 'active' } | { status: 'disabled'; reason: string; at: string };

export type StateSnapshot = {
  /** Local date of the last successful post. */
  lastPostYmd: string | null;
  monthlyUsage: MonthlyUsage;
  thoughtHistory: CooldownRecord;
  sceneHistory: CooldownRecord;
  holidayLedger: HolidayLedger;
  killSwitch: KillSwitchState;
};

export type Selection = {
  scene: SceneDescriptor;
  item: ContentItem;
  /** Present when today's exact-date holiday was chosen. */
  holiday?: HolidayRule;
};

export type EngagementEntry = {
  date: string;
  time: string;
  scene: string;
  text: string;
  status: string;
};
