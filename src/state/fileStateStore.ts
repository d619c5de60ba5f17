import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import type { EngagementEntry, KillSwitchState, StateSnapshot } from '../domain/types.js';
import { logger } from '../utils/logger.js';
import { applyCommit, type ErrorLogEntry, type PostCommit, type StateStore } from './stateStore.js';

export const STATE_FILES = {
  lastPost: 'last_post.txt',
  monthlyUsage: 'monthly_usage.json',
  thoughtHistory: 'thought_history.json',
  sceneHistory: 'scene_history.json',
  holidayHistory: 'holiday_history.json',
  engagementLog: 'engagement_log.csv',
  errorLog: 'error_log.txt',
  killSwitch: 'posting_disabled.flag',
} as const;

const ENGAGEMENT_HEADER = ['Date', 'Time', 'Scene', 'Thought', 'Status'];

const MonthlyUsageSchema = z.record(z.string(), z.number().int().nonnegative());
const CooldownSchema = z.record(z.string(), z.string());
const HolidayLedgerSchema = z.record(z.string(), z.array(z.string()));
const KillSwitchFileSchema = z.object({ reason: z.string(), at: z.string() });

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

async function readTextOrNull(file: string): Promise<string | null> {
  try {
    return await fs.readFile(file, 'utf8');
  } catch (err) {
    if (isMissing(err)) return null;
    throw err;
  }
}

/** RFC 4180 field quoting. */
export function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function csvRow(fields: string[]): string {
  return `${fields.map(csvField).join(',')}\r\n`;
}

/**
 * State persisted as plain files under one directory. Every rewrite is
 * write-to-temp + rename, so each file is either old or new, never partial.
 */
export class FileStateStore implements StateStore {
  constructor(private readonly dir: string) {}

  path(name: keyof typeof STATE_FILES): string {
    return path.join(this.dir, STATE_FILES[name]);
  }

  private async writeAtomic(file: string, contents: string): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true });
    const tmp = `${file}.${process.pid}.tmp`;
    await fs.writeFile(tmp, contents, 'utf8');
    await fs.rename(tmp, file);
  }

  private async writeJson(file: string, data: unknown): Promise<void> {
    await this.writeAtomic(file, `${JSON.stringify(data, null, 2)}\n`);
  }

  private async readJson<T>(file: string, schema: z.ZodType<T>, fallback: T): Promise<T> {
    const raw = await readTextOrNull(file);
    if (raw === null || !raw.trim()) return fallback;
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new Error(`State file is not valid JSON: ${file} (${String(err)})`);
    }
    const res = schema.safeParse(parsed);
    if (!res.success) {
      throw new Error(`State file has unexpected shape: ${file} (${res.error.issues[0]?.message ?? 'invalid'})`);
    }
    return res.data;
  }

  async load(): Promise<StateSnapshot> {
    const [lastPost, monthlyUsage, thoughtHistory, sceneHistory, holidayLedger, killSwitch] = await Promise.all([
      readTextOrNull(this.path('lastPost')),
      this.readJson(this.path('monthlyUsage'), MonthlyUsageSchema, {}),
      this.readJson(this.path('thoughtHistory'), CooldownSchema, {}),
      this.readJson(this.path('sceneHistory'), CooldownSchema, {}),
      this.readJson(this.path('holidayHistory'), HolidayLedgerSchema, {}),
      this.getKillSwitch(),
    ]);

    return {
      lastPostYmd: lastPost?.trim() || null,
      monthlyUsage,
      thoughtHistory,
      sceneHistory,
      holidayLedger,
      killSwitch,
    };
  }

  async getKillSwitch(): Promise<KillSwitchState> {
    const raw = await readTextOrNull(this.path('killSwitch'));
    if (raw === null) return { status: 'active' };

    // The sentinel's existence is what matters; older flags hold a plain-text reason.
    const plain: KillSwitchState = { status: 'disabled', reason: raw.trim() || 'disabled', at: '' };
    try {
      const parsed = KillSwitchFileSchema.safeParse(JSON.parse(raw));
      return parsed.success ? { status: 'disabled', ...parsed.data } : plain;
    } catch {
      return plain;
    }
  }

  async setKillSwitch(state: KillSwitchState): Promise<void> {
    const file = this.path('killSwitch');
    if (state.status === 'active') {
      await fs.rm(file, { force: true });
      logger.info('kill_switch_cleared', { file });
      return;
    }
    await this.writeJson(file, { reason: state.reason, at: state.at });
    logger.warn('kill_switch_set', { reason: state.reason });
  }

  async commitPost(commit: PostCommit): Promise<void> {
    const next = applyCommit(await this.load(), commit);

    await this.writeAtomic(this.path('lastPost'), commit.ymd);
    await this.writeJson(this.path('monthlyUsage'), next.monthlyUsage);
    await this.writeJson(this.path('thoughtHistory'), next.thoughtHistory);
    await this.writeJson(this.path('sceneHistory'), next.sceneHistory);
    if (commit.holiday) {
      await this.writeJson(this.path('holidayHistory'), next.holidayLedger);
    }
  }

  async appendEngagement(entry: EngagementEntry): Promise<void> {
    const file = this.path('engagementLog');
    await fs.mkdir(this.dir, { recursive: true });
    const exists = (await readTextOrNull(file)) !== null;
    const header = exists ? '' : csvRow(ENGAGEMENT_HEADER);
    await fs.appendFile(file, header + csvRow([entry.date, entry.time, entry.scene, entry.text, entry.status]), 'utf8');
  }

  async appendError(entry: ErrorLogEntry): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true });
    const stack = entry.stack ? `${entry.stack.trimEnd()}\n` : '';
    await fs.appendFile(this.path('errorLog'), `[${entry.at}] ERROR: ${entry.message}\n${stack}`, 'utf8');
  }
}
