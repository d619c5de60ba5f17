import type { BotConfig } from '../config/index.js';
import type { CompositeOptions, TextCompositor } from '../compositor/compositor.js';
import type { CaptionReply } from '../content/captionWriter.js';
import { selectContent, type Rng } from '../content/contentSelector.js';
import { buildHolidayPrompt, buildScenePrompt } from '../content/promptBuilder.js';
import type { ContentBank, ContentItem, SceneDescriptor, Selection } from '../domain/types.js';
import { canPost, runHealthProbe, type DenyReason } from '../gate/postingGate.js';
import type { PagePublisher, PublishReceipt } from '../infra/facebook/pagePublisher.js';
import type { ImageSource } from '../infra/openai/imageGenerator.js';
import type { StateStore } from '../state/stateStore.js';
import { UpstreamError, describeUpstream, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { Result } from '../utils/result.js';
import { getLocalHMS, getLocalMonthKey, getLocalParts, getLocalYMD } from '../utils/time.js';

export type RunState =
  | 'idle'
  | 'gate_check'
  | 'denied'
  | 'content_select'
  | 'generate'
  | 'composite'
  | 'publish'
  | 'committed'
  | 'failed';

/** Fresh line from the chat model, seeded with the bank pick. */
export type CaptionSource = (seed: ContentItem, scene: SceneDescriptor) => Promise<Result<CaptionReply, UpstreamError>>;

export type RunDeps = {
  config: BotConfig;
  store: StateStore;
  bank: ContentBank;
  images: ImageSource;
  publisher: PagePublisher;
  compositor: TextCompositor;
  caption?: CaptionSource | null;
  clock?: () => Date;
  rng?: Rng;
};

export type RunOutcome =
  | { state: 'committed'; selection: Selection; text: string; receipt: PublishReceipt }
  | { state: 'dry_run'; selection: Selection; text: string; image: Buffer }
  | { state: 'denied'; reason: DenyReason }
  | { state: 'failed'; stage: RunState; error: UpstreamError };

/** 0: posted or nothing to do. 1: the run failed or the token probe tripped the kill switch. */
export function exitCodeFor(outcome: RunOutcome): number {
  if (outcome.state === 'failed') return 1;
  if (outcome.state === 'denied' && outcome.reason === 'health_check_failed') return 1;
  return 0;
}

/**
 * One invocation: gate, probe, select, generate, composite, publish, commit.
 * State is committed only after a successful publish.
 */
export class PostingRun {
  private current: RunState = 'idle';
  private readonly clock: () => Date;

  constructor(private readonly deps: RunDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  get state(): RunState {
    return this.current;
  }

  private transition(to: RunState, meta?: Record<string, unknown>): void {
    logger.info('run_state', { from: this.current, to, ...meta });
    this.current = to;
  }

  private stamp(now: Date): { date: string; time: string } {
    const tz = this.deps.config.timezone;
    return { date: getLocalYMD(now, tz), time: getLocalHMS(now, tz) };
  }

  private async fail(now: Date, error: UpstreamError, sceneName: string, text: string): Promise<RunOutcome> {
    const stage = this.current;
    const detail = describeUpstream(error);
    const { date, time } = this.stamp(now);

    logger.error('run_failed', { stage, kind: error.kind, status: error.status, err: error.message });

    // The sentinel goes down before any log write that could throw.
    if (error.kind === 'publish') {
      await this.deps.store.setKillSwitch({ status: 'disabled', reason: `publish failed: ${detail}`, at: `${date} ${time}` });
      logger.warn('kill_switch_set', { reason: 'publish_failed' });
    }

    await this.deps.store.appendEngagement({ date, time, scene: sceneName, text, status: `FAILED: ${detail}` });
    await this.deps.store.appendError({ at: `${date} ${time}`, message: detail, stack: error.stack });

    this.transition('failed', { kind: error.kind });
    return { state: 'failed', stage, error };
  }

  async execute(): Promise<RunOutcome> {
    const { config, store, bank, images, publisher, compositor } = this.deps;
    const now = this.clock();
    const tz = config.timezone;

    this.transition('gate_check', { dryRun: config.dryRun, force: config.forcePost });
    const state = await store.load();
    const decision = canPost(now, state, {
      // A dry run commits nothing, so the hour and daily checks do not apply to it.
      force: config.forcePost || config.dryRun,
      timezone: tz,
      windows: config.postWindows,
      monthlyCap: config.maxMonthlyImages,
    });
    if (!decision.allowed) {
      logger.info('gate_denied', { reason: decision.reason });
      this.transition('denied', { reason: decision.reason });
      return { state: 'denied', reason: decision.reason };
    }

    if (!config.dryRun) {
      const probe = await runHealthProbe(now, publisher, store, { force: config.forcePost, timezone: tz });
      if (!probe.allowed) {
        this.transition('denied', { reason: probe.reason });
        return { state: 'denied', reason: probe.reason };
      }
    }

    this.transition('content_select');
    const selection = selectContent(now, state, bank, {
      timezone: tz,
      thoughtCooldownDays: config.thoughtCooldownDays,
      sceneCooldownDays: config.sceneCooldownDays,
      rng: this.deps.rng,
    });

    let text = selection.item.text;
    let extraDetail: string | undefined;
    const placement: CompositeOptions = {};

    if (selection.holiday) {
      logger.info('holiday_selected', { holiday: selection.holiday.name });
    } else if (this.deps.caption) {
      const reply = await this.deps.caption(selection.item, selection.scene);
      if (!reply.ok) return this.fail(now, reply.error, selection.scene.name, text);
      text = reply.value.text;
      extraDetail = reply.value.scene;
      placement.position = reply.value.position;
    }
    logger.info('content_selected', {
      scene: selection.scene.name,
      category: selection.item.category,
      chars: text.length,
    });

    this.transition('generate');
    const prompt = selection.holiday
      ? buildHolidayPrompt(selection.holiday, extraDetail)
      : buildScenePrompt(selection.scene, extraDetail);
    const generated = await images.generate(prompt);
    if (!generated.ok) return this.fail(now, generated.error, selection.scene.name, text);

    this.transition('composite');
    let image: Buffer;
    try {
      image = (await compositor.composite(generated.value.bytes, text, placement)).image;
    } catch (e) {
      const error = new UpstreamError('composite', `compositing failed: ${errorMessage(e)}`, { cause: e });
      return this.fail(now, error, selection.scene.name, text);
    }

    const { date, time } = this.stamp(now);
    if (config.dryRun) {
      await store.appendEngagement({ date, time, scene: selection.scene.name, text, status: 'DRY_RUN_SUCCESS' });
      this.transition('committed', { dryRun: true, bytes: image.length });
      return { state: 'dry_run', selection, text, image };
    }

    this.transition('publish', { bytes: image.length });
    const published = await publisher.publishPhoto(image);
    if (!published.ok) return this.fail(now, published.error, selection.scene.name, text);

    await store.commitPost({
      ymd: date,
      monthKey: getLocalMonthKey(now, tz),
      text: selection.item.text,
      sceneName: selection.scene.name,
      holiday: selection.holiday
        ? { year: String(getLocalParts(now, tz).year), name: selection.holiday.name }
        : undefined,
    });
    await store.appendEngagement({ date, time, scene: selection.scene.name, text, status: 'SUCCESS' });

    this.transition('committed', { postId: published.value.postId ?? published.value.id });
    return { state: 'committed', selection, text, receipt: published.value };
  }
}
