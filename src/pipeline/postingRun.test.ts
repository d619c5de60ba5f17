import sharp from 'sharp';
import { beforeAll, describe, expect, it } from 'vitest';
import { loadConfig } from '../config/index.js';
import { TypographyCompositor } from '../compositor/compositor.js';
import type { TextMeasurer } from '../compositor/layout.js';
import { parseCaptionReply } from '../content/captionWriter.js';
import type { ContentBank, StateSnapshot } from '../domain/types.js';
import type { PageIdentity, PagePublisher, PublishReceipt } from '../infra/facebook/pagePublisher.js';
import type { GeneratedImage, ImageSource } from '../infra/openai/imageGenerator.js';
import { MemoryStateStore } from '../state/memoryStateStore.js';
import { UpstreamError } from '../utils/errors.js';
import { err, ok, type Result } from '../utils/result.js';
import { PostingRun, exitCodeFor, type CaptionSource, type RunDeps } from './postingRun.js';

const mono: TextMeasurer = (text, fontSize) => text.length * fontSize * 0.5;

const bank: ContentBank = {
  thoughts: [
    { category: 'grind', text: 'Quiet hours build loud results.' },
    { category: 'success', text: 'Results are just patience with receipts.' },
  ],
  scenes: [
    { name: 'empty_gym_dawn', description: 'Empty gym before sunrise', details: 'chalk dust' },
    { name: 'mountain_ridge', description: 'Lone climber on a ridge', details: 'clouds below' },
  ],
  holidays: {
    '12-25': { name: 'christmas', text: 'Give yourself the gift of finished work.', scene: 'desk on a snowy night' },
  },
  seasonal: {},
};

const env = {
  OPENAI_API_KEY: 'test-secret',
  FB_PAGE_ACCESS_TOKEN: 'test-token',
  FB_PAGE_ID: '12345',
  TIMEZONE: 'UTC',
  POST_WINDOWS: '13-15',
};

const inWindow = new Date('2025-06-10T13:30:00Z');

let sample: Buffer;
beforeAll(async () => {
  sample = await sharp({ create: { width: 256, height: 384, channels: 3, background: { r: 40, g: 40, b: 40 } } })
    .png()
    .toBuffer();
});

class FakeImages implements ImageSource {
  readonly prompts: string[] = [];
  constructor(private readonly result?: Result<GeneratedImage, UpstreamError>) {}

  async generate(prompt: string): Promise<Result<GeneratedImage, UpstreamError>> {
    this.prompts.push(prompt);
    return this.result ?? ok({ bytes: sample, mimeType: 'image/png' });
  }
}

class FakePublisher implements PagePublisher {
  checks = 0;
  readonly uploads: Buffer[] = [];
  constructor(
    private readonly publishResult: Result<PublishReceipt, UpstreamError> = ok({ id: '777', postId: '12345_777' }),
    private readonly healthy = true
  ) {}

  async checkToken(): Promise<Result<PageIdentity, UpstreamError>> {
    this.checks++;
    return this.healthy ? ok({ id: '12345' }) : err(new UpstreamError('health', 'token health check failed (401)', { status: 401 }));
  }

  async publishPhoto(bytes: Buffer): Promise<Result<PublishReceipt, UpstreamError>> {
    this.uploads.push(bytes);
    return this.publishResult;
  }
}

class UnwritableLogStore extends MemoryStateStore {
  override async appendEngagement(): Promise<void> {
    throw new Error('EACCES: engagement_log.csv');
  }
}

type Harness = {
  run: PostingRun;
  store: MemoryStateStore;
  images: FakeImages;
  publisher: FakePublisher;
};

function harness(opts: {
  now?: Date;
  env?: Record<string, string>;
  state?: Partial<StateSnapshot>;
  images?: FakeImages;
  publisher?: FakePublisher;
  caption?: CaptionSource;
  store?: MemoryStateStore;
}): Harness {
  const store = opts.store ?? new MemoryStateStore(opts.state);
  const images = opts.images ?? new FakeImages();
  const publisher = opts.publisher ?? new FakePublisher();
  const deps: RunDeps = {
    config: loadConfig({ ...env, ...opts.env }),
    store,
    bank,
    images,
    publisher,
    compositor: new TypographyCompositor({ watermarkText: '© test', measure: mono }),
    caption: opts.caption,
    clock: () => opts.now ?? inWindow,
    rng: () => 0,
  };
  return { run: new PostingRun(deps), store, images, publisher };
}

describe('PostingRun', () => {
  it('makes no calls and writes nothing when the gate denies', async () => {
    const h = harness({ now: new Date('2025-06-10T12:00:00Z') });
    const outcome = await h.run.execute();

    expect(outcome).toEqual({ state: 'denied', reason: 'outside_window' });
    expect(h.run.state).toBe('denied');
    expect(exitCodeFor(outcome)).toBe(0);
    expect(h.images.prompts).toHaveLength(0);
    expect(h.publisher.checks).toBe(0);
    expect(h.publisher.uploads).toHaveLength(0);
    expect(h.store.writes).toBe(0);
  });

  it('denies at the monthly cap without any call', async () => {
    const h = harness({ state: { monthlyUsage: { '2025-06': 30 } } });
    expect(await h.run.execute()).toEqual({ state: 'denied', reason: 'monthly_cap_reached' });
    expect(h.publisher.checks).toBe(0);
    expect(h.store.writes).toBe(0);
  });

  it('stays denied while the kill switch is set, even when forced', async () => {
    const h = harness({
      env: { FORCE_POST: '1' },
      state: { killSwitch: { status: 'disabled', reason: 'publish failed', at: '2025-06-09 13:00:00' } },
    });
    expect(await h.run.execute()).toEqual({ state: 'denied', reason: 'disabled' });
    expect(h.images.prompts).toHaveLength(0);
  });

  it('stops before generation when the health probe fails', async () => {
    const h = harness({ publisher: new FakePublisher(undefined, false) });
    const outcome = await h.run.execute();
    expect(outcome).toEqual({ state: 'denied', reason: 'health_check_failed' });
    expect(exitCodeFor(outcome)).toBe(1);
    expect(h.images.prompts).toHaveLength(0);
    expect((await h.store.getKillSwitch()).status).toBe('disabled');
  });

  it('publishes and commits every record', async () => {
    const h = harness({});
    const outcome = await h.run.execute();

    expect(outcome.state).toBe('committed');
    expect(exitCodeFor(outcome)).toBe(0);
    expect(h.publisher.checks).toBe(1);
    expect(h.publisher.uploads).toHaveLength(1);
    expect(h.publisher.uploads[0]?.subarray(0, 2)).toEqual(Buffer.from([0xff, 0xd8]));
    expect(h.images.prompts[0]).toContain('Background: Empty gym before sunrise, chalk dust');

    const snap = await h.store.load();
    expect(snap.lastPostYmd).toBe('2025-06-10');
    expect(snap.monthlyUsage).toEqual({ '2025-06': 1 });
    expect(snap.thoughtHistory).toEqual({ 'Quiet hours build loud results.': '2025-06-10' });
    expect(snap.sceneHistory).toEqual({ empty_gym_dawn: '2025-06-10' });
    expect(snap.holidayLedger).toEqual({});
    expect(h.store.engagement).toEqual([
      { date: '2025-06-10', time: '13:30:00', scene: 'empty_gym_dawn', text: 'Quiet hours build loud results.', status: 'SUCCESS' },
    ]);
  });

  it('leaves state untouched and trips the kill switch when publishing fails', async () => {
    const failure = new UpstreamError('publish', 'page photo upload failed (500)', { status: 500, body: 'oops' });
    const h = harness({ publisher: new FakePublisher(err(failure)) });
    const outcome = await h.run.execute();

    expect(outcome).toEqual({ state: 'failed', stage: 'publish', error: failure });
    expect(exitCodeFor(outcome)).toBe(1);

    const snap = await h.store.load();
    expect(snap.lastPostYmd).toBeNull();
    expect(snap.monthlyUsage).toEqual({});
    expect(snap.thoughtHistory).toEqual({});
    expect(snap.sceneHistory).toEqual({});
    expect(snap.killSwitch).toEqual({
      status: 'disabled',
      reason: 'publish failed: page photo upload failed (500): oops',
      at: '2025-06-10 13:30:00',
    });
    expect(h.store.engagement.map(e => e.status)).toEqual(['FAILED: page photo upload failed (500): oops']);
    expect(h.store.errors).toHaveLength(1);
  });

  it('trips the kill switch before writing logs that may throw', async () => {
    const failure = new UpstreamError('publish', 'page photo upload failed (500)', { status: 500 });
    const h = harness({ store: new UnwritableLogStore(), publisher: new FakePublisher(err(failure)) });

    await expect(h.run.execute()).rejects.toThrow('EACCES: engagement_log.csv');
    expect(await h.store.getKillSwitch()).toEqual({
      status: 'disabled',
      reason: 'publish failed: page photo upload failed (500)',
      at: '2025-06-10 13:30:00',
    });
  });

  it('records an image failure without tripping the kill switch', async () => {
    const images = new FakeImages(err(new UpstreamError('image', 'image generation failed (500)', { status: 500 })));
    const h = harness({ images });
    const outcome = await h.run.execute();

    expect(outcome.state).toBe('failed');
    expect(h.publisher.uploads).toHaveLength(0);
    expect(await h.store.getKillSwitch()).toEqual({ status: 'active' });
    expect(h.store.engagement.map(e => e.status)).toEqual(['FAILED: image generation failed (500)']);
    expect(h.store.errors.map(e => e.message)).toEqual(['image generation failed (500)']);
    expect((await h.store.load()).lastPostYmd).toBeNull();
  });

  it('fails in the composite step on undecodable bytes', async () => {
    const h = harness({ images: new FakeImages(ok({ bytes: Buffer.from('not an image'), mimeType: 'image/png' })) });
    const outcome = await h.run.execute();

    expect(outcome.state).toBe('failed');
    if (outcome.state !== 'failed') return;
    expect(outcome.stage).toBe('composite');
    expect(outcome.error.kind).toBe('composite');
    expect(h.publisher.uploads).toHaveLength(0);
  });

  it('uses the model caption and keeps the bank line as the cooldown key', async () => {
    const h = harness({ caption: async () => parseCaptionReply('TEXT: Fresh line. | POSITION: BOTTOM | SCENE: fog') });
    const outcome = await h.run.execute();

    expect(outcome.state).toBe('committed');
    expect(h.images.prompts[0]).toContain('Extra detail: fog.');
    expect(h.store.engagement[0]?.text).toBe('Fresh line.');
    expect((await h.store.load()).thoughtHistory).toEqual({ 'Quiet hours build loud results.': '2025-06-10' });
  });

  it('fails without generating when the caption reply is malformed', async () => {
    const h = harness({ caption: async () => parseCaptionReply('Here is a great line for you!') });
    const outcome = await h.run.execute();

    expect(outcome.state).toBe('failed');
    if (outcome.state !== 'failed') return;
    expect(outcome.stage).toBe('content_select');
    expect(outcome.error.kind).toBe('chat');
    expect(h.images.prompts).toHaveLength(0);
    expect(await h.store.getKillSwitch()).toEqual({ status: 'active' });
  });

  it('posts the holiday pair and records it in the ledger', async () => {
    let captionCalls = 0;
    const h = harness({
      now: new Date('2025-12-25T13:30:00Z'),
      caption: async () => {
        captionCalls++;
        return parseCaptionReply('TEXT: x | POSITION: TOP | SCENE: y');
      },
    });
    const outcome = await h.run.execute();

    expect(outcome.state).toBe('committed');
    expect(captionCalls).toBe(0);
    expect(h.images.prompts[0]).toContain('desk on a snowy night, with a wide sense of depth and scale.');
    const snap = await h.store.load();
    expect(snap.holidayLedger).toEqual({ '2025': ['christmas'] });
    expect(snap.sceneHistory).toEqual({ holiday_christmas: '2025-12-25' });
    expect(h.store.engagement[0]?.text).toBe('Give yourself the gift of finished work.');
  });

  it('runs a dry run outside the window without publishing or committing', async () => {
    const h = harness({ now: new Date('2025-06-10T12:00:00Z'), env: { DRY_RUN: 'true' } });
    const outcome = await h.run.execute();

    expect(outcome.state).toBe('dry_run');
    if (outcome.state !== 'dry_run') return;
    const meta = await sharp(outcome.image).metadata();
    expect([meta.format, meta.width, meta.height]).toEqual(['jpeg', 256, 320]);
    expect(h.publisher.checks).toBe(0);
    expect(h.publisher.uploads).toHaveLength(0);
    expect(h.store.engagement.map(e => e.status)).toEqual(['DRY_RUN_SUCCESS']);

    const snap = await h.store.load();
    expect(snap.lastPostYmd).toBeNull();
    expect(snap.monthlyUsage).toEqual({});
  });
});
