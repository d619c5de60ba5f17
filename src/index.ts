#!/usr/bin/env node
import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import dotenv from 'dotenv';
import { loadConfig, type BotConfig } from './config/index.js';
import { TypographyCompositor } from './compositor/compositor.js';
import { registerFonts } from './compositor/fonts.js';
import { loadContentBank } from './content/contentBank.js';
import { writeCaption } from './content/captionWriter.js';
import type { ContentBank } from './domain/types.js';
import { canPost } from './gate/postingGate.js';
import { FacebookPagePublisher } from './infra/facebook/pagePublisher.js';
import { createChatCompleter } from './infra/openai/chatClient.js';
import { OpenAiImageGenerator, SyntheticImageSource } from './infra/openai/imageGenerator.js';
import { PostingRun, exitCodeFor, type CaptionSource, type RunOutcome } from './pipeline/postingRun.js';
import { FileStateStore } from './state/fileStateStore.js';
import { ConfigError, errorMessage } from './utils/errors.js';
import { logger } from './utils/logger.js';

const COMMANDS = ['run', 'status', 'enable'] as const;
type Command = (typeof COMMANDS)[number];

const DRY_RUN_PREVIEW = 'dry_run_preview.jpg';

process.on('unhandledRejection', err => {
  logger.error('unhandled_rejection', { err: String(err) });
});

process.on('uncaughtException', err => {
  logger.error('uncaught_exception', { err: String(err) });
});

function parseCommand(arg: string | undefined): Command {
  const cmd = COMMANDS.find(c => c === (arg ?? 'run'));
  if (!cmd) throw new ConfigError(`Unknown command "${arg}". Expected one of: ${COMMANDS.join(', ')}`);
  return cmd;
}

function buildRun(config: BotConfig, bank: ContentBank, store: FileStateStore): PostingRun {
  const complete = createChatCompleter(config);
  const caption: CaptionSource | null = complete ? (seed, scene) => writeCaption(complete, seed, scene) : null;

  const [width, height] = config.openaiImageSize.split('x').map(Number);
  const images = config.dryRun
    ? new SyntheticImageSource({ width: width ?? 1024, height: height ?? 1536 })
    : new OpenAiImageGenerator({
        apiKey: config.openaiApiKey,
        baseUrl: config.openaiBaseUrl,
        model: config.openaiImageModel,
        size: config.openaiImageSize,
        timeoutMs: config.openaiTimeoutMs,
      });

  return new PostingRun({
    config,
    store,
    bank,
    images,
    publisher: new FacebookPagePublisher({
      accessToken: config.fbPageAccessToken,
      pageId: config.fbPageId,
      baseUrl: config.fbGraphBaseUrl,
      version: config.fbGraphVersion,
      published: config.fbPublish,
      caption: config.fbCaption || undefined,
    }),
    compositor: new TypographyCompositor({ watermarkText: config.watermarkText }),
    caption,
  });
}

async function runOnce(config: BotConfig, bank: ContentBank, store: FileStateStore): Promise<RunOutcome> {
  const outcome = await buildRun(config, bank, store).execute();
  if (outcome.state === 'dry_run') {
    const out = path.join(config.stateDir, DRY_RUN_PREVIEW);
    await fs.mkdir(config.stateDir, { recursive: true });
    await fs.writeFile(out, outcome.image);
    logger.info('dry_run_preview_written', { path: out, text: outcome.text });
  }
  return outcome;
}

async function main(argv: string[]): Promise<number> {
  dotenv.config();

  const command = parseCommand(argv[0]);
  const config = loadConfig();
  const store = new FileStateStore(config.stateDir);

  if (command === 'enable') {
    const before = await store.getKillSwitch();
    await store.setKillSwitch({ status: 'active' });
    logger.info('posting_enabled', { was: before.status });
    return 0;
  }

  if (command === 'status') {
    const state = await store.load();
    const decision = canPost(new Date(), state, {
      force: config.forcePost,
      timezone: config.timezone,
      windows: config.postWindows,
      monthlyCap: config.maxMonthlyImages,
    });
    process.stdout.write(`${JSON.stringify({ decision, state }, null, 2)}\n`);
    return 0;
  }

  // Both are configuration checks and must pass before any network call.
  registerFonts(config.fontPath);
  const bank = await loadContentBank(config.contentDir);
  logger.info('bot_starting', {
    command,
    dryRun: config.dryRun,
    force: config.forcePost,
    captionMode: config.captionMode,
    timezone: config.timezone,
    thoughts: bank.thoughts.length,
    scenes: bank.scenes.length,
  });

  return exitCodeFor(await runOnce(config, bank, store));
}

main(process.argv.slice(2)).then(
  code => {
    process.exitCode = code;
  },
  (err: unknown) => {
    if (err instanceof ConfigError) {
      logger.error('config_error', { err: err.message });
      process.exitCode = 2;
      return;
    }
    logger.error('run_crashed', { err: errorMessage(err), stack: err instanceof Error ? err.stack : undefined });
    process.exitCode = 1;
  }
);
