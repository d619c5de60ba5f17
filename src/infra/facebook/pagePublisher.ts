import { UpstreamError, errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { err, ok, type Result } from '../../utils/result.js';
import type { FetchLike } from '../openai/imageGenerator.js';

export type PublishReceipt = {
  /** Photo id returned by the Graph API. */
  id?: string;
  postId?: string;
};

export type PageIdentity = {
  id: string;
  name?: string;
};

/** Page-feed side of a run: token probe and photo upload. */
export interface PagePublisher {
  checkToken(): Promise<Result<PageIdentity, UpstreamError>>;
  publishPhoto(bytes: Buffer): Promise<Result<PublishReceipt, UpstreamError>>;
}

export type FacebookPublisherOptions = {
  accessToken: string;
  pageId: string;
  baseUrl: string;
  version: string;
  published: boolean;
  caption?: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
};

function readString(obj: unknown, key: string): string | undefined {
  if (typeof obj !== 'object' || obj === null) return undefined;
  const v: unknown = Reflect.get(obj, key);
  return typeof v === 'string' || typeof v === 'number' ? String(v) : undefined;
}

function parseJsonOrEmpty(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return {};
  }
}

/** Facebook Graph API: `GET /me` for token health, multipart `POST /{page}/photos` to publish. */
export class FacebookPagePublisher implements PagePublisher {
  private readonly fetchImpl: FetchLike;

  constructor(private readonly opts: FacebookPublisherOptions) {
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  private base(): string {
    return this.opts.baseUrl.replace(/\/+$/, '');
  }

  async checkToken(): Promise<Result<PageIdentity, UpstreamError>> {
    const url = `${this.base()}/me?access_token=${encodeURIComponent(this.opts.accessToken)}`;
    const ac = new AbortController();
    const timeout = setTimeout(() => ac.abort(), Math.min(15_000, this.opts.timeoutMs ?? 15_000));

    try {
      const res = await this.fetchImpl(url, { method: 'GET', headers: { Accept: 'application/json' }, signal: ac.signal });
      const text = await res.text().catch(() => '');
      if (res.status !== 200) {
        return err(new UpstreamError('health', `token health check failed (${res.status})`, { status: res.status, body: text.slice(0, 300) }));
      }
      const json = parseJsonOrEmpty(text);
      const id = readString(json, 'id');
      if (!id) {
        return err(new UpstreamError('health', 'token health check returned no id', { status: res.status, body: text.slice(0, 300) }));
      }
      return ok({ id, name: readString(json, 'name') });
    } catch (e) {
      return err(new UpstreamError('health', `token health check exception: ${errorMessage(e)}`, { cause: e }));
    } finally {
      clearTimeout(timeout);
    }
  }

  async publishPhoto(bytes: Buffer): Promise<Result<PublishReceipt, UpstreamError>> {
    const url = `${this.base()}/${this.opts.version}/${this.opts.pageId}/photos`;

    const form = new FormData();
    form.append('access_token', this.opts.accessToken);
    form.append('published', this.opts.published ? 'true' : 'false');
    if (this.opts.caption) form.append('caption', this.opts.caption);
    form.append('source', new Blob([new Uint8Array(bytes)], { type: 'image/jpeg' }), 'image.jpg');

    const ac = new AbortController();
    const timeout = setTimeout(() => ac.abort(), this.opts.timeoutMs ?? 60_000);
    try {
      const res = await this.fetchImpl(url, { method: 'POST', body: form, signal: ac.signal });
      const text = await res.text().catch(() => '');
      if (!res.ok) {
        logger.warn('publish_rejected', { status: res.status, body: text.slice(0, 200) });
        return err(new UpstreamError('publish', `page photo upload failed (${res.status})`, { status: res.status, body: text.slice(0, 500) }));
      }
      const json = parseJsonOrEmpty(text);
      const receipt: PublishReceipt = { id: readString(json, 'id'), postId: readString(json, 'post_id') };
      logger.info('publish_ok', { ...receipt, bytes: bytes.length });
      return ok(receipt);
    } catch (e) {
      return err(new UpstreamError('publish', `page photo upload exception: ${errorMessage(e)}`, { cause: e }));
    } finally {
      clearTimeout(timeout);
    }
  }
}
