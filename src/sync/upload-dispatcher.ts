/**
 * UploadDispatcher — fire-and-forget delivery of upload jobs.
 *
 * send() returns immediately. The request runs as a tracked task whose
 * outcome goes to the dispatch sink; nothing is surfaced to the caller and
 * nothing is retried.
 *
 * Wire contract:
 *   POST {base}/upload     multipart/form-data, field `data`, application/octet-stream
 *   POST {base}/sms        JSON { sender, content, code }
 *   POST {base}/clipboard  JSON { text, timestamp }
 */

import type pino from 'pino';
import { DispatchError, toError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { formatEndpointUrl } from './endpoint-resolver.js';
import type { DispatchOutcome, DispatchSink, Endpoint, UploadJob } from './types.js';

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface UploadDispatcherOptions {
  /** Supplies the current endpoint at send time */
  endpoint: () => Endpoint | null;
  /** Receives every outcome, including dropped jobs */
  sink?: DispatchSink;
  /** Per-request timeout in ms. Default: 30000 */
  timeoutMs?: number;
  fetch?: FetchLike;
  logger?: pino.Logger;
}

const UPLOAD_SUFFIX = '/upload';
export const DEFAULT_DISPATCH_TIMEOUT_MS = 30_000;

/**
 * Target URL for a job: the trailing `/upload` of the endpoint's path
 * template is swapped for the job's suffix, or the suffix is appended when
 * the template has no `/upload` tail.
 */
export function buildTargetUrl(endpoint: Endpoint, pathSuffix: string): string {
  const template = endpoint.pathTemplate;
  const pathTemplate = template.endsWith(UPLOAD_SUFFIX)
    ? template.slice(0, -UPLOAD_SUFFIX.length) + pathSuffix
    : template.replace(/\/$/, '') + pathSuffix;
  return formatEndpointUrl({ ...endpoint, pathTemplate });
}

export class UploadDispatcher {
  private inFlightTasks: Set<Promise<void>> = new Set();
  private readonly endpoint: () => Endpoint | null;
  private readonly sink?: DispatchSink;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly logger: pino.Logger;

  constructor(options: UploadDispatcherOptions) {
    this.endpoint = options.endpoint;
    this.sink = options.sink;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_DISPATCH_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = (options.logger ?? getLogger()).child({ component: 'upload-dispatcher' });
  }

  /**
   * Queue a job for delivery. Never throws and never waits for the network.
   */
  send(job: UploadJob): void {
    const endpoint = this.endpoint();
    if (!endpoint) {
      const error = new DispatchError(`No endpoint set; dropping ${job.source} job ${job.id}`, null);
      this.logger.error({ err: error, jobId: job.id }, 'Server URL not known yet');
      this.report({ jobId: job.id, source: job.source, url: null, status: 'dropped', error, durationMs: 0 });
      return;
    }

    const url = buildTargetUrl(endpoint, job.pathSuffix);
    const task: Promise<void> = this.execute(url, job)
      .then((outcome) => this.report(outcome))
      .catch((err: unknown) => this.logger.error({ err, jobId: job.id }, 'Dispatch bookkeeping failed'))
      .finally(() => {
        this.inFlightTasks.delete(task);
      });
    this.inFlightTasks.add(task);
  }

  /**
   * Resolves once every in-flight upload has completed.
   */
  async drain(): Promise<void> {
    while (this.inFlightTasks.size > 0) {
      await Promise.allSettled([...this.inFlightTasks]);
    }
  }

  get inFlight(): number {
    return this.inFlightTasks.size;
  }

  // ─────────────────────────────────────────────────────────
  // INTERNAL
  // ─────────────────────────────────────────────────────────

  private async execute(url: string, job: UploadJob): Promise<DispatchOutcome> {
    const start = performance.now();
    const base = { jobId: job.id, source: job.source, url };
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    this.logger.debug({ url, jobId: job.id, kind: job.contentKind }, 'Uploading');

    try {
      const response = await this.fetchImpl(url, {
        method: 'POST',
        ...this.buildBody(job),
        signal: controller.signal,
      });
      const durationMs = performance.now() - start;
      // Release the connection; the receiver's reply carries nothing we use
      await response.body?.cancel().catch(() => undefined);

      if (response.ok) {
        return { ...base, status: 'delivered', httpStatus: response.status, durationMs };
      }
      return {
        ...base,
        status: 'rejected',
        httpStatus: response.status,
        error: new DispatchError(`Receiver answered ${response.status}`, url),
        durationMs,
      };
    } catch (err) {
      const reason = controller.signal.aborted ? `timed out after ${this.timeoutMs}ms` : toError(err).message;
      return {
        ...base,
        status: 'failed',
        error: new DispatchError(`Upload to ${url} failed: ${reason}`, url, toError(err)),
        durationMs: performance.now() - start,
      };
    } finally {
      clearTimeout(timeout);
    }
  }

  private buildBody(job: UploadJob): Pick<RequestInit, 'body' | 'headers'> {
    if (job.contentKind === 'raw-binary') {
      const form = new FormData();
      form.append('data', new Blob([job.payload], { type: 'application/octet-stream' }), job.fileName);
      return { body: form };
    }
    return {
      body: JSON.stringify(job.payload),
      headers: { 'content-type': 'application/json; charset=utf-8' },
    };
  }

  private report(outcome: DispatchOutcome): void {
    const fields = {
      jobId: outcome.jobId,
      source: outcome.source,
      url: outcome.url,
      httpStatus: outcome.httpStatus,
      durationMs: Math.round(outcome.durationMs),
    };
    if (outcome.status === 'delivered') {
      this.logger.info(fields, 'Upload successful');
    } else if (outcome.status !== 'dropped') {
      this.logger.error({ ...fields, err: outcome.error }, 'Upload failed');
    }

    if (!this.sink) return;
    try {
      this.sink(outcome);
    } catch (err) {
      this.logger.error({ err }, 'Dispatch sink threw');
    }
  }
}
