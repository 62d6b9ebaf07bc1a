/**
 * Pipeline Coordinator - drives each captured frame through
 * caption -> objects -> detection -> annotation -> publish.
 *
 * Each event runs as its own task (bounded by a TaskPool); within an event the
 * stages are strictly sequential. A stage that ultimately fails freezes the
 * record as Failed(stage); nothing is thrown across event boundaries.
 */
import { AnnotationWriter } from './annotator';
import type { RelayConfig } from './config';
import { DetectionClient, type DetectionRequest } from './detection-client';
import { errorMessage, logErrorDetails, RelayError } from './errors';
import { RetryingForwarder, type ForwardOutcome, type RemoteService, type RetryPolicy } from './forwarder';
import { createLogger, type Logger } from './log';
import { PoolClosedError, TaskPool } from './pool';
import { PromptExtractionClient } from './prompt-client';
import { DownstreamPublisher, type SinkConfig } from './publisher';
import {
  createRecord,
  isTerminal,
  recordStatus,
  toResultPayload,
  withArtifact,
  withCaption,
  withDetection,
  withFailure,
  withObjects,
  withPublish,
} from './record';
import { writeSidecarResult } from './sidecar';
import type {
  AnnotatedArtifact,
  Caption,
  CaptureEvent,
  DetectionResult,
  FailureKind,
  ObjectQuery,
  PipelineRecord,
  PublishOutcome,
  ResultPayload,
} from './types';

// ============================================
// Collaborators
// ============================================

export interface ArtifactWriter {
  annotate(event: CaptureEvent, detection: DetectionResult): Promise<AnnotatedArtifact>;
}

export interface ResultPublisher {
  publish(record: PipelineRecord): Promise<PublishOutcome>;
}

export type SidecarWriter = (imagePath: string, payload: ResultPayload) => Promise<string>;

export type CoordinatorOptions = {
  prompts: RemoteService<Caption, ObjectQuery>;
  detector: RemoteService<DetectionRequest, DetectionResult>;
  annotator: ArtifactWriter;
  publisher: ResultPublisher;
  forwarder: RetryingForwarder;
  promptPolicy: RetryPolicy;
  detectionPolicy: RetryPolicy;
  /** Ask the detection service to annotate; the annotator decides whether to use its image */
  annotateInService?: boolean;
  /** Pass null to skip the sidecar JSON */
  writeSidecar?: SidecarWriter | null;
  maxConcurrentEvents?: number;
  historySize?: number;
  logger?: Logger;
};

// ============================================
// Coordinator
// ============================================

export class PipelineCoordinator {
  private options: CoordinatorOptions;
  private pool: TaskPool;
  private logger: Logger;
  private writeSidecar: SidecarWriter | null;
  private historySize: number;
  private closed = false;

  /** Current record of every event still running or queued */
  private live = new Map<string, PipelineRecord>();
  private pending = new Map<string, Promise<PipelineRecord>>();
  /** Finished records, oldest first */
  private history = new Map<string, PipelineRecord>();

  constructor(options: CoordinatorOptions) {
    this.options = options;
    this.logger = options.logger ?? createLogger('pipeline');
    this.pool = new TaskPool({ maxConcurrency: options.maxConcurrentEvents ?? 4, logger: this.logger.child('pool') });
    this.writeSidecar = options.writeSidecar === undefined ? writeSidecarResult : options.writeSidecar;
    this.historySize = options.historySize ?? 200;
  }

  static fromConfig(config: RelayConfig, logger: Logger = createLogger('pipeline', { debug: config.debug })) {
    const forwarder = new RetryingForwarder({ defaultBackoff: config.backoff, logger: createLogger('forward', { debug: config.debug }) });

    const sinks: SinkConfig[] = [];
    if (config.ingest) sinks.push({ name: 'ingest', kind: 'ingest', ...config.ingest });
    if (config.dashboardRefresh) sinks.push({ name: 'dashboard', kind: 'refresh', ...config.dashboardRefresh });

    return new PipelineCoordinator({
      prompts: new PromptExtractionClient({ url: config.prompts.url }),
      detector: new DetectionClient({ url: config.detection.url }),
      annotator: new AnnotationWriter({ preferServiceImage: config.annotateInService }),
      publisher: new DownstreamPublisher(sinks, forwarder, {
        onlyWithDetections: config.publishOnlyWithDetections,
        logger: createLogger('publish', { debug: config.debug }),
      }),
      forwarder,
      promptPolicy: { perAttemptTimeoutMs: config.prompts.timeoutMs, maxAttempts: config.prompts.maxAttempts },
      detectionPolicy: { perAttemptTimeoutMs: config.detection.timeoutMs, maxAttempts: config.detection.maxAttempts },
      annotateInService: config.annotateInService,
      maxConcurrentEvents: config.maxConcurrentEvents,
      historySize: config.historySize,
      logger,
    });
  }

  /**
   * Process an event. Submitting an id that is already running returns the
   * same pending result instead of starting a second run; a differing caption
   * on the duplicate is logged and dropped. Never rejects.
   */
  submit(event: CaptureEvent): Promise<PipelineRecord> {
    const existing = this.pending.get(event.id);
    if (existing) {
      const running = this.live.get(event.id)?.event.caption;
      if (running !== undefined && running !== event.caption) {
        this.logger.warn('caption dropped, event already running', {
          event: event.id,
          running_caption: running,
          dropped_caption: event.caption,
        });
      } else {
        this.logger.debug('duplicate submit ignored', { event: event.id });
      }
      return existing;
    }

    if (this.closed) {
      return Promise.resolve(this.finish(this.shutdownFailure(createRecord(event))));
    }

    const initial = createRecord(event);
    this.live.set(event.id, initial);

    const promise = this.pool
      .run(() => this.run(initial))
      .catch((error: unknown) => this.recover(event, error))
      .then((record) => this.finish(record));

    this.pending.set(event.id, promise);
    return promise;
  }

  get(id: string): PipelineRecord | undefined {
    return this.live.get(id) ?? this.history.get(id);
  }

  /** Most recently finished records, newest first */
  latest(limit = 20): PipelineRecord[] {
    return Array.from(this.history.values()).reverse().slice(0, limit);
  }

  getStats() {
    const pool = this.pool.getStats();
    return { inFlight: this.pending.size, running: pool.inFlight, queued: pool.queued, closed: this.closed };
  }

  /**
   * Stop accepting events and wait for running ones. Events still queued are
   * finished as Failed with kind "shutdown".
   */
  async close(): Promise<void> {
    this.closed = true;
    await this.pool.drain();
    await Promise.all(Array.from(this.pending.values()));
  }

  // ============================================
  // Stages
  // ============================================

  private async run(initial: PipelineRecord): Promise<PipelineRecord> {
    const { event } = initial;
    const started = Date.now();
    let record = initial;

    const caption: Caption = { text: event.caption, receivedAt: new Date().toISOString() };
    record = this.update(withCaption(record, caption));

    const objects = await this.options.forwarder.forwardCall(this.options.prompts, caption, this.options.promptPolicy);
    if (objects.kind !== 'success') return this.failHop(record, objects);
    record = this.update(withObjects(record, objects.value));

    const detection = await this.options.forwarder.forwardCall(
      this.options.detector,
      { event, queries: objects.value, annotate: this.options.annotateInService ?? false },
      this.options.detectionPolicy
    );
    if (detection.kind !== 'success') return this.failHop(record, detection);
    record = this.update(withDetection(record, detection.value));

    try {
      const artifact = await this.options.annotator.annotate(event, detection.value);
      const annotated = withArtifact(record, artifact);
      if (this.writeSidecar) {
        const sidecarPath = await this.writeSidecar(event.imagePath, toResultPayload(annotated));
        record = this.update({ ...annotated, sidecarPath });
      } else {
        record = this.update(annotated);
      }
    } catch (error) {
      logErrorDetails(`[pipeline] annotation failed event=${event.id} `, error);
      return this.update(withFailure(record, { kind: 'local', message: errorMessage(error), attempts: 1 }));
    }

    let publish: PublishOutcome;
    try {
      publish = await this.options.publisher.publish(record);
    } catch (error) {
      logErrorDetails(`[pipeline] publish threw event=${event.id} `, error);
      publish = { ok: false, skipped: false, deliveries: [] };
    }
    record = this.update(withPublish(record, publish));

    this.logger.info('done', {
      event: event.id,
      status: recordStatus(record),
      objects: objects.value.length,
      boxes: detection.value.boxes.length,
      elapsed_ms: Date.now() - started,
    });
    return record;
  }

  private failHop(record: PipelineRecord, outcome: Exclude<ForwardOutcome<unknown>, { kind: 'success' }>): PipelineRecord {
    const error = outcome.kind === 'exhausted' ? outcome.lastError : outcome.reason;
    let kind: FailureKind = outcome.kind === 'exhausted' ? 'transient' : 'non_transient';
    if (error instanceof RelayError && error.kind === 'local') kind = 'local';

    const failed = this.update(withFailure(record, { kind, message: errorMessage(error), attempts: outcome.attempts }));
    this.logger.warn('failed', {
      event: record.id,
      stage: failed.failure?.stage,
      kind,
      attempts: outcome.attempts,
      error: errorMessage(error),
    });
    return failed;
  }

  // ============================================
  // Bookkeeping
  // ============================================

  private update(record: PipelineRecord): PipelineRecord {
    this.live.set(record.id, record);
    this.logger.debug('transition', { event: record.id, state: record.state });
    return record;
  }

  private recover(event: CaptureEvent, error: unknown): PipelineRecord {
    const current = this.live.get(event.id) ?? createRecord(event);
    if (isTerminal(current)) return current;
    if (error instanceof PoolClosedError) return this.shutdownFailure(current);

    logErrorDetails(`[pipeline] unexpected error event=${event.id} `, error);
    return withFailure(current, { kind: 'local', message: errorMessage(error), attempts: 0 });
  }

  private shutdownFailure(record: PipelineRecord): PipelineRecord {
    return withFailure(record, { kind: 'shutdown', message: 'relay shutting down', attempts: 0 });
  }

  private finish(record: PipelineRecord): PipelineRecord {
    this.live.delete(record.id);
    this.pending.delete(record.id);
    this.history.delete(record.id);
    this.history.set(record.id, record);
    while (this.history.size > this.historySize) {
      const oldest = this.history.keys().next();
      if (oldest.done) break;
      this.history.delete(oldest.value);
    }
    return record;
  }
}
