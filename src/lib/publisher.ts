/**
 * Best-effort fan-out of a finished record to the configured sinks. Sinks are
 * delivered concurrently and independently; a failed sink never affects the
 * others or the record's pipeline state.
 */
import path from 'path';
import { errorMessage, HttpError } from './errors';
import type { RetryingForwarder } from './forwarder';
import { request } from './http';
import { createLogger, type Logger } from './log';
import { toResultPayload } from './record';
import type { PipelineRecord, PublishOutcome, SinkDelivery } from './types';

export type SinkKind = 'ingest' | 'refresh';

export type SinkConfig = {
  name: string;
  kind: SinkKind;
  url: string;
  timeoutMs: number;
  maxAttempts: number;
};

export type PublisherOptions = {
  /** Skip every sink when detection found nothing */
  onlyWithDetections?: boolean;
  logger?: Logger;
};

function sinkBody(kind: SinkKind, record: PipelineRecord): unknown {
  const payload = toResultPayload(record);
  if (kind === 'refresh') {
    return { event_id: payload.event_id, image_name: payload.image_name };
  }
  return payload;
}

function sinkHeaders(kind: SinkKind, record: PipelineRecord): Record<string, string> {
  // Sinks key on the event id, so delivering the same record twice is harmless.
  const headers: Record<string, string> = { 'X-Event-Id': record.id };
  if (kind === 'ingest' && record.sidecarPath) {
    headers['X-Sidecar-Basename'] = path.basename(record.sidecarPath);
  }
  return headers;
}

export class DownstreamPublisher {
  private logger: Logger;

  constructor(
    private sinks: SinkConfig[],
    private forwarder: RetryingForwarder,
    private options: PublisherOptions = {}
  ) {
    this.logger = options.logger ?? createLogger('publish');
  }

  async publish(record: PipelineRecord): Promise<PublishOutcome> {
    const boxCount = record.detection?.boxes.length ?? 0;
    if (this.options.onlyWithDetections && boxCount === 0) {
      this.logger.info('skipped, no detections', { event: record.id });
      return { ok: true, skipped: true, deliveries: [] };
    }

    const deliveries = await Promise.all(this.sinks.map((sink) => this.deliver(sink, record)));
    const ok = deliveries.every((d) => d.delivered);
    if (!ok) {
      const failed = deliveries.filter((d) => !d.delivered).map((d) => d.sink);
      this.logger.warn('degraded', { event: record.id, failed_sinks: failed.join(',') });
    }
    return { ok, skipped: false, deliveries };
  }

  private async deliver(sink: SinkConfig, record: PipelineRecord): Promise<SinkDelivery> {
    const body = sinkBody(sink.kind, record);
    const headers = sinkHeaders(sink.kind, record);

    const outcome = await this.forwarder.forward(
      (signal) => request({ url: sink.url, json: body, headers, signal }),
      { perAttemptTimeoutMs: sink.timeoutMs, maxAttempts: sink.maxAttempts },
      `publish:${sink.name}`
    );

    if (outcome.kind === 'success') {
      return { sink: sink.name, url: sink.url, delivered: true, attempts: outcome.attempts, status: outcome.value.status };
    }

    const error = outcome.kind === 'exhausted' ? outcome.lastError : outcome.reason;
    const delivery: SinkDelivery = {
      sink: sink.name,
      url: sink.url,
      delivered: false,
      attempts: outcome.attempts,
      error: errorMessage(error),
    };
    if (error instanceof HttpError) delivery.status = error.status;
    return delivery;
  }
}
