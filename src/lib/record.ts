/**
 * PipelineRecord transitions. Every function returns a new record; the only
 * legal order is Received -> CaptionReady -> ObjectsReady -> DetectionReady
 * -> AnnotatedReady -> Published, with Failed reachable from any non-terminal
 * state. Published and Failed are terminal.
 */
import path from 'path';
import { InvalidTransitionError } from './errors';
import {
  PIPELINE_STAGES,
  type AnnotatedArtifact,
  type Caption,
  type CaptureEvent,
  type DetectionResult,
  type ObjectQuery,
  type PipelineRecord,
  type PipelineStage,
  type PublishOutcome,
  type RecordStatus,
  type ResultPayload,
  type StageFailure,
} from './types';

const now = () => new Date().toISOString();

export function isTerminal(record: PipelineRecord): boolean {
  return record.state === 'Published' || record.state === 'Failed';
}

/** Stage the record would reach next, or null when it is terminal. */
export function nextStage(record: PipelineRecord): PipelineStage | null {
  if (record.state === 'Failed') return null;
  const index = PIPELINE_STAGES.indexOf(record.state);
  return PIPELINE_STAGES[index + 1] ?? null;
}

function advance(
  record: PipelineRecord,
  to: PipelineStage,
  patch: Partial<Omit<PipelineRecord, 'id' | 'event' | 'state' | 'transitions' | 'failure'>>
): PipelineRecord {
  const expected = nextStage(record);
  if (expected !== to) {
    throw new InvalidTransitionError(`record ${record.id}: cannot move from ${record.state} to ${to}`);
  }
  return {
    ...record,
    ...patch,
    state: to,
    transitions: [...record.transitions, { state: to, at: now() }],
  };
}

export function createRecord(event: CaptureEvent): PipelineRecord {
  return {
    id: event.id,
    event,
    state: 'Received',
    transitions: [{ state: 'Received', at: now() }],
  };
}

export function withCaption(record: PipelineRecord, caption: Caption): PipelineRecord {
  return advance(record, 'CaptionReady', { caption });
}

export function withObjects(record: PipelineRecord, objects: ObjectQuery): PipelineRecord {
  return advance(record, 'ObjectsReady', { objects: [...objects] });
}

export function withDetection(record: PipelineRecord, detection: DetectionResult): PipelineRecord {
  return advance(record, 'DetectionReady', { detection });
}

export function withArtifact(record: PipelineRecord, artifact: AnnotatedArtifact, sidecarPath?: string): PipelineRecord {
  return advance(record, 'AnnotatedReady', { artifact, sidecarPath });
}

export function withPublish(record: PipelineRecord, publish: PublishOutcome): PipelineRecord {
  return advance(record, 'Published', { publish });
}

/** Freeze the record at the stage it failed to reach. */
export function withFailure(record: PipelineRecord, failure: Omit<StageFailure, 'stage'>): PipelineRecord {
  const stage = nextStage(record);
  if (!stage) {
    throw new InvalidTransitionError(`record ${record.id}: already terminal (${record.state})`);
  }
  return {
    ...record,
    state: 'Failed',
    failure: { ...failure, stage },
    transitions: [...record.transitions, { state: 'Failed', at: now() }],
  };
}

export function recordStatus(record: PipelineRecord): RecordStatus {
  if (record.state === 'Failed') return 'failed';
  if (record.state !== 'Published') return 'in_progress';
  return record.publish?.ok === false ? 'publish_failed' : 'published';
}

// ==========================================
// VIEWS
// ==========================================

export function toResultPayload(record: PipelineRecord): ResultPayload {
  const { event } = record;
  return {
    event_id: record.id,
    image_path: event.imagePath,
    image_name: path.basename(event.imagePath),
    captured_at: event.capturedAt,
    pose: event.pose ? { ...event.pose } : null,
    caption: record.caption?.text ?? event.caption,
    objects: record.objects ? [...record.objects] : [],
    detections: record.detection ? record.detection.boxes.map((b) => ({ label: b.label, score: b.score, bbox: b.bbox })) : [],
    image_size: record.detection?.imageSize ?? (record.artifact ? { width: record.artifact.width, height: record.artifact.height } : null),
    artifact_path: record.artifact?.path ?? null,
    // time of the last transition; identical across re-publishes of one record
    processed_at: record.transitions[record.transitions.length - 1]?.at ?? event.capturedAt,
  };
}

/** JSON-safe summary for status queries. */
export function summarizeRecord(record: PipelineRecord) {
  return {
    event_id: record.id,
    status: recordStatus(record),
    state: record.state,
    image_path: record.event.imagePath,
    caption: record.caption?.text ?? null,
    objects: record.objects ?? null,
    detections: record.detection?.boxes ?? null,
    artifact_path: record.artifact?.path ?? null,
    sidecar_path: record.sidecarPath ?? null,
    publish: record.publish ?? null,
    failure: record.failure ?? null,
    transitions: record.transitions,
  };
}
