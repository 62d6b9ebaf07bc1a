export type BBox = [number, number, number, number]; // [x1, y1, x2, y2] in pixels, or 0–1 when normalized

export type Pose = {
  x?: number;
  y?: number;
  z?: number;
  yaw?: number;
};

export type CaptureEvent = {
  readonly id: string;
  /** Absolute path of the captured frame */
  readonly imagePath: string;
  /** ISO timestamp */
  readonly capturedAt: string;
  readonly caption: string;
  readonly pose?: Readonly<Pose>;
  readonly metadata?: Readonly<Record<string, unknown>>;
};

export type Caption = {
  text: string;
  receivedAt: string;
};

/** Ordered, distinct detector prompts. Empty means "nothing to detect". */
export type ObjectQuery = string[];

export type DetectionBox = {
  label: string;
  score: number | null;
  bbox: BBox;
};

export type DetectionResult = {
  boxes: DetectionBox[];
  imageSize?: { width: number; height: number };
  latencySec?: number;
  /** Pre-annotated JPEG returned by the detection service when asked for one */
  annotatedImage?: Buffer;
};

export type AnnotatedArtifact = {
  path: string;
  width: number;
  height: number;
  boxCount: number;
  source: 'local' | 'service';
};

// ==========================================
// PIPELINE STATE
// ==========================================

export const PIPELINE_STAGES = [
  'Received',
  'CaptionReady',
  'ObjectsReady',
  'DetectionReady',
  'AnnotatedReady',
  'Published',
] as const;

export type PipelineStage = (typeof PIPELINE_STAGES)[number];

export type FailureKind = 'transient' | 'non_transient' | 'local' | 'shutdown';

export type StageFailure = {
  /** The stage the record was trying to reach */
  stage: PipelineStage;
  kind: FailureKind;
  message: string;
  attempts: number;
};

export type SinkDelivery = {
  sink: string;
  url: string;
  delivered: boolean;
  attempts: number;
  status?: number;
  error?: string;
};

export type PublishOutcome = {
  ok: boolean;
  skipped: boolean;
  deliveries: SinkDelivery[];
};

export type StageTransition = {
  state: PipelineStage | 'Failed';
  at: string;
};

export type PipelineRecord = {
  readonly id: string;
  readonly event: CaptureEvent;
  readonly state: PipelineStage | 'Failed';
  readonly caption?: Caption;
  readonly objects?: ObjectQuery;
  readonly detection?: DetectionResult;
  readonly artifact?: AnnotatedArtifact;
  readonly sidecarPath?: string;
  readonly publish?: PublishOutcome;
  readonly failure?: StageFailure;
  readonly transitions: readonly StageTransition[];
};

export type RecordStatus = 'in_progress' | 'published' | 'publish_failed' | 'failed';

/** Structured result handed to sinks and written into the sidecar JSON. */
export type ResultPayload = {
  event_id: string;
  image_path: string;
  image_name: string;
  captured_at: string;
  pose: Pose | null;
  caption: string;
  objects: string[];
  detections: DetectionBox[];
  image_size: { width: number; height: number } | null;
  artifact_path: string | null;
  processed_at: string;
};
