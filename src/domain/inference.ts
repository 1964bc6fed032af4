export type RequestId = string;

export interface InferenceParams {
  imgsz: number;
  conf: number;
  iou: number;
}

export interface InferenceRequest {
  readonly request_id: RequestId;
  readonly sources: readonly string[];
  readonly callback_url?: string;
  readonly params: Readonly<InferenceParams>;
}

export interface ResolvedImage {
  source: string;
  encoded: Buffer; // original bytes as fetched
  format: string;
  width: number;
  height: number;
  channels: number;
  pixels: Buffer; // raw sRGB, `channels` bytes per pixel
}

export interface SpeedMs {
  preprocess: number;
  inference: number;
  postprocess: number;
}

/**
 * What a model capability hands back for one image. Classification models fill
 * `probs`, detection models fill `boxes`.
 */
export interface RawModelOutput {
  probs?: {
    data?: number[];
    top5?: number[];
    top5conf?: number[];
  } | null;
  boxes?: {
    xyxy: number[][];
    conf?: number[] | null;
    cls?: number[] | null;
  } | null;
  speed?: Partial<SpeedMs> | null;
}

export interface ClassPrediction {
  class_id: number;
  label: string;
  score: number;
}

export interface ClassificationPayload {
  top_k_confidences: number[];
  predictions: ClassPrediction[];
}

export type BBoxXYXY = [number, number, number, number];

export interface Detection {
  bbox_xyxy: BBoxXYXY;
  score: number | null;
  class_id: number | null;
  label: string | null;
}

export interface DetectionPayload {
  detections: Detection[];
}

export type NormalizedResult =
  | { task: "classification"; payload: ClassificationPayload }
  | { task: "detection"; payload: DetectionPayload };

export type TaskTag = NormalizedResult["task"];

export type SourceErrorReason =
  | "unsupported_scheme"
  | "malformed_uri"
  | "not_found"
  | "transport"
  | "decode";

export type SuccessOutcome = NormalizedResult & {
  status: "success";
  source: string;
  speed_ms: SpeedMs;
};

export interface FailureOutcome {
  status: "failure";
  source: string;
  error_type: "source" | "model";
  reason: SourceErrorReason | "model_error";
  error_message: string;
}

export type InferenceOutcome = SuccessOutcome | FailureOutcome;

export interface BatchResult {
  request_id: RequestId;
  results: InferenceOutcome[];
}
