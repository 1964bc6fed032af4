/**
 * Result Normalizer
 *
 * Converts raw model output into the task-tagged records sent to callers:
 * - classification: top-K predictions, descending by score, with labels
 * - detection: one entry per box in model order, optionally filtered by score
 *
 * All non-integer numbers in the payload are rounded to a fixed precision.
 */

import type {
  BBoxXYXY,
  ClassPrediction,
  ClassificationPayload,
  Detection,
  DetectionPayload,
  NormalizedResult,
  RawModelOutput,
  SpeedMs,
} from "../domain/inference";
import { ModelError } from "../domain/errors";
import { roundFloats } from "../utils/rounding";
import { labelFor, type ClassNames } from "./inference/modelCapability";
import { classifyRawOutput, type BoxesOutput, type ProbsOutput } from "./inference/rawOutput";

export interface ResultNormalizerOptions {
  classNames: ClassNames;
  topK: number;
  roundDigits: number;
}

export interface NormalizeOptions {
  /** Drop detections whose score is below this value. */
  scoreThreshold?: number;
}

export class ResultNormalizer {
  constructor(private readonly options: ResultNormalizerOptions) {}

  normalize(raw: RawModelOutput, opts: NormalizeOptions = {}): NormalizedResult {
    const shape = classifyRawOutput(raw);
    switch (shape.kind) {
      case "probs":
        return {
          task: "classification",
          payload: roundFloats(this.classification(shape.probs), this.options.roundDigits),
        };
      case "boxes":
        return {
          task: "detection",
          payload: roundFloats(this.detection(shape.boxes, opts.scoreThreshold), this.options.roundDigits),
        };
      case "empty":
        throw new ModelError("Unrecognized model output: neither class probabilities nor boxes");
      case "invalid":
        throw new ModelError(`Malformed model output: ${shape.issues}`);
      default: {
        const unreachable: never = shape;
        throw new ModelError(`Unhandled output shape ${JSON.stringify(unreachable)}`);
      }
    }
  }

  roundSpeed(speed: SpeedMs): SpeedMs {
    return roundFloats(speed, this.options.roundDigits);
  }

  private classification(probs: ProbsOutput): ClassificationPayload {
    const ranked = rankClasses(probs).slice(0, this.options.topK);
    const predictions: ClassPrediction[] = ranked.map(({ classId, score }) => ({
      class_id: classId,
      label: labelFor(this.options.classNames, classId) ?? String(classId),
      score,
    }));
    return {
      top_k_confidences: predictions.map((p) => p.score),
      predictions,
    };
  }

  private detection(boxes: BoxesOutput, scoreThreshold?: number): DetectionPayload {
    const conf = boxes.conf ?? [];
    const cls = boxes.cls ?? [];
    const detections: Detection[] = [];

    boxes.xyxy.forEach((box, i) => {
      const score = i < conf.length ? conf[i] : null;
      if (scoreThreshold !== undefined && score !== null && score < scoreThreshold) {
        return;
      }
      const classId = i < cls.length ? Math.trunc(cls[i]) : null;
      const bbox: BBoxXYXY = [box[0], box[1], box[2], box[3]];
      detections.push({
        bbox_xyxy: bbox,
        score,
        class_id: classId,
        label: labelFor(this.options.classNames, classId),
      });
    });

    return { detections };
  }
}

/**
 * Classes ordered by descending score; ties keep the lower class id first.
 * Uses the full probability vector when the model provides it.
 */
function rankClasses(probs: ProbsOutput): Array<{ classId: number; score: number }> {
  let entries: Array<{ classId: number; score: number }>;
  if (probs.data) {
    entries = probs.data.map((score, classId) => ({ classId, score }));
  } else {
    const ids = probs.top5 ?? [];
    const scores = probs.top5conf ?? [];
    const n = Math.min(ids.length, scores.length);
    entries = [];
    for (let i = 0; i < n; i++) {
      entries.push({ classId: ids[i], score: scores[i] });
    }
  }
  return entries.sort((a, b) => b.score - a.score || a.classId - b.classId);
}
