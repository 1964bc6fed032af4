import { randomUUID } from "node:crypto";
import { z } from "zod";
import type { InferenceParams, InferenceRequest } from "../domain/inference";

const httpUrl = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), { message: "callback_url must be an http(s) URL" });

const paramFields = {
  imgsz: z.number().int().positive().optional(),
  conf: z.number().min(0).max(1).optional(),
  iou: z.number().min(0).max(1).optional(),
};

// Echoed back byte-for-byte, so validated but never trimmed
const opaqueString = z.string().refine((value) => value.trim().length > 0, { message: "must not be blank" });

// Params may come nested under `params` or flat on the body (older clients)
export const syncInferBodySchema = z.object({
  request_id: opaqueString.refine((value) => value.length <= 256, { message: "at most 256 characters" }).optional(),
  urls: z.array(opaqueString).min(1),
  callback_url: httpUrl.optional(),
  params: z.object(paramFields).optional(),
  ...paramFields,
});

export const asyncInferBodySchema = syncInferBodySchema.extend({
  callback_url: httpUrl,
});

export type SyncInferBody = z.infer<typeof syncInferBodySchema>;

export function toInferenceRequest(body: SyncInferBody, defaults: Readonly<InferenceParams>): InferenceRequest {
  const params: InferenceParams = {
    imgsz: body.params?.imgsz ?? body.imgsz ?? defaults.imgsz,
    conf: body.params?.conf ?? body.conf ?? defaults.conf,
    iou: body.params?.iou ?? body.iou ?? defaults.iou,
  };
  return Object.freeze({
    request_id: body.request_id ?? randomUUID(),
    sources: Object.freeze([...body.urls]),
    ...(body.callback_url !== undefined && { callback_url: body.callback_url }),
    params: Object.freeze(params),
  });
}

const speedSchema = z.object({
  preprocess: z.number(),
  inference: z.number(),
  postprocess: z.number(),
});

const classificationOutcomeSchema = z.object({
  status: z.literal("success"),
  source: z.string(),
  speed_ms: speedSchema,
  task: z.literal("classification"),
  payload: z.object({
    top_k_confidences: z.array(z.number()),
    predictions: z.array(z.object({ class_id: z.number().int(), label: z.string(), score: z.number() })),
  }),
});

const detectionOutcomeSchema = z.object({
  status: z.literal("success"),
  source: z.string(),
  speed_ms: speedSchema,
  task: z.literal("detection"),
  payload: z.object({
    detections: z.array(
      z.object({
        bbox_xyxy: z.tuple([z.number(), z.number(), z.number(), z.number()]),
        score: z.number().nullable(),
        class_id: z.number().int().nullable(),
        label: z.string().nullable(),
      }),
    ),
  }),
});

const failureOutcomeSchema = z.object({
  status: z.literal("failure"),
  source: z.string(),
  error_type: z.enum(["source", "model"]),
  reason: z.enum(["unsupported_scheme", "malformed_uri", "not_found", "transport", "decode", "model_error"]),
  error_message: z.string(),
});

/** Wire shape of a BatchResult, as posted to callbacks. */
export const batchResultSchema = z.object({
  request_id: z.string().min(1),
  results: z.array(z.union([classificationOutcomeSchema, detectionOutcomeSchema, failureOutcomeSchema])),
});
