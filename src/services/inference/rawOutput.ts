import { z } from "zod";
import type { RawModelOutput } from "../../domain/inference";

const finite = z.number().finite();

const probsSchema = z
  .object({
    data: z.array(finite).optional(),
    top5: z.array(z.number().int()).optional(),
    top5conf: z.array(finite).optional(),
  })
  .refine((p) => p.data !== undefined || (p.top5 !== undefined && p.top5conf !== undefined), {
    message: "probs needs either data or top5 + top5conf",
  });

const boxesSchema = z
  .object({
    xyxy: z.array(z.array(finite).length(4)),
    conf: z.array(finite).nullish(),
    cls: z.array(finite).nullish(),
  });

const speedSchema = z
  .object({
    preprocess: z.number().optional(),
    inference: z.number().optional(),
    postprocess: z.number().optional(),
  })
  .partial();

export const rawModelOutputSchema = z.object({
  probs: probsSchema.nullish(),
  boxes: boxesSchema.nullish(),
  speed: speedSchema.nullish(),
});

export type ProbsOutput = z.infer<typeof probsSchema>;
export type BoxesOutput = z.infer<typeof boxesSchema>;

/**
 * Closed view of a raw output. Classification wins when a model reports both,
 * matching how single-task models are exported.
 */
export type RawShape =
  | { kind: "probs"; probs: ProbsOutput }
  | { kind: "boxes"; boxes: BoxesOutput }
  | { kind: "empty" }
  | { kind: "invalid"; issues: string };

export function classifyRawOutput(raw: RawModelOutput | unknown): RawShape {
  const parsed = rawModelOutputSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      kind: "invalid",
      issues: parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; "),
    };
  }
  const { probs, boxes } = parsed.data;
  if (probs) return { kind: "probs", probs };
  if (boxes) return { kind: "boxes", boxes };
  return { kind: "empty" };
}
