import { promises as fs } from "node:fs";
import { z } from "zod";
import type { InferenceParams, RawModelOutput, ResolvedImage } from "../../domain/inference";
import { ConfigError, errorMessage } from "../../domain/errors";

/** Class index → name. Exported models ship either a list or an id-keyed map. */
export type ClassNames = string[] | Record<string, string>;

export interface PredictParams extends InferenceParams {
  device?: string;
}

/**
 * The model as seen by the service: one blocking predict per image.
 */
export interface ModelCapability {
  readonly name: string;
  readonly classNames: ClassNames;
  predict(image: ResolvedImage, params: PredictParams): Promise<RawModelOutput>;
  close?(): Promise<void>;
}

export function labelFor(names: ClassNames, classId: number | null): string | null {
  if (classId === null) return null;
  if (Array.isArray(names)) {
    return classId >= 0 && classId < names.length ? names[classId] : String(classId);
  }
  return names[String(classId)] ?? String(classId);
}

const manifestSchema = z.object({
  name: z.string().min(1),
  endpoint: z.string().url().refine((u) => /^https?:\/\//i.test(u), "endpoint must be http(s)"),
  names: z.union([z.array(z.string()), z.record(z.string())]),
  headers: z.record(z.string()).default({}),
});

export type ModelManifest = z.infer<typeof manifestSchema>;

/**
 * Read and validate the model artifact manifest. Any problem is a ConfigError:
 * the service must not report healthy without a usable model.
 */
export async function loadModelManifest(manifestPath: string): Promise<ModelManifest> {
  let text: string;
  try {
    text = await fs.readFile(manifestPath, "utf8");
  } catch (error) {
    throw new ConfigError(`Model artifact not readable at ${manifestPath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Model artifact ${manifestPath} is not valid JSON: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const parsed = manifestSchema.safeParse(json);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigError(`Model artifact ${manifestPath} is invalid: ${details}`);
  }
  return parsed.data;
}
