/**
 * RemoteModel - model capability backed by an HTTP model server.
 *
 * Posts the encoded image as multipart form data together with the
 * inference params, and expects a JSON body in the raw output shape
 * (`probs` for classifiers, `boxes` for detectors, optional `speed`).
 */

import axios, { type AxiosInstance } from "axios";
import FormData from "form-data";
import type { Logger } from "pino";
import type { RawModelOutput, ResolvedImage } from "../../domain/inference";
import { rawModelOutputSchema } from "./rawOutput";
import type { ClassNames, ModelCapability, ModelManifest, PredictParams } from "./modelCapability";

const MIME_BY_FORMAT: Record<string, string> = {
  jpeg: "image/jpeg",
  jpg: "image/jpeg",
  png: "image/png",
  webp: "image/webp",
  gif: "image/gif",
  tiff: "image/tiff",
};

export class RemoteModel implements ModelCapability {
  readonly name: string;
  readonly classNames: ClassNames;
  private readonly client: AxiosInstance;
  private readonly logger: Logger;

  constructor(manifest: ModelManifest, logger: Logger, client?: AxiosInstance) {
    this.name = manifest.name;
    this.classNames = manifest.names;
    this.logger = logger.child({ component: "remote-model", model: manifest.name });
    // No timeout: the model call runs to completion
    this.client =
      client ??
      axios.create({
        baseURL: manifest.endpoint,
        timeout: 0,
        headers: { Accept: "application/json", ...manifest.headers },
      });
    this.logger.info({ endpoint: manifest.endpoint }, "Remote model client initialized");
  }

  async predict(image: ResolvedImage, params: PredictParams): Promise<RawModelOutput> {
    const form = new FormData();
    form.append("file", image.encoded, {
      filename: "image",
      contentType: MIME_BY_FORMAT[image.format] ?? "application/octet-stream",
    });
    form.append("imgsz", String(params.imgsz));
    form.append("conf", String(params.conf));
    form.append("iou", String(params.iou));
    if (params.device) {
      form.append("device", params.device);
    }

    const response = await this.client.post<unknown>("", form, {
      headers: form.getHeaders(),
      maxBodyLength: Infinity,
    });

    const parsed = rawModelOutputSchema.safeParse(response.data);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
      throw new Error(`Model server returned an unexpected body: ${issues}`);
    }
    return parsed.data;
  }
}
