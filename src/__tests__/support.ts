/**
 * Shared fakes for unit tests. Nothing here opens a socket: HTTP goes through
 * an in-process axios adapter and the model is a scripted capability.
 */

import axios, { AxiosError, type AxiosInstance, type AxiosResponse, type InternalAxiosRequestConfig } from "axios";
import pino, { type Logger } from "pino";
import sharp from "sharp";
import type { RawModelOutput, ResolvedImage } from "../domain/inference";
import type { ClassNames, ModelCapability, PredictParams } from "../services/inference/modelCapability";

export const silentLogger = (): Logger => pino({ level: "silent" });

export interface StubReply {
  status: number;
  data?: unknown;
}

export type StubHandler = (config: InternalAxiosRequestConfig) => StubReply | Promise<StubReply>;

/**
 * Axios instance whose transport is `handler`. Status validation mirrors the
 * built-in adapters, so non-2xx replies reject with an AxiosError.
 */
export function stubHttp(handler: StubHandler): AxiosInstance {
  return axios.create({
    adapter: async (config) => {
      const reply = await handler(config);
      const response: AxiosResponse = {
        data: reply.data ?? null,
        status: reply.status,
        statusText: String(reply.status),
        headers: {},
        config,
        request: {},
      };
      const validate = config.validateStatus ?? ((status: number) => status >= 200 && status < 300);
      if (validate(response.status)) {
        return response;
      }
      throw new AxiosError(
        `Request failed with status code ${response.status}`,
        AxiosError.ERR_BAD_RESPONSE,
        config,
        {},
        response,
      );
    },
  });
}

/** Small solid-colour PNG. */
export function pngBytes(width = 4, height = 3): Promise<Buffer> {
  return sharp({ create: { width, height, channels: 3, background: { r: 200, g: 40, b: 10 } } })
    .png()
    .toBuffer();
}

export function fakeImage(source: string): ResolvedImage {
  return {
    source,
    encoded: Buffer.from("not-really-an-image"),
    format: "png",
    width: 1,
    height: 1,
    channels: 3,
    pixels: Buffer.alloc(3),
  };
}

export type PredictFn = (image: ResolvedImage, params: PredictParams) => Promise<RawModelOutput>;

export class FakeModel implements ModelCapability {
  readonly name = "fake-model";
  readonly calls: Array<{ source: string; params: PredictParams }> = [];
  active = 0;
  peak = 0;

  constructor(
    readonly classNames: ClassNames,
    private readonly predictFn: PredictFn,
  ) {}

  async predict(image: ResolvedImage, params: PredictParams): Promise<RawModelOutput> {
    this.calls.push({ source: image.source, params });
    this.active++;
    this.peak = Math.max(this.peak, this.active);
    try {
      return await this.predictFn(image, params);
    } finally {
      this.active--;
    }
  }
}

export const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/** Classification output with a full probability vector. */
export const probsOutput = (data: number[]): RawModelOutput => ({
  probs: { data },
  speed: { preprocess: 1.25, inference: 10.5, postprocess: 0.75 },
});
