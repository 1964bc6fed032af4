import path from "node:path";
import { describe, it, expect } from "vitest";
import { loadConfig } from "../config";
import { ConfigError } from "../domain/errors";

describe("loadConfig", () => {
  it("applies defaults to an empty environment", () => {
    const config = loadConfig({});

    expect(config).toMatchObject({
      port: 8000,
      host: "0.0.0.0",
      logLevel: "info",
      device: undefined,
      defaults: { imgsz: 640, conf: 0.25, iou: 0.45 },
      maxInflight: 2,
      maxFetchInflight: 8,
      s3: { enabled: true, region: undefined, endpoint: undefined },
      inboundToken: "",
      sharedSecret: "",
      callback: { timeoutMs: 60000, maxRetries: 0, retryBaseMs: 1500 },
      roundDigits: 5,
      topK: 5,
      localMode: false,
      trackerMaxEntries: 1000,
    });
    expect(path.isAbsolute(config.modelPath)).toBe(true);
    expect(config.modelPath.endsWith(path.join("models", "model.json"))).toBe(true);
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("coerces numbers and boolean flags from strings", () => {
    const config = loadConfig({
      PORT: "9001",
      MAX_INFLIGHT: "4",
      CALLBACK_MAX_RETRIES: "3",
      LOCAL_MODE: "yes",
      ENABLE_S3: "false",
      CONF: "0.5",
    });

    expect(config.port).toBe(9001);
    expect(config.maxInflight).toBe(4);
    expect(config.callback.maxRetries).toBe(3);
    expect(config.localMode).toBe(true);
    expect(config.s3.enabled).toBe(false);
    expect(config.defaults.conf).toBe(0.5);
  });

  it("treats empty optional values as unset", () => {
    const config = loadConfig({ DEVICE: "", AWS_REGION: "  ", LOCAL_MODE: "" });
    expect(config.device).toBeUndefined();
    expect(config.s3.region).toBeUndefined();
    expect(config.localMode).toBe(false);
  });

  it("trims the inbound token", () => {
    expect(loadConfig({ INBOUND_TOKEN: "  test-token  " }).inboundToken).toBe("test-token");
  });

  it("keeps absolute model paths as given", () => {
    expect(loadConfig({ MODEL_PATH: "/opt/models/detector.json" }).modelPath).toBe("/opt/models/detector.json");
  });

  it("rejects a zero admission budget", () => {
    expect(() => loadConfig({ MAX_INFLIGHT: "0" })).toThrow(ConfigError);
    expect(() => loadConfig({ MAX_INFLIGHT: "0" })).toThrow(/MAX_INFLIGHT/);
  });

  it("rejects out-of-range thresholds and unknown log levels", () => {
    expect(() => loadConfig({ CONF: "1.5" })).toThrow(/CONF/);
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow(ConfigError);
  });

  it("rejects unparsable boolean flags", () => {
    expect(() => loadConfig({ LOCAL_MODE: "sometimes" })).toThrow(/LOCAL_MODE/);
  });
});
