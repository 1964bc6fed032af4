import { describe, it, expect } from "vitest";
import { SIGNATURE_HEADER, signPayload, verifySignature } from "../signing";

describe("signPayload", () => {
  it("formats HMAC-SHA256 as sha256=<hex>", () => {
    // RFC 4231 test case 2
    expect(signPayload("what do ya want for nothing?", "Jefe")).toBe(
      "sha256=5bdcc146bf60754e6a042426089575c75a003f089d2739839dec58b964ec3843",
    );
  });

  it("signs strings and buffers with the same bytes identically", () => {
    const body = JSON.stringify({ request_id: "r-1", results: [] });
    expect(signPayload(Buffer.from(body, "utf8"), "test-secret")).toBe(signPayload(body, "test-secret"));
  });

  it("uses the X-Signature header", () => {
    expect(SIGNATURE_HEADER).toBe("X-Signature");
  });
});

describe("verifySignature", () => {
  const body = JSON.stringify({ request_id: "r-1", results: [] });
  const signature = signPayload(body, "test-secret");

  it("accepts the signature of the exact body", () => {
    expect(verifySignature(body, signature, "test-secret")).toBe(true);
    expect(verifySignature(Buffer.from(body), signature, "test-secret")).toBe(true);
  });

  it("rejects a body altered by one byte", () => {
    const tampered = body.replace("r-1", "r-2");
    expect(verifySignature(tampered, signature, "test-secret")).toBe(false);
  });

  it("rejects a different secret", () => {
    expect(verifySignature(body, signature, "other-secret")).toBe(false);
  });

  it("rejects malformed signatures without throwing", () => {
    expect(verifySignature(body, undefined, "test-secret")).toBe(false);
    expect(verifySignature(body, "md5=abc", "test-secret")).toBe(false);
    expect(verifySignature(body, "sha256=not-hex", "test-secret")).toBe(false);
    expect(verifySignature(body, signature.slice(0, -2), "test-secret")).toBe(false);
  });
});
