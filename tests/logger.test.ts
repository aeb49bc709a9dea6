import { describe, expect, it } from "vitest";
import { createCredentialHandle } from "../src/credentials/CredentialHandle.js";
import { serialize } from "../src/logger.js";

describe("serialize", () => {
  it("redacts values under secret-looking keys at any depth", () => {
    const out = serialize({
      token: "abc",
      repository: "github.com/acme/widgets",
      nested: { password: "p", note: "x", privateKey: "k" },
    });
    expect(out).toEqual({
      token: "[redacted]",
      repository: "github.com/acme/widgets",
      nested: { password: "[redacted]", note: "x", privateKey: "[redacted]" },
    });
  });

  it("keeps null and undefined under secret keys as they are", () => {
    expect(serialize({ secret: null })).toEqual({ secret: null });
  });

  it("turns errors into plain objects", () => {
    const out = serialize({ error: new Error("boom") });
    expect(out).toMatchObject({ error: { name: "Error", message: "boom" } });
  });

  it("renders dates as ISO strings", () => {
    expect(serialize({ at: new Date("2026-01-02T03:04:05.000Z") })).toEqual({ at: "2026-01-02T03:04:05.000Z" });
  });

  it("never exposes a credential secret", () => {
    const handle = createCredentialHandle("pat", "test-secret", { expiresAt: new Date("2026-06-01T00:00:00Z") });
    const text = JSON.stringify(serialize({ credential: handle }));
    expect(text).toBe('{"credential":{"tag":"pat","expiresAt":"2026-06-01T00:00:00.000Z","scope":"read"}}');
  });
});
