import { describe, it, expect } from "vitest";
import { generateShortLink, randomShortLink, shortLinkUrl } from "../../../src/lib/shortLink";

describe("randomShortLink", () => {
  it("draws six alphanumeric characters", () => {
    for (let i = 0; i < 20; i++) {
      expect(randomShortLink()).toMatch(/^[A-Za-z0-9]{6}$/);
    }
  });
});

describe("generateShortLink", () => {
  it("redraws until a candidate is free", async () => {
    const draws = ["taken1", "taken2", "free01"];
    const taken = new Set(["taken1", "taken2"]);
    const seen: string[] = [];
    const hash = await generateShortLink(
      async (candidate) => {
        seen.push(candidate);
        return taken.has(candidate);
      },
      () => draws.shift() ?? "unused"
    );
    expect(hash).toBe("free01");
    expect(seen).toEqual(["taken1", "taken2", "free01"]);
  });
});

describe("shortLinkUrl", () => {
  it("joins base and hash with one slash", () => {
    expect(shortLinkUrl("http://localhost:4000/s/", "abc123")).toBe("http://localhost:4000/s/abc123");
    expect(shortLinkUrl("http://localhost:4000/s", "abc123")).toBe("http://localhost:4000/s/abc123");
  });
});
