import { existsSync } from "node:fs";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { AppError } from "../../../src/lib/errors";
import { DiskImageStore, parseDataUri } from "../../../src/lib/images";
import { PNG } from "../../support/fixtures";

describe("parseDataUri", () => {
  it("decodes a png payload", () => {
    const { extension, bytes } = parseDataUri(PNG);
    expect(extension).toBe("png");
    expect(bytes.subarray(1, 4).toString("latin1")).toBe("PNG");
  });

  it("normalizes jpeg to jpg", () => {
    expect(parseDataUri("data:image/jpeg;base64,/9j/4AAQ").extension).toBe("jpg");
  });

  it("rejects other payloads", () => {
    expect(() => parseDataUri("https://example.com/cat.png")).toThrow(AppError);
    expect(() => parseDataUri("data:image/svg+xml;base64,PHN2Zz4=")).toThrow(AppError);
    expect(() => parseDataUri("data:text/plain;base64,aGVsbG8=")).toThrow(AppError);
  });
});

describe("DiskImageStore", () => {
  let root: string;
  let images: DiskImageStore;

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), "recipe-images-"));
    images = new DiskImageStore(root, "/media/");
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("writes the decoded bytes under the folder", async () => {
    const url = await images.save(PNG, "recipes");
    expect(url).toMatch(/^\/media\/recipes\/[0-9a-f-]+\.png$/);
    const written = await readFile(path.join(root, url.slice("/media/".length)));
    expect(written.equals(parseDataUri(PNG).bytes)).toBe(true);
  });

  it("removes saved files and tolerates missing ones", async () => {
    const url = await images.save(PNG, "recipes");
    const file = path.join(root, url.slice("/media/".length));
    await images.remove(url);
    expect(existsSync(file)).toBe(false);
    await images.remove(url);
  });

  it("ignores urls outside the media root", async () => {
    const url = await images.save(PNG, "recipes");
    await images.remove("/media/../outside.png");
    await images.remove("/elsewhere/recipes/file.png");
    expect(existsSync(path.join(root, url.slice("/media/".length)))).toBe(true);
  });
});
