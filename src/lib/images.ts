import { randomUUID } from "node:crypto";
import { mkdir, unlink, writeFile } from "node:fs/promises";
import path from "node:path";
import { AppError } from "./errors";

export interface ImageStore {
  /** Stores a `data:image/...;base64,` payload and returns its public URL. */
  save(dataUri: string, folder: string): Promise<string>;
  remove(url: string): Promise<void>;
}

const EXTENSIONS: Record<string, string> = {
  png: "png",
  jpeg: "jpg",
  jpg: "jpg",
  gif: "gif",
  webp: "webp",
};

export type DecodedImage = { extension: string; bytes: Buffer };

export const parseDataUri = (value: string, field = "image"): DecodedImage => {
  const match = /^data:image\/([a-z+.-]+);base64,([A-Za-z0-9+/=\s]+)$/i.exec(value);
  const extension = match ? EXTENSIONS[match[1].toLowerCase()] : undefined;
  if (!match || !extension) {
    throw new AppError("InvalidField", `${field}: expected a base64 encoded png, jpeg, gif or webp image.`, field);
  }
  const bytes = Buffer.from(match[2], "base64");
  if (bytes.length === 0) throw new AppError("InvalidField", `${field}: image is empty.`, field);
  return { extension, bytes };
};

/** Writes images under `root` and serves them under `publicPrefix`. */
export class DiskImageStore implements ImageStore {
  constructor(
    private readonly root: string,
    private readonly publicPrefix: string
  ) {}

  async save(dataUri: string, folder: string): Promise<string> {
    const { extension, bytes } = parseDataUri(dataUri);
    const name = `${randomUUID()}.${extension}`;
    await mkdir(path.join(this.root, folder), { recursive: true });
    await writeFile(path.join(this.root, folder, name), bytes);
    return `${this.publicPrefix}${folder}/${name}`;
  }

  async remove(url: string): Promise<void> {
    if (!url.startsWith(this.publicPrefix)) return;
    const relative = path.normalize(url.slice(this.publicPrefix.length));
    if (relative.startsWith("..") || path.isAbsolute(relative)) return;
    try {
      await unlink(path.join(this.root, relative));
    } catch (e) {
      if (!(e instanceof Error && "code" in e && e.code === "ENOENT")) throw e;
    }
  }
}
