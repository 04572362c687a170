import { createHash } from "node:crypto";
import { mkdir, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import type { ObjectStore } from "../../domain/providers.js";
import type { ObjectAck } from "../../domain/types.js";
import { StorageError } from "../../domain/errors.js";

/** Directory-backed store laid out as `<root>/<bucket>/<key>`, for dry runs. */
export class LocalObjectStore implements ObjectStore {
  public readonly name = "local";

  public constructor(private readonly root: string) {}

  public async put(bucket: string, key: string, content: Buffer): Promise<ObjectAck> {
    const fullPath = join(this.root, bucket, key);
    try {
      await mkdir(dirname(fullPath), { recursive: true });
      await writeFile(fullPath, content);
    } catch (error) {
      throw new StorageError(`write ${fullPath} failed`, error);
    }
    return { bucket, key, etag: createHash("md5").update(content).digest("hex") };
  }
}
