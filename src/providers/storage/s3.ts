import { PutObjectCommand, type PutObjectCommandOutput, S3Client } from "@aws-sdk/client-s3";
import type { ObjectStore } from "../../domain/providers.js";
import type { ObjectAck } from "../../domain/types.js";
import { StorageError } from "../../domain/errors.js";

export type PutObjectSender = {
  send(command: PutObjectCommand): Promise<PutObjectCommandOutput>;
};

export class S3ObjectStore implements ObjectStore {
  public readonly name = "s3";

  public constructor(private readonly client: PutObjectSender) {}

  public static forRegion(region: string): S3ObjectStore {
    return new S3ObjectStore(new S3Client({ region }));
  }

  public async put(bucket: string, key: string, content: Buffer, contentType: string): Promise<ObjectAck> {
    let out: PutObjectCommandOutput;
    try {
      out = await this.client.send(
        new PutObjectCommand({
          Bucket: bucket,
          Key: key,
          Body: content,
          ContentLength: content.byteLength,
          ContentType: contentType,
        }),
      );
    } catch (error) {
      throw new StorageError(`put s3://${bucket}/${key} failed`, error);
    }
    return { bucket, key, etag: out.ETag };
  }
}
