import {
  DeleteObjectsCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
} from "@aws-sdk/client-s3";
import { readFile } from "node:fs/promises";
import type { IArtifactMirror } from "../../core/domain/services/artifact-mirror.service.js";
import { normalizeRelativePath } from "../utils/storage.utils.js";

export interface S3MirrorOptions {
  bucket: string;
  region: string;
  prefix?: string;
  client?: S3Client;
}

export class S3ArtifactMirror implements IArtifactMirror {
  readonly name = "s3";
  private s3Client: S3Client;

  constructor(private options: S3MirrorOptions) {
    this.s3Client = options.client ?? new S3Client({ region: options.region });
  }

  keyFor(remotePath: string): string {
    const prefix = normalizeRelativePath(this.options.prefix ?? "");
    const path = normalizeRelativePath(remotePath);
    return prefix ? `${prefix}/${path}` : path;
  }

  async uploadFile(localPath: string, remotePath: string): Promise<void> {
    await this.s3Client.send(
      new PutObjectCommand({
        Bucket: this.options.bucket,
        Key: this.keyFor(remotePath),
        Body: await readFile(localPath),
      }),
    );
  }

  async deleteFolder(remotePath: string): Promise<void> {
    const prefix = `${this.keyFor(remotePath)}/`;
    let token: string | undefined;
    do {
      const page = await this.s3Client.send(
        new ListObjectsV2Command({
          Bucket: this.options.bucket,
          Prefix: prefix,
          ContinuationToken: token,
        }),
      );
      const keys = (page.Contents ?? [])
        .map((o) => o.Key)
        .filter((k): k is string => typeof k === "string");
      if (keys.length > 0) {
        await this.s3Client.send(
          new DeleteObjectsCommand({
            Bucket: this.options.bucket,
            Delete: { Objects: keys.map((Key) => ({ Key })) },
          }),
        );
      }
      token = page.IsTruncated ? page.NextContinuationToken : undefined;
    } while (token);
  }
}
