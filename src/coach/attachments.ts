import { randomUUID } from "crypto";
import { IMAGE_EXTENSIONS, type ImageInput } from "../lib/images.js";
import { userBucket, type KnowledgeStore } from "../storage/knowledgeStore.js";
import type { Attachment } from "../storage/types.js";

export interface UploadOptions {
  ownerId: string | null;
  /** Bucket for uploads without an owner. */
  defaultBucket: string;
  /** Overrides the per-user bucket. */
  bucket?: string;
  metadata?: Record<string, unknown>;
  lessonId?: string | null;
  queryId?: string | null;
}

/** Store the image bytes and record an attachment row pointing at them. */
export async function uploadImage(store: KnowledgeStore, image: ImageInput, options: UploadOptions): Promise<Attachment> {
  const bucket = options.bucket ?? (options.ownerId ? userBucket(options.ownerId) : options.defaultBucket);
  const path = `attachments/${randomUUID()}.${IMAGE_EXTENSIONS[image.contentType]}`;
  const object = await store.putObject(bucket, path, image.bytes, image.contentType);
  return store.insertAttachment({
    ownerId: options.ownerId,
    bucket: object.bucket,
    path: object.path,
    publicUrl: object.signedUrl,
    metadata: { content_type: image.contentType, size: image.bytes.length, ...options.metadata },
    lessonId: options.lessonId ?? null,
    queryId: options.queryId ?? null,
  });
}
