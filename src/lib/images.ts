import { ValidationError } from "./errors.js";
import { createLogger } from "./log.js";

const log = createLogger("images");

export type ImageContentType = "image/png" | "image/jpeg" | "image/webp";

export interface ImageInput {
  bytes: Uint8Array;
  contentType: ImageContentType;
}

export interface ImageLimits {
  minPixels: number;
  maxPixels: number;
  maxBytes: number;
}

export const IMAGE_EXTENSIONS: Record<ImageContentType, string> = {
  "image/png": "png",
  "image/jpeg": "jpg",
  "image/webp": "webp",
};

/** Content type from the file signature, or null for anything that is not PNG, JPEG or WebP. */
export function detectImageType(bytes: Uint8Array): ImageContentType | null {
  if (bytes.length >= 8 && bytes[0] === 0x89 && bytes[1] === 0x50 && bytes[2] === 0x4e && bytes[3] === 0x47) {
    return "image/png";
  }
  if (bytes.length >= 3 && bytes[0] === 0xff && bytes[1] === 0xd8 && bytes[2] === 0xff) return "image/jpeg";
  if (
    bytes.length >= 12 &&
    String.fromCharCode(bytes[0], bytes[1], bytes[2], bytes[3]) === "RIFF" &&
    String.fromCharCode(bytes[8], bytes[9], bytes[10], bytes[11]) === "WEBP"
  ) {
    return "image/webp";
  }
  return null;
}

function readUint16(bytes: Uint8Array, at: number): number {
  return (bytes[at] << 8) | bytes[at + 1];
}

function readUint32(bytes: Uint8Array, at: number): number {
  return ((bytes[at] << 24) >>> 0) + (bytes[at + 1] << 16) + (bytes[at + 2] << 8) + bytes[at + 3];
}

/**
 * Width and height from a PNG IHDR chunk or a JPEG start-of-frame marker.
 * Returns null when the header cannot be read (WebP, truncated files).
 */
export function imageDimensions(bytes: Uint8Array): { width: number; height: number } | null {
  const type = detectImageType(bytes);
  if (type === "image/png") {
    if (bytes.length < 24) return null;
    return { width: readUint32(bytes, 16), height: readUint32(bytes, 20) };
  }
  if (type !== "image/jpeg") return null;

  let at = 2;
  while (at + 9 < bytes.length) {
    if (bytes[at] !== 0xff) return null;
    const marker = bytes[at + 1];
    // SOF0..SOF15 carry the frame size; C4, C8 and CC share the range but are not frames
    if (marker >= 0xc0 && marker <= 0xcf && marker !== 0xc4 && marker !== 0xc8 && marker !== 0xcc) {
      return { height: readUint16(bytes, at + 5), width: readUint16(bytes, at + 7) };
    }
    at += 2 + readUint16(bytes, at + 2);
  }
  return null;
}

/**
 * Decode a base64 payload or a `data:image/...;base64,` URL and check it against the limits.
 * Images above `maxPixels` are accepted and logged.
 */
export function decodeImage(payload: string, limits: ImageLimits): ImageInput {
  const m = /^data:([^;,]+);base64,(.*)$/s.exec(payload.trim());
  const base64 = (m ? m[2] : payload).replace(/\s+/g, "");
  if (!base64 || !/^[A-Za-z0-9+/]+={0,2}$/.test(base64)) throw new ValidationError("Image must be base64 encoded");

  const bytes = new Uint8Array(Buffer.from(base64, "base64"));
  const contentType = detectImageType(bytes);
  if (!contentType) throw new ValidationError("Unsupported image type; use PNG, JPEG or WebP");
  if (bytes.length > limits.maxBytes) {
    throw new ValidationError(`Image is ${bytes.length} bytes; the limit is ${limits.maxBytes}`);
  }

  const size = imageDimensions(bytes);
  if (size) {
    const pixels = size.width * size.height;
    if (pixels < limits.minPixels) {
      throw new ValidationError(`Image too small (${size.width}x${size.height}); at least ${limits.minPixels} pixels are needed`);
    }
    if (pixels > limits.maxPixels) log.info(`large image ${size.width}x${size.height} passed through`);
  }
  return { bytes, contentType };
}

export function toDataUrl(image: ImageInput): string {
  return `data:${image.contentType};base64,${Buffer.from(image.bytes).toString("base64")}`;
}
