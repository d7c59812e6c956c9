import { describe, expect, it } from "vitest";
import { ValidationError } from "../../src/lib/errors.js";
import { decodeImage, detectImageType, imageDimensions, toDataUrl } from "../../src/lib/images.js";
import { base64, pngBytes } from "../helpers.js";

const limits = { minPixels: 224 * 224, maxPixels: 1280 * 1280, maxBytes: 1024 };

function jpegBytes(width: number, height: number): Uint8Array {
  return new Uint8Array([
    0xff, 0xd8,
    // APP0 segment, 16 bytes long
    0xff, 0xe0, 0x00, 0x10, ...new Array<number>(14).fill(0),
    0xff, 0xc0, 0x00, 0x11, 0x08, height >> 8, height & 0xff, width >> 8, width & 0xff, 0x03,
    ...new Array<number>(8).fill(0),
  ]);
}

describe("imageDimensions", () => {
  it("reads the PNG header", () => {
    expect(imageDimensions(pngBytes(640, 480))).toEqual({ width: 640, height: 480 });
  });

  it("reads the JPEG start-of-frame marker past other segments", () => {
    expect(imageDimensions(jpegBytes(800, 600))).toEqual({ width: 800, height: 600 });
  });

  it("returns null for WebP", () => {
    const webp = new Uint8Array([...Buffer.from("RIFF"), 0, 0, 0, 0, ...Buffer.from("WEBPVP8 ")]);
    expect(detectImageType(webp)).toBe("image/webp");
    expect(imageDimensions(webp)).toBeNull();
  });
});

describe("decodeImage", () => {
  it("accepts a base64 PNG above the minimum size", () => {
    const image = decodeImage(base64(pngBytes(300, 300)), limits);
    expect(image.contentType).toBe("image/png");
    expect(image.bytes).toHaveLength(33);
  });

  it("accepts a data URL", () => {
    const image = decodeImage(`data:image/jpeg;base64,${base64(jpegBytes(400, 300))}`, limits);
    expect(image.contentType).toBe("image/jpeg");
  });

  it("rejects images below the minimum pixel count", () => {
    expect(() => decodeImage(base64(pngBytes(100, 100)), limits)).toThrow(
      "Image too small (100x100); at least 50176 pixels are needed"
    );
  });

  it("rejects payloads over the byte limit", () => {
    expect(() => decodeImage(base64(pngBytes(300, 300)), { ...limits, maxBytes: 10 })).toThrow(
      "Image is 33 bytes; the limit is 10"
    );
  });

  it("rejects content that is not PNG, JPEG or WebP", () => {
    expect(() => decodeImage(base64(new Uint8Array(Buffer.from("GIF89a-not-allowed"))), limits)).toThrow(ValidationError);
    expect(() => decodeImage("%%%", limits)).toThrow("Image must be base64 encoded");
  });
});

it("builds a data URL from bytes and type", () => {
  expect(toDataUrl({ bytes: new Uint8Array([1, 2, 3]), contentType: "image/png" })).toBe("data:image/png;base64,AQID");
});
