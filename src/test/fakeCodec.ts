import { vi } from "vitest";
import type { EncodeOptions, ImageCodec, ImageMetadata } from "../utils/imageCodec";

export interface FakeImage {
  format?: string;
  width: number;
  height: number;
  alpha?: boolean;
  orientation?: number;
  // Total byte length of the encoded buffer
  size?: number;
}

// Encodes image properties as text followed by padding up to `size` bytes.
export function fakeImage({
  format = "png",
  width,
  height,
  alpha = false,
  orientation = 1,
  size = 1000,
}: FakeImage): Buffer {
  const header = `FAKE;${format};${width};${height};${alpha ? 1 : 0};${orientation};`;
  return Buffer.from(header.padEnd(size, "#"));
}

export function readFakeImage(bytes: Buffer): ImageMetadata {
  const parts = bytes.toString().split(";");
  if (parts[0] !== "FAKE" || parts.length < 7) {
    throw new Error("Input buffer contains unsupported image format");
  }
  return {
    format: parts[1],
    width: Number(parts[2]),
    height: Number(parts[3]),
    hasAlpha: parts[4] === "1",
    orientation: Number(parts[5]),
  };
}

export interface FakeCodecOptions {
  // Byte length of whatever transformEncode produces
  encodedSize?: (options: EncodeOptions, input: Buffer) => number;
  failTransform?: boolean;
  failRotate?: boolean;
  // Extra bytes autoRotate adds to its output
  rotationGrowth?: number;
}

export function createFakeCodec({
  encodedSize = (_options, input) => input.length,
  failTransform = false,
  failRotate = false,
  rotationGrowth = 10,
}: FakeCodecOptions = {}) {
  const codec = {
    decodeMetadata: vi.fn(async (bytes: Buffer) => readFakeImage(bytes)),
    transformEncode: vi.fn(async (bytes: Buffer, options: EncodeOptions) => {
      if (failTransform) throw new Error("vips: transform failed");
      const source = readFakeImage(bytes);
      return fakeImage({
        format:
          options.format === "preserve" ? source.format : options.format.toLowerCase(),
        width: options.width,
        height: options.height,
        alpha: source.hasAlpha,
        size: encodedSize(options, bytes),
      });
    }),
    autoRotate: vi.fn(async (bytes: Buffer) => {
      if (failRotate) throw new Error("vips: rotate failed");
      const source = readFakeImage(bytes);
      // Orientations 5-8 turn the image by 90 degrees.
      const swaps = source.orientation >= 5;
      return fakeImage({
        format: source.format,
        width: swaps ? source.height : source.width,
        height: swaps ? source.width : source.height,
        alpha: source.hasAlpha,
        size: bytes.length + rotationGrowth,
      });
    }),
  } satisfies ImageCodec;
  return codec;
}
