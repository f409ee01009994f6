import sharp from "sharp";
import type { ConvertFormat } from "../config/processingConfig";

export type TargetFormat = "preserve" | Exclude<ConvertFormat, "">;

export interface ImageMetadata {
  width: number;
  height: number;
  hasAlpha: boolean;
  // EXIF orientation, 1 when the image carries none
  orientation: number;
  format?: string;
}

export interface EncodeOptions {
  width: number;
  height: number;
  quality?: number;
  format: TargetFormat;
}

/**
 * Pixel-level operations the decision pipeline relies on. Every method
 * rejects when the input is not a decodable image.
 */
export interface ImageCodec {
  decodeMetadata(bytes: Buffer): Promise<ImageMetadata>;
  transformEncode(bytes: Buffer, options: EncodeOptions): Promise<Buffer>;
  autoRotate(bytes: Buffer): Promise<Buffer>;
}

export const sharpCodec: ImageCodec = {
  async decodeMetadata(bytes) {
    const metadata = await sharp(bytes).metadata();
    if (!metadata.width || !metadata.height) {
      throw new Error(
        `Could not determine image dimensions (format: ${metadata.format ?? "unknown"})`
      );
    }
    return {
      width: metadata.width,
      height: metadata.height,
      hasAlpha: metadata.hasAlpha ?? false,
      orientation: metadata.orientation ?? 1,
      format: metadata.format,
    };
  },

  async transformEncode(bytes, { width, height, quality, format }) {
    // Orientation is already baked in by autoRotate, so no implicit rotation here.
    let image = sharp(bytes).resize(width, height, { fit: "fill" });

    if (format === "JPEG") {
      return image.jpeg({ quality }).toBuffer();
    }
    if (format === "WEBP") {
      return image.webp({ quality }).toBuffer();
    }

    // sharp silently writes PNG for inputs it cannot re-encode (SVG, PDF...),
    // which would no longer match the declared content type.
    const { format: inputFormat } = await image.metadata();
    const { data, info } = await image.toBuffer({ resolveWithObject: true });
    if (info.format !== inputFormat) {
      throw new Error(
        `Resizing would change format from ${inputFormat ?? "unknown"} to ${info.format}`
      );
    }
    return data;
  },

  async autoRotate(bytes) {
    return sharp(bytes).rotate().toBuffer();
  },
};
