export type ConvertFormat = "" | "JPEG" | "WEBP";

export interface Dimensions {
  readonly width: number;
  readonly height: number;
}

export interface ProcessingSettings {
  // Bounding box limits, applied orientation-aware (long edge / short edge)
  readonly maxWidth: number;
  readonly maxHeight: number;
  // 0 disables the narrow-side strategy
  readonly maxNarrowSide: number;
  readonly jpegQuality: number;
  readonly webpQuality: number;
  // "" keeps the source format and only resizes
  readonly convertToFormat: ConvertFormat;
  // Rewrite the file extension when the bytes change format
  readonly normalizeExtensions: boolean;
}

export interface ProcessingResult {
  readonly processedBytes: Buffer;
  readonly wasCompressed: boolean;
  readonly wasResized: boolean;
  // Missing when the input could not be decoded as an image
  readonly newDimensions?: Dimensions;
  readonly processingError?: Error;
}

export const JPEG_MIME_TYPE = "image/jpeg";
export const WEBP_MIME_TYPE = "image/webp";
export const DEFAULT_MIME_TYPE = "application/octet-stream";

export const EXIF_ORIENTATION_NORMAL = 1;

export function normalizeConvertFormat(value: string | undefined): ConvertFormat {
  const normalized = (value ?? "").trim().toUpperCase();
  if (normalized === "JPEG" || normalized === "WEBP") {
    return normalized;
  }
  return "";
}
