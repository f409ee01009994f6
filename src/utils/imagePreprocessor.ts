import { EXIF_ORIENTATION_NORMAL } from "../config/processingConfig";
import { toError } from "./errors";
import { sharpCodec, type ImageCodec } from "./imageCodec";
import type { LogEventFn } from "./logService";

export interface TransparencyCheck {
  hasTransparency: boolean;
  // Set when the metadata could not be read; hasTransparency is false then
  error?: Error;
}

export async function detectTransparency(
  bytes: Buffer,
  codec: ImageCodec = sharpCodec
): Promise<TransparencyCheck> {
  try {
    const metadata = await codec.decodeMetadata(bytes);
    return { hasTransparency: metadata.hasAlpha };
  } catch (err) {
    return { hasTransparency: false, error: toError(err) };
  }
}

/**
 * Applies the EXIF orientation to the pixels. Best effort: whenever the
 * orientation can't be read or the rotation fails, the input comes back
 * unchanged. The returned bytes are the baseline for every later size query
 * and size comparison.
 */
export async function correctOrientation(
  bytes: Buffer,
  codec: ImageCodec = sharpCodec,
  logEventFn?: LogEventFn
): Promise<Buffer> {
  let orientation: number;
  try {
    ({ orientation } = await codec.decodeMetadata(bytes));
  } catch {
    // Not an image; the caller finds out when it decodes the size.
    return bytes;
  }

  if (orientation <= EXIF_ORIENTATION_NORMAL) {
    return bytes;
  }

  try {
    const rotatedBytes = await codec.autoRotate(bytes);
    logEventFn?.({
      status: "processing",
      message: `EXIF orientation ${orientation} applied`,
    });
    return rotatedBytes;
  } catch (err) {
    logEventFn?.({
      status: "warning",
      message: "EXIF rotation failed, keeping original orientation",
      error: toError(err).message,
    });
    return bytes;
  }
}
