import {
  DEFAULT_MIME_TYPE,
  JPEG_MIME_TYPE,
  WEBP_MIME_TYPE,
  type ProcessingResult,
  type ProcessingSettings,
} from "../config/processingConfig";

export interface FileMeta {
  filename: string;
  mimeType: string;
}

/**
 * Replaces everything after the last dot of the file name with `extension`,
 * or appends it when there is no dot. Dots in directory segments don't count.
 */
export function changeExtension(filename: string, extension: string): string {
  const lastSlash = Math.max(filename.lastIndexOf("/"), filename.lastIndexOf("\\"));
  const lastDot = filename.lastIndexOf(".");
  if (lastDot <= lastSlash) {
    return filename + extension;
  }
  return filename.slice(0, lastDot) + extension;
}

export const changeExtensionToJPG = (filename: string) =>
  changeExtension(filename, ".JPG");

export const changeExtensionToWebP = (filename: string) =>
  changeExtension(filename, ".WEBP");

/**
 * Picks the file name and content type for the outgoing file part so that
 * both always describe the bytes actually being sent.
 */
export function reconcileFileMeta(
  originalFilename: string,
  originalMimeType: string | undefined,
  result: ProcessingResult,
  settings: ProcessingSettings
): FileMeta {
  const original: FileMeta = {
    filename: originalFilename,
    mimeType: originalMimeType || DEFAULT_MIME_TYPE,
  };

  // Not an image, codec failure, or the original bytes were kept.
  if (result.processingError || !result.wasCompressed) {
    return original;
  }

  switch (settings.convertToFormat) {
    case "JPEG":
      return {
        filename: settings.normalizeExtensions
          ? changeExtensionToJPG(originalFilename)
          : originalFilename,
        mimeType: JPEG_MIME_TYPE,
      };
    case "WEBP":
      return {
        filename: settings.normalizeExtensions
          ? changeExtensionToWebP(originalFilename)
          : originalFilename,
        mimeType: WEBP_MIME_TYPE,
      };
    default:
      // Compressed without a target format can't happen; keep what we know.
      return original;
  }
}
