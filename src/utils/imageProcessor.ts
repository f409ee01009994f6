import type {
  Dimensions,
  ProcessingResult,
  ProcessingSettings,
} from "../config/processingConfig";
import { calculateResizeDimensions, sameDimensions } from "./dimensions";
import { toError } from "./errors";
import { sharpCodec, type ImageCodec, type TargetFormat } from "./imageCodec";
import { correctOrientation, detectTransparency } from "./imagePreprocessor";
import type { LogEventFn } from "./logService";

export interface ProcessImageOptions {
  codec?: ImageCodec;
  logEventFn?: LogEventFn;
}

function failed(
  bytes: Buffer,
  error: Error,
  dimensions?: Dimensions
): ProcessingResult {
  return {
    processedBytes: bytes,
    wasCompressed: false,
    wasResized: false,
    newDimensions: dimensions,
    processingError: error,
  };
}

function formatLabel(size: Dimensions): string {
  return `${size.width}x${size.height}`;
}

/**
 * Decides what to send downstream for one uploaded file: the original bytes,
 * a resized copy in the same format, or a re-encoded JPEG/WebP. Never
 * rejects; failures are reported in `processingError` and the result always
 * carries a usable buffer.
 */
export async function processImage(
  originalBytes: Buffer,
  settings: ProcessingSettings,
  options: ProcessImageOptions = {}
): Promise<ProcessingResult> {
  const codec = options.codec ?? sharpCodec;
  const logEventFn = options.logEventFn;
  const convertFormat = settings.convertToFormat;

  // Step 1: transparent sources are never converted (JPEG has no alpha and
  // resized WebP does not reliably keep it).
  if (convertFormat !== "") {
    const transparency = await detectTransparency(originalBytes, codec);
    if (transparency.hasTransparency) {
      logEventFn?.({
        status: "skipped",
        message: `Skipping ${convertFormat} conversion - image has transparency`,
      });
      return {
        processedBytes: originalBytes,
        wasCompressed: false,
        wasResized: false,
      };
    }
  }

  // Step 2: bake in EXIF orientation; these bytes are the baseline from here on.
  const workingBytes = await correctOrientation(originalBytes, codec, logEventFn);

  // Step 3: size of the oriented image.
  let originalSize: Dimensions;
  try {
    const { width, height } = await codec.decodeMetadata(workingBytes);
    originalSize = { width, height };
  } catch (err) {
    const error = toError(err);
    logEventFn?.({
      status: "skipped",
      message: "Not a decodable image, passing through unchanged",
      error: error.message,
    });
    return failed(workingBytes, error);
  }

  // Step 4
  const targetSize = calculateResizeDimensions(originalSize, settings);
  const needsResize = !sameDimensions(targetSize, originalSize);

  // Step 5a: no conversion, resize only.
  if (convertFormat === "") {
    if (!needsResize) {
      logEventFn?.({
        status: "skipped",
        message: `No resize needed (${formatLabel(originalSize)})`,
      });
      return {
        processedBytes: workingBytes,
        wasCompressed: false,
        wasResized: false,
        newDimensions: originalSize,
      };
    }

    try {
      const resized = await codec.transformEncode(workingBytes, {
        width: targetSize.width,
        height: targetSize.height,
        format: "preserve",
      });
      logEventFn?.({
        status: "processing",
        message: `Resized ${formatLabel(originalSize)} → ${formatLabel(targetSize)}`,
      });
      return {
        processedBytes: resized,
        wasCompressed: false,
        wasResized: true,
        newDimensions: targetSize,
      };
    } catch (err) {
      const error = toError(err);
      logEventFn?.({
        status: "warning",
        message: "Resize failed, keeping original image",
        error: error.message,
      });
      return failed(workingBytes, error, originalSize);
    }
  }

  // Step 5b: conversion to JPEG or WebP, kept only when it is strictly smaller.
  const targetFormat: TargetFormat = convertFormat;
  const quality =
    targetFormat === "WEBP" ? settings.webpQuality : settings.jpegQuality;

  let converted: Buffer;
  try {
    converted = await codec.transformEncode(workingBytes, {
      width: targetSize.width,
      height: targetSize.height,
      quality,
      format: targetFormat,
    });
  } catch (err) {
    const error = toError(err);
    logEventFn?.({
      status: "warning",
      message: `Conversion to ${targetFormat} failed, keeping original image`,
      error: error.message,
    });
    return failed(workingBytes, error, originalSize);
  }

  const wasCompressed = converted.length < workingBytes.length;
  logEventFn?.({
    status: "processing",
    message: wasCompressed
      ? `Conversion to ${targetFormat} successful: ${workingBytes.length} → ${converted.length} bytes`
      : `Conversion to ${targetFormat} skipped - would increase size: ${workingBytes.length} → ${converted.length} bytes`,
  });

  return {
    processedBytes: wasCompressed ? converted : workingBytes,
    wasCompressed,
    wasResized: needsResize,
    newDimensions: wasCompressed ? targetSize : originalSize,
  };
}
