import type { Dimensions, ProcessingSettings } from "../config/processingConfig";

function scaleDimensions(original: Dimensions, scale: number): Dimensions {
  // Truncate, never round; keep at least one pixel on extreme aspect ratios.
  return {
    width: Math.max(1, Math.trunc(original.width * scale)),
    height: Math.max(1, Math.trunc(original.height * scale)),
  };
}

/**
 * Shrinks the image so its shorter side is at most `maxNarrowSide`.
 * The long side is left unconstrained.
 */
export function calculateNarrowSideResize(
  original: Dimensions,
  maxNarrowSide: number
): Dimensions {
  const narrowSide = Math.min(original.width, original.height);
  if (narrowSide <= maxNarrowSide) {
    return original;
  }
  return scaleDimensions(original, maxNarrowSide / narrowSide);
}

/**
 * Fits the image into the configured box. The larger limit always applies to
 * the image's long edge, so portrait images get the box turned on its side.
 * Square images count as landscape.
 */
export function calculateBoundingBoxResize(
  original: Dimensions,
  maxWidth: number,
  maxHeight: number
): Dimensions {
  const longLimit = Math.max(maxWidth, maxHeight);
  const shortLimit = Math.min(maxWidth, maxHeight);

  const isLandscape = original.width >= original.height;
  const effectiveMaxWidth = isLandscape ? longLimit : shortLimit;
  const effectiveMaxHeight = isLandscape ? shortLimit : longLimit;

  if (original.width <= effectiveMaxWidth && original.height <= effectiveMaxHeight) {
    return original;
  }

  const scale = Math.min(
    effectiveMaxWidth / original.width,
    effectiveMaxHeight / original.height
  );
  return scaleDimensions(original, scale);
}

export function calculateResizeDimensions(
  original: Dimensions,
  settings: ProcessingSettings
): Dimensions {
  if (settings.maxNarrowSide > 0) {
    return calculateNarrowSideResize(original, settings.maxNarrowSide);
  }
  return calculateBoundingBoxResize(original, settings.maxWidth, settings.maxHeight);
}

export function sameDimensions(a: Dimensions, b: Dimensions): boolean {
  return a.width === b.width && a.height === b.height;
}
