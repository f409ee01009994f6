// upload-reformer/src/config/appConfig.ts
import { logger } from "../utils/logger";
import {
  normalizeConvertFormat,
  type ConvertFormat,
  type ProcessingSettings,
} from "./processingConfig";

export interface AppConfig {
  readonly port: number;
  readonly maxWidth: number;
  readonly maxHeight: number;
  readonly maxNarrowSide: number;
  readonly jpegQuality: number;
  readonly webpQuality: number;
  readonly normalizeExtensions: boolean;
  readonly convertToFormat: ConvertFormat;
  readonly uploadMaxSize: number;
  readonly forwardDestination: string;
  readonly forwardTimeoutMs: number;
  readonly fileUploadFieldName: string;
  readonly listenPath: string;
}

export const DEFAULT_CONFIG: AppConfig = Object.freeze<AppConfig>({
  port: 6743,
  maxWidth: 1920,
  maxHeight: 1080,
  maxNarrowSide: 0,
  jpegQuality: 90,
  webpQuality: 85,
  normalizeExtensions: true,
  convertToFormat: "",
  uploadMaxSize: 100 * 1024 * 1024, // 100MB
  forwardDestination: "https://httpbin.org/anything",
  forwardTimeoutMs: 10_000,
  fileUploadFieldName: "assetData",
  listenPath: "/api/assets",
});

type Env = Record<string, string | undefined>;

// Whole decimal integers only: "50.5", "1e3" and "abc" are rejected.
function parseStrictInt(value: string): number | undefined {
  const trimmed = value.trim();
  if (!/^-?\d+$/.test(trimmed)) return undefined;
  const n = Number(trimmed);
  return Number.isSafeInteger(n) ? n : undefined;
}

function readInt(
  env: Env,
  name: string,
  def: number,
  isValid: (n: number) => boolean
): number {
  const raw = env[name];
  if (raw === undefined || raw === "") return def;
  const n = parseStrictInt(raw);
  if (n !== undefined && isValid(n)) return n;
  logger.warn(`Invalid ${name}="${raw}", using ${def}`);
  return def;
}

function readString(env: Env, name: string, def: string): string {
  const raw = env[name]?.trim();
  return raw ? raw : def;
}

function readUrl(env: Env, name: string, def: string): string {
  const raw = env[name]?.trim();
  if (!raw) return def;
  try {
    return new URL(raw).toString();
  } catch {
    logger.warn(`Invalid ${name}="${raw}", using ${def}`);
    return def;
  }
}

/**
 * Builds the immutable application config from environment variables.
 * Invalid values are logged and replaced by their defaults.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const positive = (n: number) => n > 0;
  const quality = (n: number) => n >= 1 && n <= 100;

  const maxWidth = readInt(env, "IMG_MAX_WIDTH", DEFAULT_CONFIG.maxWidth, positive);
  const maxHeight = readInt(env, "IMG_MAX_HEIGHT", DEFAULT_CONFIG.maxHeight, positive);

  const normalizeRaw = readInt(
    env,
    "NORMALIZE_EXTENSIONS",
    DEFAULT_CONFIG.normalizeExtensions ? 1 : 0,
    (n) => n === 0 || n === 1
  );

  let convertToFormat = DEFAULT_CONFIG.convertToFormat;
  const formatRaw = env.CONVERT_TO_FORMAT;
  if (formatRaw !== undefined && formatRaw !== "") {
    convertToFormat = normalizeConvertFormat(formatRaw);
    if (convertToFormat === "" && formatRaw.trim() !== "") {
      logger.warn(
        `Invalid CONVERT_TO_FORMAT="${formatRaw}", conversion disabled (valid values: "", "JPEG", "WEBP")`
      );
    }
  }

  return Object.freeze({
    port: readInt(env, "PORT", DEFAULT_CONFIG.port, (n) => n >= 1 && n <= 65535),
    maxWidth,
    maxHeight,
    maxNarrowSide: readInt(
      env,
      "IMG_MAX_NARROW_SIDE",
      DEFAULT_CONFIG.maxNarrowSide,
      (n) => n >= 0
    ),
    jpegQuality: readInt(env, "JPEG_QUALITY", DEFAULT_CONFIG.jpegQuality, quality),
    webpQuality: readInt(env, "WEBP_QUALITY", DEFAULT_CONFIG.webpQuality, quality),
    normalizeExtensions: normalizeRaw === 1,
    convertToFormat,
    uploadMaxSize: readInt(env, "UPLOAD_MAX_SIZE", DEFAULT_CONFIG.uploadMaxSize, positive),
    forwardDestination: readUrl(
      env,
      "FORWARD_DESTINATION",
      DEFAULT_CONFIG.forwardDestination
    ),
    forwardTimeoutMs: readInt(
      env,
      "FORWARD_TIMEOUT_MS",
      DEFAULT_CONFIG.forwardTimeoutMs,
      positive
    ),
    fileUploadFieldName: readString(
      env,
      "FILE_UPLOAD_FIELD",
      DEFAULT_CONFIG.fileUploadFieldName
    ),
    listenPath: readString(env, "LISTEN_PATH", DEFAULT_CONFIG.listenPath),
  });
}

export function toProcessingSettings(config: AppConfig): ProcessingSettings {
  return Object.freeze({
    maxWidth: config.maxWidth,
    maxHeight: config.maxHeight,
    maxNarrowSide: config.maxNarrowSide,
    jpegQuality: config.jpegQuality,
    webpQuality: config.webpQuality,
    convertToFormat: config.convertToFormat,
    normalizeExtensions: config.normalizeExtensions,
  });
}
