import FormData from "form-data";
import type {
  ProcessingResult,
  ProcessingSettings,
} from "../config/processingConfig";
import { HttpError } from "./errors";
import { reconcileFileMeta, type FileMeta } from "./fileNaming";
import { processImage, type ProcessImageOptions } from "./imageProcessor";

export interface UploadedFile {
  fieldName: string;
  filename: string;
  mimeType?: string;
  bytes: Buffer;
}

export interface UploadFormData {
  // Non-file fields in arrival order; repeated names appear repeatedly.
  fields: ReadonlyArray<readonly [string, string]>;
  file?: UploadedFile;
}

export interface ReformattedUpload {
  contentType: string;
  body: Buffer;
  file: FileMeta;
  result: ProcessingResult;
}

// Quotes and line breaks cannot appear raw inside a quoted header parameter.
function escapeParam(value: string): string {
  return value.replace(/"/g, "%22").replace(/\r/g, "%0D").replace(/\n/g, "%0A");
}

/**
 * Rebuilds an upload: every text field is copied as-is, then the file part is
 * written with the processed bytes and a name/type that match them.
 * Rejects with a 400 when the upload has no file.
 */
export async function reformat(
  formData: UploadFormData,
  settings: ProcessingSettings,
  options: ProcessImageOptions = {}
): Promise<ReformattedUpload> {
  const upload = formData.file;
  if (!upload) {
    throw new HttpError(400, "Upload is missing its file field");
  }

  const result = await processImage(upload.bytes, settings, options);
  const file = reconcileFileMeta(upload.filename, upload.mimeType, result, settings);

  // Values are written byte for byte; line endings inside them are left alone.
  const form = new FormData();
  for (const [name, value] of formData.fields) {
    form.append(escapeParam(name), value);
  }
  form.append(escapeParam(upload.fieldName), result.processedBytes, {
    // `filename` would be cut to its basename; `filepath` is only path-normalized.
    // An unnamed file is sent as "blob", as browsers do.
    filepath: escapeParam(file.filename || "blob"),
    contentType: file.mimeType,
  });

  const body = form.getBuffer();
  const contentType = `multipart/form-data; boundary=${form.getBoundary()}`;

  options.logEventFn?.({
    status: "completed",
    message: `Rebuilt upload: ${file.filename} (${file.mimeType}, ${body.length} bytes, ${formData.fields.length} fields)`,
  });

  return { contentType, body, file, result };
}
