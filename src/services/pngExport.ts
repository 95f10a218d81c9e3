/**
 * Saving pictures as PNG files.
 * - Prefers the File System Access save dialog so the user picks the path
 * - Falls back to a plain download where the dialog is unavailable
 * - Pixels are encoded as 8-bit RGB, without an alpha channel
 * A dismissed dialog is reported as "cancelled", not as an error.
 */
import { encode } from "fast-png";
import { DEBUG_LOGGING } from "../config/flags";
import type { RgbRaster } from "../scene/gridRaster";
import { slugifyTitle } from "../utils/format";

export type SaveOutcome = "saved" | "downloaded" | "cancelled";

/** Anything that can hand over its native-resolution pixels as packed RGB. */
export interface PngSource {
  toRaster(): RgbRaster;
}

export interface ExportEnv {
  showSaveFilePicker?: (options?: SaveFilePickerOptions) => Promise<SaveFileHandle>;
  download(blob: Blob, fileName: string): void;
}

export class ExportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ExportError";
  }
}

export function suggestFileName(title: string): string {
  return `${slugifyTitle(title)}.png`;
}

export function ensurePngExtension(name: string): string {
  return /\.png$/i.test(name) ? name : `${name}.png`;
}

/** 8-bit truecolour PNG (colour type 2), no alpha channel. */
export function encodePng(raster: RgbRaster): Uint8Array {
  const expected = raster.width * raster.height * 3;
  if (raster.data.length !== expected)
    throw new RangeError(`expected ${expected} RGB bytes, got ${raster.data.length}`);
  return encode({
    width: raster.width,
    height: raster.height,
    data: raster.data,
    depth: 8,
    channels: 3,
  });
}

export function toPngBlob(source: PngSource): Blob {
  let bytes: Uint8Array;
  try {
    bytes = encodePng(source.toRaster());
  } catch (e) {
    throw new ExportError("the picture could not be encoded as PNG", { cause: e });
  }
  return new Blob([new Uint8Array(bytes)], { type: "image/png" });
}

async function writeToHandle(handle: SaveFileHandle, blob: Blob) {
  let writable: SaveFileWritable;
  try {
    writable = await handle.createWritable();
  } catch (e) {
    throw new ExportError(`${handle.name} could not be opened for writing`, { cause: e });
  }
  try {
    await writable.write(blob);
    await writable.close();
  } catch (e) {
    // Aborting discards the partial file instead of leaving it behind
    await writable.abort(e).catch((abortError: unknown) => {
      console.warn("[export] abort failed", abortError);
    });
    throw new ExportError(`${handle.name} could not be written`, { cause: e });
  }
}

function isAbort(e: unknown): boolean {
  return e instanceof DOMException && e.name === "AbortError";
}

export function anchorDownload(blob: Blob, fileName: string) {
  const url = URL.createObjectURL(blob);
  const a = document.createElement("a");
  a.href = url;
  a.download = fileName;
  document.body.appendChild(a);
  a.click();
  a.remove();
  // Give the browser a moment to start the download before revoking
  setTimeout(() => URL.revokeObjectURL(url), 1000);
}

export function browserExportEnv(): ExportEnv {
  return {
    showSaveFilePicker: window.showSaveFilePicker?.bind(window),
    download: anchorDownload,
  };
}

export async function savePng(
  source: PngSource,
  title: string,
  env: ExportEnv = browserExportEnv(),
): Promise<SaveOutcome> {
  const suggestedName = suggestFileName(title);
  if (env.showSaveFilePicker) {
    let handle: SaveFileHandle;
    try {
      handle = await env.showSaveFilePicker({
        suggestedName,
        types: [{ description: "PNG Files", accept: { "image/png": [".png"] } }],
      });
    } catch (e) {
      if (isAbort(e)) return "cancelled";
      throw new ExportError("the save dialog failed", { cause: e });
    }
    const blob = toPngBlob(source);
    await writeToHandle(handle, blob);
    if (DEBUG_LOGGING) console.log("[export] saved", handle.name, blob.size);
    return "saved";
  }
  const blob = toPngBlob(source);
  env.download(blob, ensurePngExtension(suggestedName));
  if (DEBUG_LOGGING) console.log("[export] downloaded", suggestedName, blob.size);
  return "downloaded";
}
