import { decode } from "fast-png";
import { describe, expect, it, vi } from "vitest";
import { buildGridRaster } from "../../scene/gridRaster";
import {
  ExportError,
  encodePng,
  ensurePngExtension,
  savePng,
  suggestFileName,
  toPngBlob,
  type PngSource,
} from "../pngExport";

function source(): PngSource {
  return { toRaster: () => buildGridRaster(3, 2) };
}

function fakeHandle(failWrite = false) {
  const written: Blob[] = [];
  const writable = {
    write: vi.fn(async (b: Blob) => {
      if (failWrite) throw new DOMException("disk full", "QuotaExceededError");
      written.push(b);
    }),
    close: vi.fn(async () => {}),
    abort: vi.fn(async () => {}),
  };
  return {
    written,
    writable,
    handle: { name: "out.png", createWritable: async () => writable },
  };
}

describe("file names", () => {
  it("derives a PNG name from the window title", () => {
    expect(suggestFileName("Births per day (and hr) ~ 385000")).toBe(
      "births-per-day-and-hr-385000.png",
    );
  });

  it("adds the extension only when missing", () => {
    expect(ensurePngExtension("grid")).toBe("grid.png");
    expect(ensurePngExtension("grid.PNG")).toBe("grid.PNG");
  });
});

describe("encodePng", () => {
  it("writes three-channel 8-bit pixels", () => {
    const png = decode(encodePng(buildGridRaster(3, 2)));
    expect(png.width).toBe(3);
    expect(png.height).toBe(2);
    expect(png.channels).toBe(3);
    expect(png.depth).toBe(8);
    // W B W / B R B: the marker sits at (1,1)
    expect(Array.from(png.data)).toEqual([
      255, 255, 255, 0, 0, 0, 255, 255, 255,
      0, 0, 0, 255, 0, 0, 0, 0, 0,
    ]);
  });

  it("wraps encoder failures", () => {
    const broken: PngSource = {
      toRaster: () => ({ width: 2, height: 2, data: new Uint8Array(3) }),
    };
    expect(() => toPngBlob(broken)).toThrow(ExportError);
  });

  it("labels the blob as PNG", async () => {
    const blob = toPngBlob(source());
    expect(blob.type).toBe("image/png");
    const png = decode(new Uint8Array(await blob.arrayBuffer()));
    expect(png.channels).toBe(3);
  });
});

describe("savePng", () => {
  it("writes through the save dialog", async () => {
    const { handle, written, writable } = fakeHandle();
    const picker = vi.fn(async () => handle);
    const download = vi.fn();
    const out = await savePng(source(), "Your House in Your City", {
      showSaveFilePicker: picker,
      download,
    });
    expect(out).toBe("saved");
    expect(picker).toHaveBeenCalledWith({
      suggestedName: "your-house-in-your-city.png",
      types: [{ description: "PNG Files", accept: { "image/png": [".png"] } }],
    });
    expect(written).toHaveLength(1);
    expect(writable.close).toHaveBeenCalledOnce();
    expect(download).not.toHaveBeenCalled();
  });

  it("treats a dismissed dialog as cancelled", async () => {
    const download = vi.fn();
    const out = await savePng(source(), "x", {
      showSaveFilePicker: async () => {
        throw new DOMException("dismissed", "AbortError");
      },
      download,
    });
    expect(out).toBe("cancelled");
    expect(download).not.toHaveBeenCalled();
  });

  it("wraps other dialog failures", async () => {
    await expect(
      savePng(source(), "x", {
        showSaveFilePicker: async () => {
          throw new DOMException("nope", "SecurityError");
        },
        download: vi.fn(),
      }),
    ).rejects.toThrow(ExportError);
  });

  it("falls back to a download", async () => {
    const download = vi.fn();
    const out = await savePng(source(), "Earth", { download });
    expect(out).toBe("downloaded");
    expect(download).toHaveBeenCalledWith(expect.any(Blob), "earth.png");
  });

  it("aborts the file when writing fails", async () => {
    const { handle, writable } = fakeHandle(true);
    await expect(
      savePng(source(), "x", { showSaveFilePicker: async () => handle, download: vi.fn() }),
    ).rejects.toThrow(ExportError);
    expect(writable.abort).toHaveBeenCalledOnce();
    expect(writable.close).not.toHaveBeenCalled();
  });
});
