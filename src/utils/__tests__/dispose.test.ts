import { describe, expect, it, vi } from "vitest";
import { disposeOnThrow } from "../dispose";

describe("disposeOnThrow", () => {
  it("returns the built value and leaves it alone", () => {
    const dispose = vi.fn();
    expect(disposeOnThrow(() => 7, dispose)).toBe(7);
    expect(dispose).not.toHaveBeenCalled();
  });

  it("destroys the renderer when setup after init throws", () => {
    const app = { destroy: vi.fn() };
    const boom = new Error("texture upload failed");
    expect(() =>
      disposeOnThrow(
        () => {
          throw boom;
        },
        () => app.destroy(true),
      ),
    ).toThrow(boom);
    expect(app.destroy).toHaveBeenCalledTimes(1);
    expect(app.destroy).toHaveBeenCalledWith(true);
  });

  it("keeps the original error when cleanup also fails", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    expect(() =>
      disposeOnThrow(
        () => {
          throw new Error("first");
        },
        () => {
          throw new Error("second");
        },
      ),
    ).toThrow("first");
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });
});
