import { afterEach, describe, expect, it } from "vitest";
import {
  DEFAULT_LAYOUT_SETTINGS,
  configureLayoutSettings,
  layoutSettings,
  resetLayoutSettings,
} from "../layout";

describe("layout settings", () => {
  afterEach(() => resetLayoutSettings());

  it("starts from the defaults", () => {
    expect(layoutSettings).toEqual({
      overflowThreshold: 0.86,
      viewportWidthFraction: 0.96,
      viewportHeightFraction: 0.86,
      cellScale: 2,
    });
  });

  it("applies valid overrides field by field", () => {
    configureLayoutSettings({ overflowThreshold: 0.5, cellScale: 3.7 });
    expect(layoutSettings.overflowThreshold).toBe(0.5);
    expect(layoutSettings.cellScale).toBe(3);
    expect(layoutSettings.viewportWidthFraction).toBe(0.96);
  });

  it("ignores out-of-range values", () => {
    configureLayoutSettings({
      overflowThreshold: 0,
      viewportWidthFraction: 1.2,
      viewportHeightFraction: Number.NaN,
      cellScale: 0.5,
    });
    expect(layoutSettings).toEqual(DEFAULT_LAYOUT_SETTINGS);
  });

  it("caps the cell scale", () => {
    configureLayoutSettings({ cellScale: 20 });
    expect(layoutSettings.cellScale).toBe(8);
  });

  it("reset restores the defaults", () => {
    configureLayoutSettings({ viewportHeightFraction: 0.5 });
    resetLayoutSettings();
    expect(layoutSettings.viewportHeightFraction).toBe(0.86);
  });
});
