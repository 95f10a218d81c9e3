import { CITY_UNITS, HOUSE_UNITS } from "../config/units";
import type { IAppState } from "../state/appState";
import { createCountryCombo } from "./countryCombo";
import { createButton, createSelect, createTextInput } from "./inputs";

function label(text: string, forId: string) {
  const l = document.createElement("label");
  l.textContent = text;
  l.htmlFor = forId;
  return l;
}

/**
 * House area, city area and country. Visualize (button or Enter in any field)
 * hands control to `onVisualize`; reading the values is left to the caller
 * through the app state.
 */
export function createSpacePane(state: IAppState, onVisualize: () => void): HTMLElement {
  const pane = document.createElement("div");
  const grid = document.createElement("div");
  grid.className = "ui-form-grid";
  const f = state.form;

  const house = createTextInput({
    id: "house-area",
    value: f.houseArea,
    width: "calc(140px * var(--ui-scale))",
  });
  house.addEventListener("input", () => state.update({ houseArea: house.value }));
  const houseUnit = createSelect({
    id: "house-unit",
    options: HOUSE_UNITS,
    value: f.houseUnit,
    onChange: (houseUnit) => state.update({ houseUnit }),
  });

  const city = createTextInput({
    id: "city-area",
    value: f.cityArea,
    width: "calc(140px * var(--ui-scale))",
  });
  city.addEventListener("input", () => state.update({ cityArea: city.value }));
  const cityUnit = createSelect({
    id: "city-unit",
    options: CITY_UNITS,
    value: f.cityUnit,
    onChange: (cityUnit) => state.update({ cityUnit }),
  });

  const country = createCountryCombo({
    value: f.country,
    onInput: (value) => state.update({ country: value }),
  });

  grid.append(
    label("Area of your house:", house.id),
    house,
    houseUnit,
    label("Area of your city:", city.id),
    city,
    cityUnit,
    label("Your country:", country.input.id),
    country.input,
    document.createElement("span"),
  );
  pane.append(grid, country.list);

  for (const el of [house, city, country.input]) {
    el.addEventListener("keydown", (e) => {
      if (e.key !== "Enter") return;
      e.preventDefault();
      onVisualize();
    });
  }

  const row = document.createElement("div");
  row.style.cssText = "display:flex;justify-content:flex-end;margin-top:calc(16px * var(--ui-scale));";
  row.appendChild(createButton("Visualize", onVisualize));
  pane.appendChild(row);
  house.focus();
  return pane;
}
