import { COUNTRY_TABLE, filterCountries } from "../data/countryTable";
import { createTextInput } from "./inputs";

export interface CountryCombo {
  input: HTMLInputElement;
  list: HTMLDataListElement;
  refresh(): void;
}

/**
 * Editable country field whose suggestion list narrows to names starting with
 * what has been typed so far.
 */
export function createCountryCombo(opts: {
  value: string;
  names?: readonly string[];
  onInput: (value: string) => void;
}): CountryCombo {
  const names = opts.names ?? COUNTRY_TABLE.names;
  const list = document.createElement("datalist");
  list.id = "country-options";
  const input = createTextInput({
    id: "country",
    value: opts.value,
    width: "calc(240px * var(--ui-scale))",
    placeholder: "Start typing a country",
  });
  input.setAttribute("list", list.id);

  let lastQuery: string | null = null;
  const refresh = () => {
    const q = input.value;
    if (q === lastQuery) return;
    lastQuery = q;
    const matches = filterCountries(q, names);
    list.replaceChildren(
      ...matches.map((name) => {
        const o = document.createElement("option");
        o.value = name;
        return o;
      }),
    );
  };
  input.addEventListener("keyup", refresh);
  input.addEventListener("input", () => {
    refresh();
    opts.onInput(input.value);
  });
  refresh();
  return { input, list, refresh };
}
