import { DEFAULT_CITY_UNIT, DEFAULT_HOUSE_UNIT } from "../config/units";
import type { PopulationSelection, SpatialForm } from "../core/validation";

export type TabId = "space" | "population";

export interface FormState extends SpatialForm, PopulationSelection {
  tab: TabId;
}

/** What the app needs from an open viewer window. */
export interface ViewerHandle {
  readonly id: number;
  readonly title: string;
  save(): Promise<void>;
  close(): void;
  focus(): void;
}

export interface IAppState {
  readonly form: Readonly<FormState>;
  update(patch: Partial<FormState>): void;
  spatialForm(): SpatialForm;
  populationSelection(): PopulationSelection;
  // Open viewer windows
  nextViewerId(): number;
  registerViewer(v: ViewerHandle): void;
  unregisterViewer(id: number): void;
  viewers(): ViewerHandle[];
  focusedViewer(): ViewerHandle | undefined;
  setFocusedViewer(id: number | null): void;
  closeAllViewers(): void;
  on(cb: () => void): () => boolean;
}

const FORM_KEYS: readonly (keyof FormState)[] = [
  "tab",
  "houseArea",
  "houseUnit",
  "cityArea",
  "cityUnit",
  "country",
  "births",
  "deaths",
];

export function initialFormState(): FormState {
  return {
    tab: "space",
    houseArea: "",
    houseUnit: DEFAULT_HOUSE_UNIT,
    cityArea: "",
    cityUnit: DEFAULT_CITY_UNIT,
    country: "",
    births: false,
    deaths: false,
  };
}

class AppStateImpl implements IAppState {
  form: FormState;
  private open = new Map<number, ViewerHandle>();
  private focusedId: number | null = null;
  private seq = 0;
  private listeners = new Set<() => void>();

  constructor(initial?: Partial<FormState>) {
    this.form = { ...initialFormState(), ...initial };
  }

  update(patch: Partial<FormState>) {
    let changed = false;
    const next: FormState = { ...this.form };
    for (const key of FORM_KEYS) {
      const v = patch[key];
      if (v === undefined || next[key] === v) continue;
      Object.assign(next, { [key]: v });
      changed = true;
    }
    if (!changed) return;
    this.form = next;
    this.emit();
  }
  spatialForm(): SpatialForm {
    const f = this.form;
    return {
      houseArea: f.houseArea,
      houseUnit: f.houseUnit,
      cityArea: f.cityArea,
      cityUnit: f.cityUnit,
      country: f.country,
    };
  }
  populationSelection(): PopulationSelection {
    return { births: this.form.births, deaths: this.form.deaths };
  }

  nextViewerId() {
    return ++this.seq;
  }
  registerViewer(v: ViewerHandle) {
    this.open.set(v.id, v);
    this.focusedId = v.id;
    this.emit();
  }
  unregisterViewer(id: number) {
    if (!this.open.delete(id)) return;
    if (this.focusedId === id) this.focusedId = null;
    this.emit();
  }
  viewers() {
    return [...this.open.values()];
  }
  focusedViewer() {
    return this.focusedId === null ? undefined : this.open.get(this.focusedId);
  }
  setFocusedViewer(id: number | null) {
    this.focusedId = id !== null && this.open.has(id) ? id : null;
  }
  closeAllViewers() {
    // close() unregisters, so iterate over a copy
    for (const v of this.viewers()) v.close();
  }
  on(cb: () => void) {
    this.listeners.add(cb);
    return () => this.listeners.delete(cb);
  }
  private emit() {
    for (const l of this.listeners) l();
  }
}

export function createAppState(initial?: Partial<FormState>): IAppState {
  return new AppStateImpl(initial);
}
