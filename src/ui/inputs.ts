// Utilities for input behavior across the form

/**
 * Disable browser spellcheck (and mobile autocorrect/capitalize) on a text
 * input. Area fields and the country field hold numbers and proper names.
 */
export function disableSpellcheck(el: HTMLInputElement) {
  el.spellcheck = false;
  el.setAttribute("spellcheck", "false");
  el.setAttribute("autocapitalize", "off");
  el.setAttribute("autocorrect", "off");
  el.setAttribute("autocomplete", "off");
  // Some grammar extensions honor this opt-out
  el.setAttribute("data-gramm", "false");
}

export function createTextInput(opts: {
  id: string;
  value: string;
  width?: string;
  placeholder?: string;
}): HTMLInputElement {
  const el = document.createElement("input");
  el.type = "text";
  el.id = opts.id;
  el.className = "ui-input";
  el.value = opts.value;
  if (opts.width) el.style.width = opts.width;
  if (opts.placeholder) el.placeholder = opts.placeholder;
  disableSpellcheck(el);
  return el;
}

export function createSelect<T extends string>(opts: {
  id: string;
  options: readonly T[];
  value: T;
  onChange: (value: T) => void;
}): HTMLSelectElement {
  const el = document.createElement("select");
  el.id = opts.id;
  el.className = "ui-select";
  for (const o of opts.options) {
    const opt = document.createElement("option");
    opt.value = o;
    opt.textContent = o;
    el.appendChild(opt);
  }
  el.value = opts.value;
  el.addEventListener("change", () => {
    const picked = opts.options.find((o) => o === el.value);
    if (picked !== undefined) opts.onChange(picked);
  });
  return el;
}

export function createButton(label: string, onClick: () => void): HTMLButtonElement {
  const b = document.createElement("button");
  b.type = "button";
  b.className = "ui-btn";
  b.textContent = label;
  b.addEventListener("click", (e) => {
    e.stopPropagation();
    onClick();
  });
  return b;
}

/** True when the keyboard event should not trigger global shortcuts (typing in a field). */
export function isTypingTarget(target: EventTarget | null): boolean {
  if (!(target instanceof HTMLElement)) return false;
  return (
    target instanceof HTMLInputElement ||
    target instanceof HTMLTextAreaElement ||
    target instanceof HTMLSelectElement ||
    target.isContentEditable
  );
}
