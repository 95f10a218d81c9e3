// Debug switches, read once at startup.

function readFlag(key: string): boolean {
  try {
    if (typeof localStorage === "undefined") return false;
    return localStorage.getItem(key) === "1";
  } catch {
    return false;
  }
}

// localStorage.visDebug = "1" turns on verbose [viewer]/[export] logging.
export const DEBUG_LOGGING = readFlag("visDebug");

// When true, the keyboard help FAB is not mounted.
export const HIDE_HELP_FAB = false;
