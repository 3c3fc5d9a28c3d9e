const KEY_PREFIX = "Key.";

const KEY_DISPLAY_NAMES: Record<string, string> = {
  enter: "Enter",
  esc: "Escape",
  escape: "Escape",
  space: "Space",
  tab: "Tab",
  backspace: "Backspace",
  delete: "Delete",
  up: "↑",
  down: "↓",
  left: "←",
  right: "→",
};

export type ComboToken = "Ctrl" | "Alt" | "Shift" | "C" | "V";

const COMBO_TOKENS: readonly ComboToken[] = ["Ctrl", "Alt", "Shift", "C", "V"];

// Every raw spelling accepted for each modifier or clipboard letter. Anything
// outside these lists is treated as an ordinary key.
export const COMBO_SPELLINGS: Record<ComboToken, readonly string[]> = {
  Ctrl: ["ctrl", "ctrl_l", "ctrl_r", "control"],
  Alt: ["alt", "alt_l", "alt_r", "alt_gr"],
  Shift: ["shift", "shift_l", "shift_r"],
  C: ["c", "\u0003", "\\x03"],
  V: ["v", "\u0016", "\\x16"],
};

function stripQuotes(value: string): string {
  return value.replace(/'/g, "");
}

/**
 * Canonical key name: recorder prefix removed, lower-cased.
 * `"Key.enter"` becomes `"enter"`.
 */
export function canonicalKey(raw: string): string {
  const trimmed = raw.trim();
  const bare = trimmed.startsWith(KEY_PREFIX)
    ? trimmed.slice(KEY_PREFIX.length)
    : trimmed;
  return bare.toLowerCase();
}

export function keyDisplayName(key: string): string {
  const canonical = canonicalKey(key);
  const known = KEY_DISPLAY_NAMES[canonical];
  if (known) {
    return known;
  }
  return canonical.charAt(0).toUpperCase() + canonical.slice(1);
}

export function comboToken(raw: string): ComboToken | null {
  const normalized = canonicalKey(stripQuotes(raw));
  for (const token of COMBO_TOKENS) {
    if (COMBO_SPELLINGS[token].includes(normalized)) {
      return token;
    }
  }
  return null;
}

/** Readable label for one token of a key combination. */
export function comboLabel(raw: string): string {
  return comboToken(raw) ?? canonicalKey(stripQuotes(raw)).toUpperCase();
}

export function formatKeyCombination(keys: readonly string[]): string {
  return keys.map(comboLabel).join("+");
}

function hasTokens(keys: readonly string[], wanted: ComboToken[]): boolean {
  const tokens = new Set(keys.map(comboToken));
  return wanted.every((token) => tokens.has(token));
}

export function isCopyCombination(keys: readonly string[]): boolean {
  return hasTokens(keys, ["Ctrl", "C"]);
}

export function isPasteCombination(keys: readonly string[]): boolean {
  return hasTokens(keys, ["Ctrl", "V"]);
}
