import type { HostModifierState } from "../host/host.js";
import table from "./keycodes.json" with { type: "json" };

// Physical key name → guest key code.
const KEYCODES = new Map<string, number>(Object.entries(table));

export const KEY_SPACE = 32;
export const KEY_QUOTE = 222;
export const KEY_SLASH = 189;
export const KEY_TAB = 258;
export const KEY_BACKSPACE = 259;
export const KEY_DELETE = 261;

export const MOD_SHIFT = 1;
export const MOD_CTRL = 2;
export const MOD_ALT = 4;
export const MOD_SUPER = 8;

export const TOUCH_BEGAN = 10;
export const TOUCH_MOVED = 11;
export const TOUCH_ENDED = 12;
export const TOUCH_CANCELLED = 13;

/** Keys whose browser default (scrolling, focus changes, help, back) is suppressed. */
export const SUPPRESSED_KEYS: ReadonlySet<number> = new Set([
  KEY_SPACE,
  262, 263, 264, 265, // arrows
  290, 291, 292, 293, 294, 295, 296, 297, 298, 299, // F1-F10
  KEY_BACKSPACE,
  KEY_TAB,
  KEY_QUOTE,
  KEY_SLASH,
]);

/**
 * Suppressed keys that also produce a character. Suppressing the default
 * stops the host from sending keypress, so the character is sent on key down.
 */
export const SUPPRESSED_PRINTABLE: ReadonlyMap<number, number> = new Map([
  [KEY_SPACE, 0x20],
  [KEY_QUOTE, 0x27],
  [KEY_SLASH, 0x2f],
]);

export function keycodeOf(code: string): number | undefined {
  return KEYCODES.get(code);
}

export function modifierMask(event: HostModifierState): number {
  let mask = 0;
  if (event.shiftKey) mask |= MOD_SHIFT;
  if (event.ctrlKey) mask |= MOD_CTRL;
  if (event.altKey) mask |= MOD_ALT;
  if (event.metaKey) mask |= MOD_SUPER;
  return mask;
}

/** Host buttons are left 0, middle 1, right 2; the guest expects left 0, right 1, middle 2. */
export function mouseButtonOf(button: number): number {
  switch (button) {
    case 1:
      return 2;
    case 2:
      return 1;
    default:
      return button;
  }
}
