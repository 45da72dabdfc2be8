import { describe, it, expect } from "vitest";
import {
  KEY_SPACE,
  MOD_ALT,
  MOD_CTRL,
  MOD_SHIFT,
  MOD_SUPER,
  SUPPRESSED_KEYS,
  SUPPRESSED_PRINTABLE,
  keycodeOf,
  modifierMask,
  mouseButtonOf,
} from "../../src/app/keycodes.js";

const NO_MODIFIERS = { shiftKey: false, ctrlKey: false, altKey: false, metaKey: false };

describe("keycodeOf", () => {
  it("maps physical key names to guest codes", () => {
    expect(keycodeOf("Space")).toBe(KEY_SPACE);
    expect(keycodeOf("KeyA")).toBe(65);
    expect(keycodeOf("Digit7")).toBe(55);
    expect(keycodeOf("Escape")).toBe(256);
    expect(keycodeOf("ArrowUp")).toBe(265);
    expect(keycodeOf("ShiftLeft")).toBe(340);
  });

  it("returns undefined for unmapped keys", () => {
    expect(keycodeOf("LaunchMail")).toBeUndefined();
    expect(keycodeOf("")).toBeUndefined();
  });
});

describe("modifierMask", () => {
  it("is zero with nothing held", () => {
    expect(modifierMask(NO_MODIFIERS)).toBe(0);
  });

  it("combines held modifiers", () => {
    expect(modifierMask({ ...NO_MODIFIERS, shiftKey: true, altKey: true })).toBe(MOD_SHIFT | MOD_ALT);
    expect(modifierMask({ shiftKey: true, ctrlKey: true, altKey: true, metaKey: true })).toBe(
      MOD_SHIFT | MOD_CTRL | MOD_ALT | MOD_SUPER,
    );
    expect(modifierMask({ ...NO_MODIFIERS, metaKey: true })).toBe(8);
  });
});

describe("mouseButtonOf", () => {
  it("swaps middle and right", () => {
    expect(mouseButtonOf(0)).toBe(0);
    expect(mouseButtonOf(1)).toBe(2);
    expect(mouseButtonOf(2)).toBe(1);
    expect(mouseButtonOf(4)).toBe(4);
  });
});

describe("suppressed keys", () => {
  it("covers navigation and function keys", () => {
    expect(SUPPRESSED_KEYS.has(258)).toBe(true);
    expect(SUPPRESSED_KEYS.has(263)).toBe(true);
    expect(SUPPRESSED_KEYS.has(290)).toBe(true);
    expect(SUPPRESSED_KEYS.has(65)).toBe(false);
  });

  it("sends a character only for the printable ones", () => {
    expect(SUPPRESSED_PRINTABLE.get(KEY_SPACE)).toBe(0x20);
    expect(SUPPRESSED_PRINTABLE.get(222)).toBe(0x27);
    expect(SUPPRESSED_PRINTABLE.get(189)).toBe(0x2f);
    expect(SUPPRESSED_PRINTABLE.get(258)).toBeUndefined();
  });
});
