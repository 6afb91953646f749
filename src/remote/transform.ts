/**
 * Remote transformations - pure functions mapping button events onto
 * the KEYLIST wire format.
 */
import {
  ALTERNATE_BUTTON_CODES,
  BUTTON_CODES,
  type Button,
  type ButtonEvent,
  type KeyAction,
  type KeyCode,
  type KeyListEntry,
} from "./schema.js";

export const keyPress = (button: Button): ButtonEvent => ({
  button,
  action: "KEYPRESS",
});

export const keyDown = (button: Button): ButtonEvent => ({
  button,
  action: "KEYDOWN",
});

export const keyUp = (button: Button): ButtonEvent => ({
  button,
  action: "KEYUP",
});

export const isButton = (value: string): value is Button =>
  Object.hasOwn(BUTTON_CODES, value);

const toEntry = (code: KeyCode, action: KeyAction): KeyListEntry => ({
  CODESET: code.codeset,
  CODE: code.code,
  ACTION: action,
});

/**
 * KEYLIST for the given events using the primary code table.
 */
export const buildKeyList = (
  events: readonly ButtonEvent[],
): KeyListEntry[] =>
  events.map((event) => toEntry(BUTTON_CODES[event.button], event.action));

/**
 * KEYLIST using the alternate table, or null when none of the events
 * has an alternate code.
 */
export const buildAlternateKeyList = (
  events: readonly ButtonEvent[],
): KeyListEntry[] | null => {
  if (!events.some((event) => ALTERNATE_BUTTON_CODES[event.button])) {
    return null;
  }
  return events.map((event) =>
    toEntry(
      ALTERNATE_BUTTON_CODES[event.button] ?? BUTTON_CODES[event.button],
      event.action,
    ),
  );
};
