/**
 * Remote Module - Types
 *
 * Virtual remote buttons and the actions that can be sent for them.
 */

/**
 * Key code table: every button maps to its (CODESET, CODE) pair.
 */
export const BUTTON_CODES = {
  // Media
  SeekFwd: { codeset: 2, code: 0 },
  SeekBack: { codeset: 2, code: 1 },
  Pause: { codeset: 2, code: 2 },
  Play: { codeset: 2, code: 3 },

  // Directional pad
  Down: { codeset: 3, code: 0 },
  Left: { codeset: 3, code: 1 },
  Up: { codeset: 3, code: 8 },
  Right: { codeset: 3, code: 7 },
  Ok: { codeset: 3, code: 2 },

  // Navigation
  Back: { codeset: 4, code: 0 },
  SmartCast: { codeset: 4, code: 3 },
  CCToggle: { codeset: 4, code: 4 },
  Info: { codeset: 4, code: 6 },
  Menu: { codeset: 4, code: 8 },
  Home: { codeset: 4, code: 15 },

  // Audio
  VolumeDown: { codeset: 5, code: 0 },
  VolumeUp: { codeset: 5, code: 1 },
  MuteOff: { codeset: 5, code: 2 },
  MuteOn: { codeset: 5, code: 3 },
  MuteToggle: { codeset: 5, code: 4 },

  // Picture
  PicMode: { codeset: 6, code: 0 },
  PicSize: { codeset: 6, code: 2 },

  // Input
  InputNext: { codeset: 7, code: 1 },

  // Channel
  ChannelDown: { codeset: 8, code: 0 },
  ChannelUp: { codeset: 8, code: 1 },
  ChannelPrev: { codeset: 8, code: 2 },

  Exit: { codeset: 9, code: 0 },

  // Power
  PowerOff: { codeset: 11, code: 0 },
  PowerOn: { codeset: 11, code: 1 },
  PowerToggle: { codeset: 11, code: 2 },
} as const satisfies Record<string, KeyCode>;

export type Button = keyof typeof BUTTON_CODES;

export type KeyCode = Readonly<{ codeset: number; code: number }>;

/**
 * Codes some firmware uses for the directional pad instead of the
 * primary table. Buttons missing here have a single code.
 */
export const ALTERNATE_BUTTON_CODES: Readonly<Partial<Record<Button, KeyCode>>> =
  {
    Up: { codeset: 3, code: 3 },
    Right: { codeset: 3, code: 5 },
  };

export const KEY_ACTIONS = ["KEYDOWN", "KEYUP", "KEYPRESS"] as const;

export type KeyAction = (typeof KEY_ACTIONS)[number];

export type ButtonEvent = Readonly<{
  button: Button;
  action: KeyAction;
}>;

/**
 * One entry of the KEYLIST sent to `/key_command/`.
 */
export type KeyListEntry = Readonly<{
  CODESET: number;
  CODE: number;
  ACTION: KeyAction;
}>;
