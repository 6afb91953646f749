/**
 * Remote Module - Public API
 */

// Types
export type {
  Button,
  ButtonEvent,
  KeyAction,
  KeyCode,
  KeyListEntry,
} from "./schema.js";

export {
  ALTERNATE_BUTTON_CODES,
  BUTTON_CODES,
  KEY_ACTIONS,
} from "./schema.js";

// Service functions (side effects)
export { sendButtonEvents } from "./service.js";

// Pure transformations
export {
  buildAlternateKeyList,
  buildKeyList,
  isButton,
  keyDown,
  keyPress,
  keyUp,
} from "./transform.js";
