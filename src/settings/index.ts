/**
 * Settings Module - Public API
 */

// Types
export type {
  JsonKind,
  SettingInput,
  SettingKind,
  SettingNodeData,
  SettingValue,
} from "./schema.js";

export { SETTING_KINDS, WIRE_TYPES } from "./schema.js";

// Service (side effects)
export { SettingNode, fetchElements, fetchSliderInfo } from "./service.js";

// Pure transformations
export {
  kindFromWireType,
  toSettingValue,
  valueFits,
} from "./transform.js";
