/**
 * Command Module - Public API
 */

// Types
export type {
  Command,
  CommandDispatcher,
  CommandType,
  RequestType,
  SettingsBase,
  WireScalar,
} from "./schema.js";

// Pure transformations
export {
  body,
  CANCEL_RESPONSE_VALUE,
  cancelPairing,
  changeInput,
  endpoint,
  finishPairing,
  getCurrentApp,
  getCurrentInput,
  getDeviceInfo,
  getInputList,
  getPowerState,
  launchApp,
  readSettings,
  remoteButtonPress,
  requestType,
  startPairing,
  writeSettings,
} from "./transform.js";
