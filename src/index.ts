/**
 * SmartCast client - discover, pair with and control SmartCast displays
 * and sound bars over their local HTTP API.
 *
 * @example
 * const found = await discoverDevices();
 * const device = found._unsafeUnwrap()[0];
 * const pairing = await device.beginPair("Living Room Remote", "remote-01");
 * await device.finishPair(pairing._unsafeUnwrap(), "1234");
 * await device.keyPress("VolumeUp");
 */

// Device session
export {
  type ConnectOptions,
  Device,
  type DeviceIdentity,
  discoverDevices,
} from "./device/index.js";

// Settings tree
export {
  type JsonKind,
  type SettingInput,
  type SettingKind,
  SettingNode,
  type SettingValue,
} from "./settings/index.js";

// Remote
export {
  BUTTON_CODES,
  type Button,
  type ButtonEvent,
  type KeyAction,
  keyDown,
  keyPress,
  keyUp,
} from "./remote/index.js";

// Pairing
export { type PairingData, sanitizePin } from "./pairing/index.js";

// Apps
export { type App, AppCatalog } from "./apps/index.js";

// Discovery
export {
  type DeviceDescription,
  type SsdpOptions,
  discoverDescriptions,
  ssdpSearch,
} from "./discovery/index.js";

// Transport
export {
  createHttpTransport,
  type HttpRequest,
  type Transport,
} from "./transport/index.js";

// Protocol types and errors
export {
  API_ERROR_CODES,
  type ApiErrorCode,
  type AppPayload,
  type CurrentInput,
  type DeviceInfo,
  type ErrorTier,
  errorTier,
  formatSmartCastError,
  type Input,
  type SliderInfo,
  type SmartCastError,
} from "./protocol/index.js";
