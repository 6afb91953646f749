/**
 * Protocol Module - Public API
 *
 * Envelope decoding, wire schemas and the shared error union.
 */

// Types
export type {
  AppPayload,
  CurrentInput,
  DeviceInfo,
  Envelope,
  Input,
  PairingChallenge,
  SettingItem,
  SliderInfo,
} from "./schema.js";
export type {
  ApiErrorCode,
  ErrorTier,
  Primitive,
  SmartCastError,
  SmartCastErrorType,
} from "./errors.js";

// Error constructors and utilities
export {
  API_ERROR_CODES,
  apiError,
  decodeError,
  deviceNotFound,
  errorTier,
  formatSmartCastError,
  isApiErrorCode,
  noReachablePort,
  notAnElement,
  outOfBounds,
  readOnly,
  transportError,
  typeMismatch,
  unrecognizedApiError,
} from "./errors.js";

// Schemas
export { AppPayloadWireSchema } from "./schema.js";

// Pure transformations
export {
  classifyResult,
  decodeEnvelope,
  extractAuthToken,
  extractCurrentApp,
  extractCurrentInput,
  extractDeviceInfo,
  extractElements,
  extractInputList,
  extractPairing,
  extractPowerState,
  extractSettingItems,
  extractSliderInfo,
  firstItem,
  items,
  toAppPayload,
} from "./transform.js";
