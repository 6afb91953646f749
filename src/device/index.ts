/**
 * Device Module - Public API
 */

// Types
export type { ConnectOptions, DeviceIdentity } from "./service.js";
export type { SessionSnapshot } from "./session.js";

// Service (side effects)
export { Device, discoverDevices } from "./service.js";
export { SessionState } from "./session.js";

// Pure transformations
export { apiBaseUrl, buildRequest } from "./transform.js";
