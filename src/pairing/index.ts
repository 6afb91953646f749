/**
 * Pairing Module - Public API
 */

// Types
export type { PairingData } from "./schema.js";

// Service functions (side effects)
export { beginPairing, cancelPairing, finishPairing } from "./service.js";

// Pure transformations
export { sanitizePin } from "./transform.js";
