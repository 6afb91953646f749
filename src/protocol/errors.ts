/**
 * Protocol Module - Error Types
 *
 * One error union for every SmartCast operation. Errors are values, not
 * exceptions, and fall into three tiers: transport failures, errors the
 * device reported, and failures detected locally by the client.
 */

/**
 * Result codes a device may put in `STATUS.RESULT`, lower-cased.
 */
export const API_ERROR_CODES = [
  "invalid_parameter",
  "uri_not_found",
  "max_challenges_exceeded",
  "pairing_denied",
  "value_out_of_range",
  "challenge_incorrect",
  "blocked",
  "failure",
  "aborted",
  "busy",
  "requires_pairing",
  "requires_system_pin",
  "requires_new_system_pin",
  "net_wifi_needs_valid_ssid",
  "net_wifi_already_connected",
  "net_wifi_missing_password",
  "net_wifi_not_existed",
  "net_wifi_auth_rejected",
  "net_wifi_connect_timeout",
  "net_wifi_connect_aborted",
  "net_wifi_connection_error",
  "net_ip_manual_config_error",
  "net_ip_dhcp_failed",
  "net_unknown_error",
] as const;

export type ApiErrorCode = (typeof API_ERROR_CODES)[number];

/**
 * Primitive JSON values a setting can hold, kept loose here so errors
 * can carry whatever the caller attempted.
 */
export type Primitive = boolean | number | bigint | string;

/**
 * Errors that can occur during SmartCast operations.
 */
export type SmartCastError =
  // Transport tier
  | {
      readonly type: "TRANSPORT_ERROR";
      readonly message: string;
      readonly url?: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "NO_REACHABLE_PORT";
      readonly message: string;
      readonly ports: readonly number[];
      readonly cause?: SmartCastError;
    }
  // API tier
  | {
      readonly type: "API_ERROR";
      readonly code: ApiErrorCode;
      readonly detail: string;
    }
  | {
      readonly type: "UNRECOGNIZED_API_ERROR";
      readonly result: string;
      readonly detail: string;
    }
  // Client tier
  | {
      readonly type: "DECODE_ERROR";
      readonly message: string;
      readonly responseData?: unknown;
    }
  | {
      readonly type: "READ_ONLY";
      readonly path: string;
    }
  | {
      readonly type: "TYPE_MISMATCH";
      readonly current: Primitive;
      readonly attempted: Primitive;
    }
  | {
      readonly type: "OUT_OF_BOUNDS";
      readonly value: number;
      readonly min: number;
      readonly max: number;
    }
  | {
      readonly type: "NOT_AN_ELEMENT";
      readonly value: Primitive;
      readonly elements: readonly string[];
    }
  | {
      readonly type: "DEVICE_NOT_FOUND";
      readonly criterion: string;
    };

export type SmartCastErrorType = SmartCastError["type"];

export type ErrorTier = "transport" | "api" | "client";

// =============================================================================
// Factories
// =============================================================================

export function transportError(
  message: string,
  url?: string,
  cause?: Error,
): SmartCastError {
  return {
    type: "TRANSPORT_ERROR",
    message,
    ...(url !== undefined ? { url } : {}),
    ...(cause ? { cause } : {}),
  };
}

export function noReachablePort(
  ports: readonly number[],
  cause?: SmartCastError,
): SmartCastError {
  const message = `No API port answered (tried ${ports.join(", ")})`;
  if (cause) {
    return { type: "NO_REACHABLE_PORT", message, ports, cause };
  }
  return { type: "NO_REACHABLE_PORT", message, ports };
}

export function apiError(code: ApiErrorCode, detail = ""): SmartCastError {
  return { type: "API_ERROR", code, detail };
}

export function unrecognizedApiError(
  result: string,
  detail = "",
): SmartCastError {
  return { type: "UNRECOGNIZED_API_ERROR", result, detail };
}

export function decodeError(
  message: string,
  responseData?: unknown,
): SmartCastError {
  return { type: "DECODE_ERROR", message, responseData };
}

export function readOnly(path: string): SmartCastError {
  return { type: "READ_ONLY", path };
}

export function typeMismatch(
  current: Primitive,
  attempted: Primitive,
): SmartCastError {
  return { type: "TYPE_MISMATCH", current, attempted };
}

export function outOfBounds(
  value: number,
  min: number,
  max: number,
): SmartCastError {
  return { type: "OUT_OF_BOUNDS", value, min, max };
}

export function notAnElement(
  value: Primitive,
  elements: readonly string[],
): SmartCastError {
  return { type: "NOT_AN_ELEMENT", value, elements };
}

export function deviceNotFound(criterion: string): SmartCastError {
  return { type: "DEVICE_NOT_FOUND", criterion };
}

// =============================================================================
// Inspection
// =============================================================================

/**
 * Which side of the wire produced the error.
 */
export function errorTier(error: SmartCastError): ErrorTier {
  switch (error.type) {
    case "TRANSPORT_ERROR":
    case "NO_REACHABLE_PORT":
      return "transport";
    case "API_ERROR":
    case "UNRECOGNIZED_API_ERROR":
      return "api";
    case "DECODE_ERROR":
    case "READ_ONLY":
    case "TYPE_MISMATCH":
    case "OUT_OF_BOUNDS":
    case "NOT_AN_ELEMENT":
    case "DEVICE_NOT_FOUND":
      return "client";
  }
}

export function isApiErrorCode(value: string): value is ApiErrorCode {
  return API_ERROR_CODES.some((code) => code === value);
}

/**
 * Format a SmartCastError for logging.
 */
export function formatSmartCastError(error: SmartCastError): string {
  switch (error.type) {
    case "TRANSPORT_ERROR":
      return error.url
        ? `Transport error (${error.url}): ${error.message}`
        : `Transport error: ${error.message}`;
    case "NO_REACHABLE_PORT":
      return error.message;
    case "API_ERROR":
      return error.detail
        ? `Device returned ${error.code.toUpperCase()}: ${error.detail}`
        : `Device returned ${error.code.toUpperCase()}`;
    case "UNRECOGNIZED_API_ERROR":
      return `Device returned unrecognized result ${error.result}: ${error.detail}`;
    case "DECODE_ERROR":
      return `Could not decode response: ${error.message}`;
    case "READ_ONLY":
      return `Setting ${error.path} is read-only or unwritable`;
    case "TYPE_MISMATCH":
      return `Cannot replace ${String(error.current)} (${typeof error.current}) with ${String(error.attempted)} (${typeof error.attempted})`;
    case "OUT_OF_BOUNDS":
      return `${error.value} is outside ${error.min}..${error.max}`;
    case "NOT_AN_ELEMENT":
      return `${String(error.value)} is not one of: ${error.elements.join(", ")}`;
    case "DEVICE_NOT_FOUND":
      return `No device found matching ${error.criterion}`;
  }
}
