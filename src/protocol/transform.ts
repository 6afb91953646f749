/**
 * Protocol transformations - pure functions with no side effects.
 *
 * Decodes the response envelope, classifies its result code and
 * projects typed values out of ITEM / ITEMS.
 */
import { type Result, err, ok } from "neverthrow";
import type { z } from "zod";

import {
  type SmartCastError,
  apiError,
  decodeError,
  isApiErrorCode,
  unrecognizedApiError,
} from "./errors.js";
import {
  type AppPayload,
  AppPayloadWireSchema,
  AuthTokenItemSchema,
  type CurrentInput,
  CurrentAppItemSchema,
  CurrentInputItemSchema,
  type DeviceInfo,
  DeviceInfoItemSchema,
  ElementsItemSchema,
  type Envelope,
  EnvelopeSchema,
  type Input,
  InputItemSchema,
  type PairingChallenge,
  PairingItemSchema,
  PowerStateItemSchema,
  type SettingItem,
  SettingItemSchema,
  type SliderInfo,
  SliderInfoItemSchema,
} from "./schema.js";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validate `data` against a schema, mapping failure to DECODE_ERROR.
 */
export function parseWith<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown,
  what: string,
): Result<z.output<S>, SmartCastError> {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    return err(
      decodeError(`Unexpected ${what}: ${parsed.error.issues[0]?.message}`, data),
    );
  }
  return ok(parsed.data);
}

// =============================================================================
// Envelope
// =============================================================================

/**
 * Map a `STATUS.RESULT` string to success or a typed API error.
 * Matching is case-insensitive.
 */
export const classifyResult = (
  result: string,
  detail: string,
): Result<void, SmartCastError> => {
  const code = result.toLowerCase();
  if (code === "success") {
    return ok(undefined);
  }
  if (isApiErrorCode(code)) {
    return err(apiError(code, detail));
  }
  return err(unrecognizedApiError(result, detail));
};

/**
 * Parse raw response text into a successful envelope.
 */
export const decodeEnvelope = (
  text: string,
): Result<Envelope, SmartCastError> => {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err(decodeError(`Response is not JSON: ${message}`, text));
  }

  return parseWith(EnvelopeSchema, data, "response envelope").andThen(
    (envelope) =>
      classifyResult(
        envelope.STATUS.RESULT,
        envelope.STATUS.DETAIL ?? "",
      ).map(() => envelope),
  );
};

/**
 * The sole ITEM, or the first of ITEMS when ITEM is absent, optionally
 * projected through one of its fields.
 */
export const firstItem = (
  envelope: Envelope,
  key?: string,
): Result<unknown, SmartCastError> => {
  const item =
    envelope.ITEM !== undefined ? envelope.ITEM : envelope.ITEMS?.[0];
  if (item === undefined) {
    return err(decodeError("Response has no ITEM or ITEMS", envelope));
  }
  if (key === undefined) {
    return ok(item);
  }
  if (!isRecord(item) || !(key in item)) {
    return err(decodeError(`Response item has no ${key}`, item));
  }
  return ok(item[key]);
};

export const items = (
  envelope: Envelope,
): Result<readonly unknown[], SmartCastError> => {
  if (envelope.ITEMS === undefined) {
    return err(decodeError("Response has no ITEMS", envelope));
  }
  return ok(envelope.ITEMS);
};

// =============================================================================
// Typed Extractors
// =============================================================================

export const extractPairing = (
  envelope: Envelope,
): Result<PairingChallenge, SmartCastError> =>
  firstItem(envelope)
    .andThen((item) => parseWith(PairingItemSchema, item, "pairing response"))
    .map((item) => ({
      pairingToken: item.PAIRING_REQ_TOKEN,
      challenge: item.CHALLENGE_TYPE,
    }));

export const extractAuthToken = (
  envelope: Envelope,
): Result<string, SmartCastError> =>
  firstItem(envelope)
    .andThen((item) => parseWith(AuthTokenItemSchema, item, "auth token"))
    .map((item) => item.AUTH_TOKEN);

export const extractPowerState = (
  envelope: Envelope,
): Result<boolean, SmartCastError> =>
  firstItem(envelope)
    .andThen((item) => parseWith(PowerStateItemSchema, item, "power state"))
    .map((item) => item.VALUE === 1);

export const extractDeviceInfo = (
  envelope: Envelope,
): Result<DeviceInfo, SmartCastError> =>
  firstItem(envelope)
    .andThen((item) => parseWith(DeviceInfoItemSchema, item, "device info"))
    .map(({ VALUE }) => ({
      castName: VALUE.CAST_NAME,
      inputs: VALUE.INPUTS,
      modelName: VALUE.MODEL_NAME,
      serialNumber: VALUE.SYSTEM_INFO.SERIAL_NUMBER,
      firmwareVersion: VALUE.SYSTEM_INFO.VERSION,
      chipset: VALUE.SYSTEM_INFO.CHIPSET,
      settingsRoot: VALUE.SETTINGS_ROOT,
    }));

export const extractCurrentInput = (
  envelope: Envelope,
): Result<CurrentInput, SmartCastError> =>
  firstItem(envelope)
    .andThen((item) =>
      parseWith(CurrentInputItemSchema, item, "current input"),
    )
    .map((item) => ({ name: item.VALUE, hashval: item.HASHVAL }));

export const extractInputList = (
  envelope: Envelope,
): Result<Input[], SmartCastError> =>
  items(envelope)
    .andThen((list) =>
      parseWith(InputItemSchema.array(), list, "input list"),
    )
    .map((list) =>
      list.map((item) => ({
        name: item.NAME,
        friendlyName:
          item.VALUE === undefined
            ? item.NAME
            : typeof item.VALUE === "string"
              ? item.VALUE
              : item.VALUE.NAME,
        hashval: item.HASHVAL,
      })),
    );

export const extractSettingItems = (
  envelope: Envelope,
): Result<SettingItem[], SmartCastError> =>
  items(envelope).andThen((list) =>
    parseWith(SettingItemSchema.array(), list, "settings listing"),
  );

export const extractSliderInfo = (
  envelope: Envelope,
): Result<SliderInfo, SmartCastError> =>
  firstItem(envelope)
    .andThen((item) => parseWith(SliderInfoItemSchema, item, "slider info"))
    .map((item) => ({
      decMarker: item.DECMARKER,
      incMarker: item.INCMARKER,
      increment: item.INCREMENT,
      min: item.MINIMUM,
      max: item.MAXIMUM,
      center: item.CENTER,
    }));

export const extractElements = (
  envelope: Envelope,
): Result<string[], SmartCastError> =>
  firstItem(envelope)
    .andThen((item) => parseWith(ElementsItemSchema, item, "element list"))
    .map((item) => item.ELEMENTS);

/**
 * Convert a wire app payload, treating a null MESSAGE as empty.
 */
export const toAppPayload = (
  wire: z.infer<typeof AppPayloadWireSchema>,
): AppPayload => ({
  nameSpace: wire.NAME_SPACE,
  appId: wire.APP_ID,
  message: wire.MESSAGE ?? "",
});

export const extractCurrentApp = (
  envelope: Envelope,
): Result<AppPayload | null, SmartCastError> =>
  firstItem(envelope)
    .andThen((item) => parseWith(CurrentAppItemSchema, item, "current app"))
    .map(({ VALUE }) => (VALUE === null ? null : toAppPayload(VALUE)));
