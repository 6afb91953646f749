/**
 * Protocol Module - Wire Schemas
 *
 * Shapes of the JSON the device sends back. Schemas are the source of
 * truth - types are derived with z.infer<>.
 */
import { z } from "zod";

// =============================================================================
// Envelope
// =============================================================================

/**
 * Every response is wrapped as `{ STATUS, ITEM? , ITEMS? }`.
 */
export const EnvelopeSchema = z
  .object({
    STATUS: z
      .object({
        RESULT: z.string().describe("SUCCESS or a vendor error code"),
        DETAIL: z.string().nullish().describe("Human-readable detail"),
      })
      .passthrough(),
    ITEM: z.unknown().optional(),
    ITEMS: z.array(z.unknown()).optional(),
  })
  .passthrough();

export type Envelope = z.infer<typeof EnvelopeSchema>;

// =============================================================================
// Pairing
// =============================================================================

export const PairingItemSchema = z.object({
  PAIRING_REQ_TOKEN: z.number().int(),
  CHALLENGE_TYPE: z.number().int(),
});

export const AuthTokenItemSchema = z.object({
  AUTH_TOKEN: z.string().min(1),
});

// =============================================================================
// Device State
// =============================================================================

export const PowerStateItemSchema = z.object({
  VALUE: z.number(),
});

export const SystemInfoSchema = z
  .object({
    CHIPSET: z.number(),
    SERIAL_NUMBER: z.string(),
    VERSION: z.string(),
  })
  .passthrough();

export const DeviceInfoValueSchema = z
  .object({
    CAST_NAME: z.string(),
    INPUTS: z.array(z.string()).default([]),
    MODEL_NAME: z.string(),
    SETTINGS_ROOT: z.string(),
    SYSTEM_INFO: SystemInfoSchema,
  })
  .passthrough();

export const DeviceInfoItemSchema = z.object({
  VALUE: DeviceInfoValueSchema,
});

// =============================================================================
// Inputs
// =============================================================================

/**
 * Input list entries report VALUE either as the friendly name or as an
 * object carrying it.
 */
export const InputItemSchema = z.object({
  CNAME: z.string().optional(),
  NAME: z.string(),
  HASHVAL: z.number(),
  VALUE: z
    .union([
      z.string(),
      z.object({ NAME: z.string(), METADATA: z.unknown().optional() }),
    ])
    .optional(),
});

export const CurrentInputItemSchema = z.object({
  NAME: z.string(),
  VALUE: z.string(),
  HASHVAL: z.number(),
});

// =============================================================================
// Settings
// =============================================================================

/**
 * Boolean flags arrive as "TRUE"/"FALSE" strings on most firmware.
 */
const WireFlagSchema = z
  .union([z.boolean(), z.string()])
  .optional()
  .transform((val) =>
    typeof val === "string" ? val.toUpperCase() === "TRUE" : val === true,
  );

export const WireValueSchema = z.union([
  z.boolean(),
  z.number(),
  z.string(),
  z.null(),
]);

export const SettingItemSchema = z
  .object({
    CNAME: z.string(),
    NAME: z.string().default(""),
    TYPE: z.string(),
    HIDDEN: WireFlagSchema,
    READONLY: WireFlagSchema,
    VALUE: WireValueSchema.optional(),
    HASHVAL: z.number().optional(),
    ELEMENTS: z.array(z.string()).optional(),
  })
  .passthrough();

export type SettingItem = z.infer<typeof SettingItemSchema>;

export const SliderInfoItemSchema = z
  .object({
    DECMARKER: z.string(),
    INCMARKER: z.string(),
    INCREMENT: z.number(),
    MAXIMUM: z.number(),
    MINIMUM: z.number(),
    CENTER: z.number(),
  })
  .passthrough();

export const ElementsItemSchema = z
  .object({
    ELEMENTS: z.array(z.string()),
  })
  .passthrough();

// =============================================================================
// Apps
// =============================================================================

export const AppPayloadWireSchema = z.object({
  NAME_SPACE: z.number().int(),
  APP_ID: z.string(),
  MESSAGE: z.string().nullish(),
});

/**
 * VALUE is null when no app is in the foreground.
 */
export const CurrentAppItemSchema = z.object({
  VALUE: AppPayloadWireSchema.nullable(),
});

// =============================================================================
// Domain Types
// =============================================================================

export type DeviceInfo = Readonly<{
  castName: string;
  inputs: readonly string[];
  modelName: string;
  serialNumber: string;
  firmwareVersion: string;
  chipset: number;
  settingsRoot: string;
}>;

/**
 * An entry of the input list. `name` is the input's wire name
 * (e.g. "HDMI-1"), `friendlyName` the label shown on screen.
 */
export type Input = Readonly<{
  name: string;
  friendlyName: string;
  hashval: number;
}>;

export type CurrentInput = Readonly<{
  name: string;
  hashval: number;
}>;

export type PairingChallenge = Readonly<{
  pairingToken: number;
  challenge: number;
}>;

export type SliderInfo = Readonly<{
  decMarker: string;
  incMarker: string;
  increment: number;
  min: number;
  max: number;
  center: number;
}>;

export type AppPayload = Readonly<{
  nameSpace: number;
  appId: string;
  message: string;
}>;
