/**
 * Settings Module - Types
 *
 * Devices publish their settings as a self-describing tree. Node kinds
 * and values are only known once a listing has been read.
 */
import type { SliderInfo } from "../protocol/index.js";

export const SETTING_KINDS = [
  "MENU",
  "VALUE",
  "SLIDER",
  "LIST",
  "XLIST",
  "OTHER",
] as const;

export type SettingKind = (typeof SETTING_KINDS)[number];

/**
 * Wire TYPE for each known kind.
 */
export const WIRE_TYPES: Readonly<Record<Exclude<SettingKind, "OTHER">, string>> =
  {
    MENU: "T_MENU_V1",
    VALUE: "T_VALUE_V1",
    SLIDER: "T_VALUE_ABS_V1",
    LIST: "T_LIST_V1",
    XLIST: "T_LIST_X_V1",
  };

/**
 * Current value of a setting. Integers are kept apart from floats so a
 * write can be checked against the type the device reported.
 */
export type SettingValue =
  | { readonly type: "boolean"; readonly value: boolean }
  | { readonly type: "integer"; readonly value: number }
  | { readonly type: "float"; readonly value: number }
  | { readonly type: "string"; readonly value: string };

/**
 * JSON type of a setting value, as asked for by `valueAs`.
 */
export type JsonKind = "boolean" | "number" | "string";

/**
 * Values accepted by `update`.
 */
export type SettingInput = boolean | number | bigint | string;

export type SettingNodeData = Readonly<{
  /** Accumulated endpoint path, "" for the root menu */
  path: string;
  cname: string;
  name: string;
  kind: SettingKind;
  /** TYPE exactly as the device reported it */
  wireType: string;
  hidden: boolean;
  readOnly: boolean;
  value?: SettingValue;
  hashval?: number;
  elements?: readonly string[];
  slider?: SliderInfo;
}>;
