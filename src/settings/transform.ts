/**
 * Settings transformations - pure functions for classifying nodes and
 * checking values before they are written.
 */
import type { SettingItem } from "../protocol/index.js";
import {
  type JsonKind,
  type SettingInput,
  type SettingKind,
  type SettingNodeData,
  type SettingValue,
  WIRE_TYPES,
} from "./schema.js";

const INT32_MIN = -(2 ** 31);
const INT32_MAX = 2 ** 31 - 1;

export const kindFromWireType = (wireType: string): SettingKind => {
  switch (wireType) {
    case WIRE_TYPES.MENU:
      return "MENU";
    case WIRE_TYPES.VALUE:
      return "VALUE";
    case WIRE_TYPES.SLIDER:
      return "SLIDER";
    case WIRE_TYPES.LIST:
      return "LIST";
    case WIRE_TYPES.XLIST:
      return "XLIST";
    default:
      return "OTHER";
  }
};

const isInt32 = (value: number): boolean =>
  Number.isInteger(value) && value >= INT32_MIN && value <= INT32_MAX;

/**
 * Canonical form of a value a caller wants to write. Numbers that fit a
 * signed 32-bit integer are integers, other finite numbers are floats.
 * Returns null for NaN and the infinities.
 */
export const toSettingValue = (input: SettingInput): SettingValue | null => {
  if (typeof input === "boolean") {
    return { type: "boolean", value: input };
  }
  if (typeof input === "string") {
    return { type: "string", value: input };
  }

  const asNumber = Number(input);
  if (!Number.isFinite(asNumber)) {
    return null;
  }
  return isInt32(asNumber)
    ? { type: "integer", value: asNumber }
    : { type: "float", value: asNumber };
};

/**
 * Value as listed by the device. Null and absent both mean "no value".
 */
export const fromWireValue = (
  value: SettingItem["VALUE"],
): SettingValue | undefined => {
  if (value === undefined || value === null) {
    return undefined;
  }
  return toSettingValue(value) ?? undefined;
};

export const jsonKindOf = (value: SettingValue): JsonKind => {
  switch (value.type) {
    case "boolean":
      return "boolean";
    case "integer":
    case "float":
      return "number";
    case "string":
      return "string";
  }
};

/**
 * Whether `next` may replace `current`. An integer setting takes whole
 * numbers, including those beyond 32 bits, which the bounds check then
 * sees at full width. A float setting takes any number.
 */
export const valueFits = (current: SettingValue, next: SettingValue): boolean => {
  switch (current.type) {
    case "boolean":
      return next.type === "boolean";
    case "string":
      return next.type === "string";
    case "integer":
      return (
        next.type === "integer" ||
        (next.type === "float" && Number.isInteger(next.value))
      );
    case "float":
      return next.type === "integer" || next.type === "float";
  }
};

export const isWithinBounds = (value: number, min: number, max: number): boolean =>
  value >= min && value <= max;

/**
 * Join a child's CNAME onto its parent's path.
 */
export const childPath = (parentPath: string, cname: string): string =>
  `${parentPath}/${cname}`;

/**
 * Node data for one entry of a menu listing.
 */
export const nodeDataFromItem = (
  parentPath: string,
  item: SettingItem,
): SettingNodeData => {
  const value = fromWireValue(item.VALUE);
  return {
    path: childPath(parentPath, item.CNAME),
    cname: item.CNAME,
    name: item.NAME,
    kind: kindFromWireType(item.TYPE),
    wireType: item.TYPE,
    hidden: item.HIDDEN,
    readOnly: item.READONLY,
    ...(value !== undefined ? { value } : {}),
    ...(item.HASHVAL !== undefined ? { hashval: item.HASHVAL } : {}),
    ...(item.ELEMENTS !== undefined ? { elements: item.ELEMENTS } : {}),
  };
};

export const ROOT_NODE_DATA: SettingNodeData = {
  path: "",
  cname: "",
  name: "Settings",
  kind: "MENU",
  wireType: WIRE_TYPES.MENU,
  hidden: false,
  readOnly: true,
};
