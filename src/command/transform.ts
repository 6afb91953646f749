/**
 * Command transformations - pure functions computing the HTTP verb,
 * path and body of a command.
 */
import type { AppPayload } from "../protocol/index.js";
import type { KeyListEntry } from "../remote/index.js";
import type { Command, RequestType, SettingsBase, WireScalar } from "./schema.js";

/**
 * PIN sent when cancelling: the device ignores it but requires the field.
 */
export const CANCEL_RESPONSE_VALUE = "1111";

// =============================================================================
// Constructors
// =============================================================================

export const startPairing = (clientName: string, clientId: string): Command => ({
  type: "START_PAIRING",
  clientName,
  clientId,
});

export const finishPairing = (
  clientId: string,
  pairingToken: number,
  challenge: number,
  pin: string,
): Command => ({
  type: "FINISH_PAIRING",
  clientId,
  pairingToken,
  challenge,
  pin,
});

export const cancelPairing = (
  clientId: string,
  pairingToken: number,
  challenge: number,
): Command => ({ type: "CANCEL_PAIRING", clientId, pairingToken, challenge });

export const getPowerState = (): Command => ({ type: "GET_POWER_STATE" });

export const getDeviceInfo = (): Command => ({ type: "GET_DEVICE_INFO" });

export const remoteButtonPress = (keys: readonly KeyListEntry[]): Command => ({
  type: "REMOTE_BUTTON_PRESS",
  keys,
});

export const getCurrentInput = (): Command => ({ type: "GET_CURRENT_INPUT" });

export const getInputList = (): Command => ({ type: "GET_INPUT_LIST" });

export const changeInput = (name: string, hashval: number): Command => ({
  type: "CHANGE_INPUT",
  name,
  hashval,
});

export const getCurrentApp = (): Command => ({ type: "GET_CURRENT_APP" });

export const launchApp = (payload: AppPayload): Command => ({
  type: "LAUNCH_APP",
  payload,
});

export const readSettings = (base: SettingsBase, path: string): Command => ({
  type: "READ_SETTINGS",
  base,
  path,
});

export const writeSettings = (
  path: string,
  hashval: number,
  value: WireScalar,
): Command => ({ type: "WRITE_SETTINGS", path, hashval, value });

// =============================================================================
// Wire Mapping
// =============================================================================

/**
 * Path of the command, menu paths templated with the settings root.
 */
export const endpoint = (command: Command, settingsRoot: string): string => {
  switch (command.type) {
    case "START_PAIRING":
      return "/pairing/start";
    case "FINISH_PAIRING":
      return "/pairing/pair";
    case "CANCEL_PAIRING":
      return "/pairing/cancel";
    case "GET_POWER_STATE":
      return "/state/device/power_mode";
    case "GET_DEVICE_INFO":
      return "/state/device/deviceinfo";
    case "REMOTE_BUTTON_PRESS":
      return "/key_command/";
    case "GET_CURRENT_INPUT":
    case "CHANGE_INPUT":
      return `/menu_native/dynamic/${settingsRoot}/devices/current_input`;
    case "GET_INPUT_LIST":
      return `/menu_native/dynamic/${settingsRoot}/devices/name_input`;
    case "GET_CURRENT_APP":
      return "/app/current";
    case "LAUNCH_APP":
      return "/app/launch";
    case "READ_SETTINGS":
      return `/menu_native/${command.base}/${settingsRoot}${command.path}`;
    case "WRITE_SETTINGS":
      return `/menu_native/dynamic/${settingsRoot}${command.path}`;
  }
};

export const requestType = (command: Command): RequestType => {
  switch (command.type) {
    case "GET_POWER_STATE":
    case "GET_DEVICE_INFO":
    case "GET_CURRENT_INPUT":
    case "GET_INPUT_LIST":
    case "GET_CURRENT_APP":
    case "READ_SETTINGS":
      return "GET";
    case "START_PAIRING":
    case "FINISH_PAIRING":
    case "CANCEL_PAIRING":
    case "REMOTE_BUTTON_PRESS":
    case "CHANGE_INPUT":
    case "LAUNCH_APP":
    case "WRITE_SETTINGS":
      return "PUT";
  }
};

/**
 * JSON body of a PUT command; undefined for GET commands.
 */
export const body = (command: Command): Record<string, unknown> | undefined => {
  switch (command.type) {
    case "START_PAIRING":
      return { DEVICE_NAME: command.clientName, DEVICE_ID: command.clientId };
    case "FINISH_PAIRING":
      return {
        DEVICE_ID: command.clientId,
        CHALLENGE_TYPE: command.challenge,
        RESPONSE_VALUE: command.pin,
        PAIRING_REQ_TOKEN: command.pairingToken,
      };
    case "CANCEL_PAIRING":
      return {
        DEVICE_ID: command.clientId,
        CHALLENGE_TYPE: command.challenge,
        RESPONSE_VALUE: CANCEL_RESPONSE_VALUE,
        PAIRING_REQ_TOKEN: command.pairingToken,
      };
    case "REMOTE_BUTTON_PRESS":
      return { KEYLIST: command.keys };
    case "CHANGE_INPUT":
      return { REQUEST: "MODIFY", VALUE: command.name, HASHVAL: command.hashval };
    case "LAUNCH_APP":
      return {
        VALUE: {
          NAME_SPACE: command.payload.nameSpace,
          APP_ID: command.payload.appId,
          MESSAGE: command.payload.message,
        },
      };
    case "WRITE_SETTINGS":
      return { REQUEST: "MODIFY", VALUE: command.value, HASHVAL: command.hashval };
    case "GET_POWER_STATE":
    case "GET_DEVICE_INFO":
    case "GET_CURRENT_INPUT":
    case "GET_INPUT_LIST":
    case "GET_CURRENT_APP":
    case "READ_SETTINGS":
      return undefined;
  }
};
