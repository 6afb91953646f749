/**
 * Command Module - Types
 *
 * The closed set of operations a device understands. Each variant
 * carries exactly the data its path and body need.
 */
import type { Result } from "neverthrow";

import type { AppPayload, Envelope, SmartCastError } from "../protocol/index.js";
import type { KeyListEntry } from "../remote/index.js";

export type SettingsBase = "static" | "dynamic";

export type RequestType = "GET" | "PUT";

/**
 * JSON value written to a setting.
 */
export type WireScalar = boolean | number | string;

export type Command =
  | {
      readonly type: "START_PAIRING";
      readonly clientName: string;
      readonly clientId: string;
    }
  | {
      readonly type: "FINISH_PAIRING";
      readonly clientId: string;
      readonly pairingToken: number;
      readonly challenge: number;
      readonly pin: string;
    }
  | {
      readonly type: "CANCEL_PAIRING";
      readonly clientId: string;
      readonly pairingToken: number;
      readonly challenge: number;
    }
  | { readonly type: "GET_POWER_STATE" }
  | { readonly type: "GET_DEVICE_INFO" }
  | {
      readonly type: "REMOTE_BUTTON_PRESS";
      readonly keys: readonly KeyListEntry[];
    }
  | { readonly type: "GET_CURRENT_INPUT" }
  | { readonly type: "GET_INPUT_LIST" }
  | {
      readonly type: "CHANGE_INPUT";
      readonly name: string;
      readonly hashval: number;
    }
  | { readonly type: "GET_CURRENT_APP" }
  | { readonly type: "LAUNCH_APP"; readonly payload: AppPayload }
  | {
      readonly type: "READ_SETTINGS";
      readonly base: SettingsBase;
      readonly path: string;
    }
  | {
      readonly type: "WRITE_SETTINGS";
      readonly path: string;
      readonly hashval: number;
      readonly value: WireScalar;
    };

export type CommandType = Command["type"];

/**
 * Anything that can send a command to a device and hand back the
 * decoded envelope of a successful response.
 */
export interface CommandDispatcher {
  send(command: Command): Promise<Result<Envelope, SmartCastError>>;
}
