/**
 * Pairing Module - Service Layer
 *
 * Challenge and token exchange that turns a PIN shown on the device
 * into an auth token. Ordering is enforced by the device, which answers
 * out-of-order calls with BLOCKED or INVALID_PARAMETER.
 */
import { type Result, err, ok } from "neverthrow";

import {
  type CommandDispatcher,
  cancelPairing as cancelPairingCommand,
  finishPairing as finishPairingCommand,
  startPairing,
} from "../command/index.js";
import { createLogger } from "../logger.js";
import {
  type SmartCastError,
  extractAuthToken,
  extractPairing,
  formatSmartCastError,
} from "../protocol/index.js";
import type { PairingData } from "./schema.js";
import { sanitizePin } from "./transform.js";

const log = createLogger("pairing");

/**
 * Put the device into pairing mode. A TV shows a PIN on screen.
 */
export async function beginPairing(
  dispatcher: CommandDispatcher,
  clientName: string,
  clientId: string,
): Promise<Result<PairingData, SmartCastError>> {
  log.info({ clientId, clientName }, "Starting pairing");

  const result = (
    await dispatcher.send(startPairing(clientName, clientId))
  ).andThen(extractPairing);

  if (result.isErr()) {
    log.warn(
      { clientId, error: formatSmartCastError(result.error) },
      "Pairing could not start",
    );
    return err(result.error);
  }

  return ok({
    challenge: result.value.challenge,
    pairingToken: result.value.pairingToken,
    clientId,
    clientName,
  });
}

/**
 * Answer the challenge with the PIN and receive the auth token.
 */
export async function finishPairing(
  dispatcher: CommandDispatcher,
  pairing: PairingData,
  pin: string,
): Promise<Result<string, SmartCastError>> {
  const result = (
    await dispatcher.send(
      finishPairingCommand(
        pairing.clientId,
        pairing.pairingToken,
        pairing.challenge,
        sanitizePin(pin),
      ),
    )
  ).andThen(extractAuthToken);

  if (result.isErr()) {
    log.warn(
      { clientId: pairing.clientId, error: formatSmartCastError(result.error) },
      "Pairing was not accepted",
    );
    return result;
  }

  log.info({ clientId: pairing.clientId }, "Pairing complete");
  return result;
}

/**
 * Leave pairing mode without pairing.
 */
export async function cancelPairing(
  dispatcher: CommandDispatcher,
  pairing: PairingData,
): Promise<Result<void, SmartCastError>> {
  const result = await dispatcher.send(
    cancelPairingCommand(
      pairing.clientId,
      pairing.pairingToken,
      pairing.challenge,
    ),
  );

  if (result.isErr()) {
    return err(result.error);
  }

  log.info({ clientId: pairing.clientId }, "Pairing cancelled");
  return ok(undefined);
}
