/**
 * Remote Module - Service Layer
 *
 * Sends virtual remote key events. Some firmware only accepts the
 * alternate directional pad codes, so a rejected event list is sent
 * once more with those codes when any of its buttons has one.
 */
import { type Result, err, ok } from "neverthrow";

import { type CommandDispatcher, remoteButtonPress } from "../command/index.js";
import { createLogger } from "../logger.js";
import {
  type SmartCastError,
  errorTier,
  formatSmartCastError,
} from "../protocol/index.js";
import type { ButtonEvent } from "./schema.js";
import { buildAlternateKeyList, buildKeyList } from "./transform.js";

const log = createLogger("remote");

export async function sendButtonEvents(
  dispatcher: CommandDispatcher,
  events: readonly ButtonEvent[],
): Promise<Result<void, SmartCastError>> {
  const primary = await dispatcher.send(
    remoteButtonPress(buildKeyList(events)),
  );
  if (primary.isOk()) {
    return ok(undefined);
  }

  const alternate = buildAlternateKeyList(events);
  if (errorTier(primary.error) !== "api" || alternate === null) {
    return err(primary.error);
  }

  log.debug(
    { events, error: formatSmartCastError(primary.error) },
    "Key codes rejected, retrying with alternate codes",
  );

  const retried = await dispatcher.send(remoteButtonPress(alternate));
  if (retried.isErr()) {
    return err(retried.error);
  }
  return ok(undefined);
}
