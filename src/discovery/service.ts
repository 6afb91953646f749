/**
 * Discovery Module - Service Layer
 *
 * SSDP M-SEARCH over UDP, then a follow-up fetch of each answering
 * device's description document.
 */
import dgram from "node:dgram";

import { type Result, err, ok } from "neverthrow";
import { Parser } from "xml2js";

import { getDiscoveryConfig } from "../config.js";
import { createLogger } from "../logger.js";
import {
  type SmartCastError,
  formatSmartCastError,
  transportError,
} from "../protocol/index.js";
import { buildHeaders, type Transport } from "../transport/index.js";
import {
  type DeviceDescription,
  DescriptionDocumentSchema,
  type SsdpOptions,
} from "./schema.js";
import {
  buildSearchMessage,
  ipFromLocation,
  isSmartCastManufacturer,
  parseLocation,
  stripUuidPrefix,
} from "./transform.js";

const log = createLogger("discovery");

const xml = new Parser({ explicitArray: false, mergeAttrs: true, trim: true });

export function defaultSsdpOptions(): SsdpOptions {
  const { address, port, waitSeconds } = getDiscoveryConfig();
  return { address, port, waitSeconds };
}

// =============================================================================
// SSDP
// =============================================================================

/**
 * Multicast a search and collect the distinct LOCATION headers that come
 * back within the wait window.
 */
export function ssdpSearch(
  options: SsdpOptions = defaultSsdpOptions(),
): Promise<Result<string[], SmartCastError>> {
  return new Promise((resolve) => {
    const locations = new Set<string>();
    const socket = dgram.createSocket({ type: "udp4", reuseAddr: true });
    const message = buildSearchMessage(
      options.address,
      options.port,
      options.waitSeconds,
    );
    let timer: NodeJS.Timeout | undefined;
    let settled = false;

    const finish = (result: Result<string[], SmartCastError>): void => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      socket.close();
      resolve(result);
    };

    socket.on("message", (msg, rinfo) => {
      const location = parseLocation(msg.toString());
      if (location === null) {
        return;
      }
      if (!locations.has(location)) {
        log.debug({ location, from: rinfo.address }, "SSDP answer");
        locations.add(location);
      }
    });

    socket.on("error", (error) => {
      log.warn({ error: error.message }, "Discovery socket error");
      finish(
        err(
          transportError(`SSDP socket error: ${error.message}`, undefined, error),
        ),
      );
    });

    socket.bind(() => {
      socket.send(message, options.port, options.address, (error) => {
        if (error) {
          finish(
            err(
              transportError(
                `SSDP send failed: ${error.message}`,
                undefined,
                error,
              ),
            ),
          );
        }
      });

      timer = setTimeout(
        () => finish(ok([...locations])),
        options.collectMs ?? options.waitSeconds * 1000,
      );
    });
  });
}

// =============================================================================
// Description Document
// =============================================================================

/**
 * Identity from a description document. Null when the document cannot
 * be read or belongs to another manufacturer's device.
 */
export async function parseDescription(
  document: string,
  location: string,
): Promise<DeviceDescription | null> {
  let parsedXml: unknown;
  try {
    parsedXml = await xml.parseStringPromise(document);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log.warn({ location, error: message }, "Description is not valid XML");
    return null;
  }

  const parsed = DescriptionDocumentSchema.safeParse(parsedXml);
  if (!parsed.success) {
    log.debug({ location }, "Description lacks device identity");
    return null;
  }

  const { friendlyName, manufacturer, modelName, UDN } =
    parsed.data.root.device;
  if (!isSmartCastManufacturer(manufacturer)) {
    log.debug(
      { location, manufacturer },
      "Ignoring device of other manufacturer",
    );
    return null;
  }

  const ip = ipFromLocation(location);
  if (ip === null) {
    return null;
  }

  return {
    name: friendlyName,
    manufacturer,
    model: modelName,
    ip,
    uuid: stripUuidPrefix(UDN),
  };
}

/**
 * Fetch and parse the description document at `location`.
 */
export async function fetchDescription(
  transport: Transport,
  location: string,
): Promise<Result<DeviceDescription | null, SmartCastError>> {
  const response = await transport({
    method: "GET",
    url: location,
    headers: buildHeaders(undefined),
  });
  if (response.isErr()) {
    return err(response.error);
  }
  return ok(await parseDescription(response.value, location));
}

/**
 * Search the network and describe every SmartCast device that answers.
 * Devices whose description cannot be fetched are skipped.
 */
export async function discoverDescriptions(
  transport: Transport,
  options: SsdpOptions = defaultSsdpOptions(),
): Promise<Result<DeviceDescription[], SmartCastError>> {
  const search = await ssdpSearch(options);
  if (search.isErr()) {
    return err(search.error);
  }

  const descriptions: DeviceDescription[] = [];
  for (const location of search.value) {
    const description = await fetchDescription(transport, location);
    if (description.isErr()) {
      log.warn(
        { location, error: formatSmartCastError(description.error) },
        "Skipping device, description unavailable",
      );
      continue;
    }
    if (description.value !== null) {
      descriptions.push(description.value);
    }
  }

  log.info({ count: descriptions.length }, "Discovery finished");
  return ok(descriptions);
}
