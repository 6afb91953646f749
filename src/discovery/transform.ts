/**
 * Discovery transformations - pure functions over SSDP messages and
 * description documents.
 */

/**
 * Search target answered by SmartCast devices.
 */
export const SSDP_SEARCH_TARGET = "urn:dial-multiscreen-org:device:dial:1";

/**
 * Manufacturer reported by SmartCast devices. Other DIAL devices that
 * answer the search are ignored.
 */
export const SMARTCAST_MANUFACTURER = "Vizio";

export const DESCRIPTION_PATH = "/ssdp/device-desc.xml";

export const buildSearchMessage = (
  address: string,
  port: number,
  waitSeconds: number,
): string =>
  [
    "M-SEARCH * HTTP/1.1",
    `HOST: ${address}:${port}`,
    'MAN: "ssdp:discover"',
    `ST: ${SSDP_SEARCH_TARGET}`,
    `MX: ${waitSeconds}`,
    "",
    "",
  ].join("\r\n");

/**
 * LOCATION header of an SSDP answer, matched case-insensitively.
 */
export const parseLocation = (message: string): string | null => {
  for (const line of message.split(/\r?\n/)) {
    const separator = line.indexOf(":");
    if (separator === -1) {
      continue;
    }
    if (line.slice(0, separator).trim().toLowerCase() === "location") {
      const value = line.slice(separator + 1).trim();
      return value === "" ? null : value;
    }
  }
  return null;
};

export const ipFromLocation = (location: string): string | null => {
  try {
    const hostname = new URL(location).hostname;
    return hostname === "" ? null : hostname;
  } catch {
    return null;
  }
};

/**
 * Drop a leading `scheme:` such as `uuid:` from a UDN.
 */
export const stripUuidPrefix = (udn: string): string => {
  const match = /^(?:\s*\w+\s*:\s*)?(.*)$/s.exec(udn);
  return match?.[1] ?? udn;
};

export const descriptionUrl = (ip: string, port: number): string =>
  `http://${ip}:${port}${DESCRIPTION_PATH}`;

export const isSmartCastManufacturer = (manufacturer: string): boolean =>
  manufacturer === SMARTCAST_MANUFACTURER;
