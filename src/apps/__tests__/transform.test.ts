/**
 * Transformation tests - joining the vendor app lists.
 */
import { describe, expect, it } from "vitest";

import {
  findByPayload,
  parseAvailability,
  parseCatalog,
  samePayload,
} from "../transform.js";

const availability = [
  {
    id: "1",
    chipsets: {
      "*": [
        {
          app_type_payload: { NAME_SPACE: 3, APP_ID: "1", MESSAGE: null },
        },
      ],
    },
  },
  {
    id: "2",
    chipsets: {
      "*": [
        {
          app_type_payload:
            '{"NAME_SPACE":2,"APP_ID":"4","MESSAGE":"https://example.test/app"}',
        },
      ],
    },
  },
  { id: "3", chipsets: { "*": [{ app_type_payload: "{broken" }] } },
  { id: "4" },
];

const catalog = [
  {
    id: "1",
    name: "Streamer",
    mobileAppInfo: {
      description: "Films and series",
      app_icon_image_url: "https://example.test/streamer.png",
    },
  },
  {
    id: "2",
    name: "Radio",
    mobileAppInfo: {
      description: "Live radio",
      app_icon_image_url: "https://example.test/radio.png",
    },
  },
  {
    id: "5",
    name: "Weather",
    mobileAppInfo: {
      description: "Forecasts",
      app_icon_image_url: "https://example.test/weather.png",
    },
  },
  { id: "6", name: "Broken" },
];

describe("parseAvailability", () => {
  it("reads object and string payloads, skipping bad entries", () => {
    const payloads = parseAvailability(availability);

    expect([...payloads.entries()]).toEqual([
      ["1", { nameSpace: 3, appId: "1", message: "" }],
      ["2", { nameSpace: 2, appId: "4", message: "https://example.test/app" }],
    ]);
  });

  it("returns an empty map for a non-array", () => {
    expect(parseAvailability({ apps: [] }).size).toBe(0);
  });
});

describe("parseCatalog", () => {
  it("joins catalogue entries with their payloads", () => {
    const apps = parseCatalog(catalog, parseAvailability(availability));

    expect(apps).toEqual([
      {
        id: "1",
        name: "Streamer",
        description: "Films and series",
        iconUrl: "https://example.test/streamer.png",
        payload: { nameSpace: 3, appId: "1", message: "" },
      },
      {
        id: "2",
        name: "Radio",
        description: "Live radio",
        iconUrl: "https://example.test/radio.png",
        payload: {
          nameSpace: 2,
          appId: "4",
          message: "https://example.test/app",
        },
      },
      {
        id: "5",
        name: "Weather",
        description: "Forecasts",
        iconUrl: "https://example.test/weather.png",
      },
    ]);
  });
});

describe("findByPayload", () => {
  const apps = parseCatalog(catalog, parseAvailability(availability));

  it("matches all three payload fields", () => {
    expect(
      findByPayload(apps, { nameSpace: 3, appId: "1", message: "" })?.name,
    ).toBe("Streamer");
  });

  it("returns null when the message differs", () => {
    expect(
      findByPayload(apps, { nameSpace: 3, appId: "1", message: "x" }),
    ).toBeNull();
  });

  it("compares payloads field by field", () => {
    const a = { nameSpace: 1, appId: "a", message: "" };

    expect(samePayload(a, { ...a })).toBe(true);
    expect(samePayload(a, { ...a, nameSpace: 2 })).toBe(false);
  });
});
