/**
 * Simulated SmartCast device for tests.
 *
 * A Hono app answers the device API routes in process. Its `transport`
 * stands in for the HTTP transport: requests for the device's API port
 * or description port are routed into the app, anything else fails the
 * way an unreachable host does.
 */
import { Hono } from "hono";
import type { Context } from "hono";
import { err, ok } from "neverthrow";
import { z } from "zod";

import { type ConnectOptions, Device } from "../../device/index.js";
import { type AppPayload, transportError } from "../../protocol/index.js";
import { BUTTON_CODES } from "../../remote/index.js";
import type {
  HttpMethod,
  HttpRequest,
  Transport,
} from "../../transport/index.js";

// =============================================================================
// Types
// =============================================================================

export type SimulatedSliderBounds = {
  min: number;
  max: number;
  increment: number;
  center: number;
};

export type SimulatedSetting = {
  cname: string;
  name: string;
  kind: "MENU" | "VALUE" | "SLIDER" | "LIST" | "XLIST" | "OTHER";
  hashval: number;
  /** TYPE to report in menu listings, when it differs from the kind */
  listedType?: string;
  value?: boolean | number | string | null;
  readOnly?: boolean;
  hidden?: boolean;
  elements?: string[];
  /** Include ELEMENTS in menu listings (XLIST does by default) */
  embedElements?: boolean;
  slider?: SimulatedSliderBounds;
  children?: SimulatedSetting[];
};

export type SimulatedInput = {
  name: string;
  friendlyName: string;
};

export type SimulatedDeviceOptions = {
  ip?: string;
  apiPort?: number;
  descriptionPort?: number;
  settingsRoot?: string;
  name?: string;
  manufacturer?: string;
  model?: string;
  uuid?: string;
  pin?: string;
  issuedToken?: string;
  /** Reject menu requests whose AUTH header is not an accepted token */
  requireAuth?: boolean;
  /** Accept only the alternate directional pad codes */
  alternateDpad?: boolean;
  poweredOn?: boolean;
  inputs?: SimulatedInput[];
  currentInput?: string;
  currentApp?: AppPayload | null;
  settings?: SimulatedSetting[];
};

export type RecordedRequest = {
  method: string;
  path: string;
  auth: string | undefined;
  body: unknown;
};

type PairingState =
  | { state: "READY" }
  | { state: "PAIRING"; challenge: number; token: number; clientId: string };

const WIRE_TYPES: Record<SimulatedSetting["kind"], string> = {
  MENU: "T_MENU_V1",
  VALUE: "T_VALUE_V1",
  SLIDER: "T_VALUE_ABS_V1",
  LIST: "T_LIST_V1",
  XLIST: "T_LIST_X_V1",
  OTHER: "T_HEADER_V1",
};

const PRIMARY_DPAD = [0, 1, 8, 7, 2];
const ALTERNATE_DPAD = [0, 1, 3, 5, 2];

const PairingStartBody = z.object({
  DEVICE_ID: z.string(),
  DEVICE_NAME: z.string(),
});

const PairingAnswerBody = z.object({
  DEVICE_ID: z.string(),
  CHALLENGE_TYPE: z.number(),
  RESPONSE_VALUE: z.string(),
  PAIRING_REQ_TOKEN: z.number(),
});

const KeyListBody = z.object({
  KEYLIST: z.array(
    z.object({ CODESET: z.number(), CODE: z.number(), ACTION: z.string() }),
  ),
});

const ModifyBody = z.object({
  REQUEST: z.literal("MODIFY"),
  VALUE: z.union([z.boolean(), z.number(), z.string()]),
  HASHVAL: z.number(),
});

const LaunchBody = z.object({
  VALUE: z.object({
    NAME_SPACE: z.number(),
    APP_ID: z.string(),
    MESSAGE: z.string(),
  }),
});

const status = (result: string, detail = "Success") => ({
  STATUS: { RESULT: result, DETAIL: detail },
});

// =============================================================================
// SimulatedDevice
// =============================================================================

export class SimulatedDevice {
  readonly ip: string;
  readonly apiPort: number;
  readonly descriptionPort: number;
  readonly settingsRoot: string;
  readonly name: string;
  readonly manufacturer: string;
  readonly model: string;
  readonly uuid: string;

  readonly requests: RecordedRequest[] = [];
  readonly keys: { codeset: number; code: number; action: string }[] = [];

  poweredOn: boolean;
  currentInput: string;
  inputHashval = 1000;
  currentApp: AppPayload | null;
  pairing: PairingState = { state: "READY" };

  private readonly pin: string;
  private readonly issuedToken: string;
  private readonly requireAuth: boolean;
  private readonly alternateDpad: boolean;
  private readonly inputs: SimulatedInput[];
  private readonly settings: SimulatedSetting[];
  private readonly acceptedTokens = new Set<string>();
  private readonly unreachablePaths: {
    prefix: string;
    method: HttpMethod | undefined;
  }[] = [];
  private nextPairingToken = 5001;
  private nextSettingHashval = 9001;
  private staleInputAfterRead = false;
  private readonly app = new Hono();

  constructor(options: SimulatedDeviceOptions = {}) {
    this.ip = options.ip ?? "192.168.1.50";
    this.apiPort = options.apiPort ?? 7345;
    this.descriptionPort = options.descriptionPort ?? 8008;
    this.settingsRoot = options.settingsRoot ?? "tv_settings";
    this.name = options.name ?? "Living Room TV";
    this.manufacturer = options.manufacturer ?? "Vizio";
    this.model = options.model ?? "P65Q9-H1";
    this.uuid = options.uuid ?? "8a7b6c5d-0000-1111-2222-333344445555";
    this.pin = options.pin ?? "1234";
    this.issuedToken = options.issuedToken ?? "test-token";
    this.requireAuth = options.requireAuth ?? false;
    this.alternateDpad = options.alternateDpad ?? false;
    this.poweredOn = options.poweredOn ?? true;
    this.inputs = options.inputs ?? [
      { name: "HDMI-1", friendlyName: "Console" },
      { name: "HDMI-2", friendlyName: "HDMI-2" },
      { name: "CAST", friendlyName: "CAST" },
    ];
    this.currentInput = options.currentInput ?? "CAST";
    this.currentApp = options.currentApp ?? null;
    this.settings = options.settings ?? [];
    this.registerRoutes();
  }

  // ===========================================================================
  // Test controls
  // ===========================================================================

  /**
   * Requests whose path starts with `prefix` fail like a dropped
   * connection. Limited to one method when `method` is given.
   */
  makeUnreachable(prefix: string, method?: HttpMethod): void {
    this.unreachablePaths.push({ prefix, method });
  }

  /**
   * The next current-input read reports a hashval that is already stale.
   */
  staleCurrentInputOnNextRead(): void {
    this.staleInputAfterRead = true;
  }

  acceptToken(token: string): void {
    this.acceptedTokens.add(token);
  }

  findSetting(path: string): SimulatedSetting | undefined {
    return this.lookup(path);
  }

  requestsTo(path: string): RecordedRequest[] {
    return this.requests.filter((request) => request.path === path);
  }

  menuPath(path: string, base: "static" | "dynamic" = "dynamic"): string {
    return `/menu_native/${base}/${this.settingsRoot}${path}`;
  }

  // ===========================================================================
  // Transport
  // ===========================================================================

  readonly transport: Transport = async (request: HttpRequest) => {
    const url = new URL(request.url);
    const port = Number(url.port);

    if (url.hostname !== this.ip) {
      return err(transportError("connect EHOSTUNREACH", request.url));
    }
    const dropped = this.unreachablePaths.some(
      (entry) =>
        url.pathname.startsWith(entry.prefix) &&
        (entry.method === undefined || entry.method === request.method),
    );
    if (dropped) {
      return err(transportError("socket hang up", request.url));
    }

    if (port === this.descriptionPort && url.protocol === "http:") {
      if (url.pathname !== "/ssdp/device-desc.xml") {
        return ok("Not Found");
      }
      return ok(this.descriptionXml());
    }

    if (port !== this.apiPort || url.protocol !== "https:") {
      return err(transportError("connect ECONNREFUSED", request.url));
    }

    const response = await this.app.request(request.url, {
      method: request.method,
      headers: request.headers,
      body: request.body,
    });
    return ok(await response.text());
  };

  // ===========================================================================
  // Routes
  // ===========================================================================

  private registerRoutes(): void {
    const app = this.app;

    app.use("*", async (c, next) => {
      const text = await c.req.text();
      let body: unknown;
      try {
        body = text === "" ? undefined : JSON.parse(text);
      } catch {
        body = text;
      }
      this.requests.push({
        method: c.req.method,
        path: c.req.path,
        auth: c.req.header("AUTH"),
        body,
      });
      await next();
    });

    app.put("/pairing/start", (c) => this.pairStart(c));
    app.put("/pairing/pair", (c) => this.pairFinish(c));
    app.put("/pairing/cancel", (c) => this.pairCancel(c));

    app.get("/state/device/power_mode", (c) =>
      c.json({
        ...status("SUCCESS"),
        ITEMS: [
          {
            CNAME: "power_mode",
            NAME: "Power Mode",
            TYPE: "T_VALUE_V1",
            VALUE: this.poweredOn ? 1 : 0,
          },
        ],
      }),
    );

    app.get("/state/device/deviceinfo", (c) =>
      c.json({
        ...status("SUCCESS"),
        ITEMS: [
          {
            CNAME: "deviceinfo",
            NAME: "Device Info",
            TYPE: "T_DEVICE_INFO_V1",
            VALUE: {
              CAST_NAME: this.name,
              INPUTS: this.inputs.map((input) => input.name),
              MODEL_NAME: this.model,
              SETTINGS_ROOT: this.settingsRoot,
              SYSTEM_INFO: {
                CHIPSET: 4,
                SERIAL_NUMBER: "LTMSVNAS0000001",
                VERSION: "3.720.9.1-2",
              },
            },
          },
        ],
      }),
    );

    app.put("/key_command/", (c) => this.keyCommand(c));

    app.get("/app/current", (c) =>
      c.json({
        ...status("SUCCESS"),
        ITEM: {
          NAME: "Current App",
          TYPE: "T_APP_V1",
          VALUE:
            this.currentApp === null
              ? null
              : {
                  NAME_SPACE: this.currentApp.nameSpace,
                  APP_ID: this.currentApp.appId,
                  MESSAGE: this.currentApp.message === "" ? null : this.currentApp.message,
                },
        },
      }),
    );

    app.put("/app/launch", async (c) => {
      const body = LaunchBody.safeParse(await c.req.json());
      if (!body.success) {
        return c.json(status("INVALID_PARAMETER", "Bad launch payload"));
      }
      this.currentApp = {
        nameSpace: body.data.VALUE.NAME_SPACE,
        appId: body.data.VALUE.APP_ID,
        message: body.data.VALUE.MESSAGE,
      };
      return c.json(status("SUCCESS"));
    });

    app.get("/menu_native/dynamic/:root/devices/current_input", (c) =>
      this.readCurrentInput(c),
    );
    app.put("/menu_native/dynamic/:root/devices/current_input", (c) =>
      this.writeCurrentInput(c),
    );
    app.get("/menu_native/dynamic/:root/devices/name_input", (c) =>
      this.readInputList(c),
    );

    app.get("/menu_native/:base/:root", (c) => this.readSetting(c));
    app.get("/menu_native/:base/:root/*", (c) => this.readSetting(c));
    app.put("/menu_native/:base/:root/*", (c) => this.writeSetting(c));

    app.notFound((c) => c.json(status("URI_NOT_FOUND", "No such endpoint")));
  }

  // ===========================================================================
  // Pairing
  // ===========================================================================

  private async pairStart(c: Context) {
    const body = PairingStartBody.safeParse(await c.req.json());
    if (!body.success) {
      return c.json(status("INVALID_PARAMETER", "Missing device id"));
    }
    if (this.pairing.state !== "READY") {
      return c.json(status("BLOCKED", "Pairing in progress"));
    }
    const token = this.nextPairingToken++;
    this.pairing = {
      state: "PAIRING",
      challenge: 1,
      token,
      clientId: body.data.DEVICE_ID,
    };
    return c.json({
      ...status("SUCCESS"),
      ITEM: { PAIRING_REQ_TOKEN: token, CHALLENGE_TYPE: 1 },
    });
  }

  private async pairFinish(c: Context) {
    const body = PairingAnswerBody.safeParse(await c.req.json());
    if (!body.success) {
      return c.json(status("INVALID_PARAMETER", "Malformed pairing answer"));
    }
    if (this.pairing.state !== "PAIRING") {
      return c.json(status("BLOCKED", "Not pairing"));
    }
    const answer = body.data;
    if (answer.CHALLENGE_TYPE !== this.pairing.challenge) {
      return c.json(status("CHALLENGE_INCORRECT", "Wrong challenge"));
    }
    if (
      answer.DEVICE_ID !== this.pairing.clientId ||
      answer.PAIRING_REQ_TOKEN !== this.pairing.token
    ) {
      return c.json(status("INVALID_PARAMETER", "Unknown pairing request"));
    }
    if (answer.RESPONSE_VALUE !== this.pin) {
      return c.json(status("CHALLENGE_INCORRECT", "Wrong PIN"));
    }
    this.pairing = { state: "READY" };
    this.acceptedTokens.add(this.issuedToken);
    return c.json({ ...status("SUCCESS"), ITEM: { AUTH_TOKEN: this.issuedToken } });
  }

  private async pairCancel(c: Context) {
    const body = PairingAnswerBody.safeParse(await c.req.json());
    if (!body.success) {
      return c.json(status("INVALID_PARAMETER", "Malformed cancel"));
    }
    if (
      this.pairing.state !== "PAIRING" ||
      body.data.DEVICE_ID !== this.pairing.clientId ||
      body.data.PAIRING_REQ_TOKEN !== this.pairing.token
    ) {
      return c.json(status("BLOCKED", "Not pairing"));
    }
    this.pairing = { state: "READY" };
    return c.json(status("SUCCESS"));
  }

  // ===========================================================================
  // Remote
  // ===========================================================================

  private async keyCommand(c: Context) {
    const body = KeyListBody.safeParse(await c.req.json());
    if (!body.success) {
      return c.json(status("INVALID_PARAMETER", "Malformed KEYLIST"));
    }
    const dpad = this.alternateDpad ? ALTERNATE_DPAD : PRIMARY_DPAD;
    const known = Object.values(BUTTON_CODES);
    for (const key of body.data.KEYLIST) {
      const accepted =
        key.CODESET === 3
          ? dpad.includes(key.CODE)
          : known.some(
              (code) => code.codeset === key.CODESET && code.code === key.CODE,
            );
      if (!accepted) {
        return c.json(status("INVALID_PARAMETER", "Unknown key code"));
      }
    }
    for (const key of body.data.KEYLIST) {
      this.keys.push({ codeset: key.CODESET, code: key.CODE, action: key.ACTION });
    }
    return c.json(status("SUCCESS"));
  }

  // ===========================================================================
  // Inputs
  // ===========================================================================

  private authorized(c: Context): boolean {
    if (!this.requireAuth) {
      return true;
    }
    const token = c.req.header("AUTH");
    return token !== undefined && this.acceptedTokens.has(token);
  }

  private readCurrentInput(c: Context) {
    if (c.req.param("root") !== this.settingsRoot) {
      return c.json(status("URI_NOT_FOUND", "No such menu"));
    }
    if (!this.authorized(c)) {
      return c.json(status("REQUIRES_PAIRING", "Not paired"));
    }
    const hashval = this.inputHashval;
    if (this.staleInputAfterRead) {
      this.staleInputAfterRead = false;
      this.inputHashval += 1;
    }
    return c.json({
      ...status("SUCCESS"),
      ITEMS: [
        {
          CNAME: "current_input",
          NAME: "Current Input",
          TYPE: "T_STRING_V1",
          VALUE: this.currentInput,
          HASHVAL: hashval,
          HIDDEN: "TRUE",
        },
      ],
    });
  }

  private async writeCurrentInput(c: Context) {
    if (!this.authorized(c)) {
      return c.json(status("REQUIRES_PAIRING", "Not paired"));
    }
    const body = ModifyBody.safeParse(await c.req.json());
    if (!body.success || typeof body.data.VALUE !== "string") {
      return c.json(status("INVALID_PARAMETER", "Malformed input change"));
    }
    if (body.data.HASHVAL !== this.inputHashval) {
      return c.json(status("HASHVAL_ERROR", "Hashval mismatch"));
    }
    const target = body.data.VALUE;
    if (!this.inputs.some((input) => input.name === target)) {
      return c.json(status("INVALID_PARAMETER", "Unknown input"));
    }
    this.currentInput = target;
    this.inputHashval += 1;
    return c.json(status("SUCCESS"));
  }

  private readInputList(c: Context) {
    if (!this.authorized(c)) {
      return c.json(status("REQUIRES_PAIRING", "Not paired"));
    }
    return c.json({
      ...status("SUCCESS"),
      ITEMS: this.inputs.map((input, index) => ({
        CNAME: `input_${index}`,
        NAME: input.name,
        TYPE: "T_DEVICE_V1",
        HASHVAL: 2000 + index,
        VALUE:
          index % 2 === 0
            ? input.friendlyName
            : { NAME: input.friendlyName, METADATA: "" },
      })),
    });
  }

  // ===========================================================================
  // Settings
  // ===========================================================================

  private subPath(c: Context): string {
    const prefix = `/menu_native/${c.req.param("base")}/${c.req.param("root")}`;
    return c.req.path.slice(prefix.length).replace(/\/$/, "");
  }

  private lookup(path: string): SimulatedSetting | undefined {
    const segments = path.split("/").filter((segment) => segment !== "");
    let level = this.settings;
    let found: SimulatedSetting | undefined;
    for (const segment of segments) {
      found = level.find((setting) => setting.cname === segment);
      if (found === undefined) {
        return undefined;
      }
      level = found.children ?? [];
    }
    return found;
  }

  private listedItem(setting: SimulatedSetting): Record<string, unknown> {
    const embed = setting.embedElements ?? setting.kind === "XLIST";
    return {
      CNAME: setting.cname,
      NAME: setting.name,
      TYPE: setting.listedType ?? WIRE_TYPES[setting.kind],
      HASHVAL: setting.hashval,
      ...(setting.kind !== "MENU" && setting.value !== undefined
        ? { VALUE: setting.value }
        : {}),
      ...(embed && setting.elements ? { ELEMENTS: setting.elements } : {}),
      ...(setting.readOnly !== undefined
        ? { READONLY: setting.readOnly ? "TRUE" : "FALSE" }
        : {}),
      ...(setting.hidden !== undefined
        ? { HIDDEN: setting.hidden ? "TRUE" : "FALSE" }
        : {}),
    };
  }

  private readSetting(c: Context) {
    if (c.req.param("root") !== this.settingsRoot) {
      return c.json(status("URI_NOT_FOUND", "No such menu"));
    }
    if (!this.authorized(c)) {
      return c.json(status("REQUIRES_PAIRING", "Not paired"));
    }

    const path = this.subPath(c);
    const base = c.req.param("base");
    const setting = path === "" ? undefined : this.lookup(path);

    if (base === "dynamic") {
      if (path === "") {
        return c.json({
          ...status("SUCCESS"),
          ITEMS: this.settings.map((child) => this.listedItem(child)),
        });
      }
      if (setting === undefined) {
        return c.json(status("URI_NOT_FOUND", "No such setting"));
      }
      if (setting.kind === "MENU") {
        return c.json({
          ...status("SUCCESS"),
          ITEMS: (setting.children ?? []).map((child) => this.listedItem(child)),
        });
      }
      return c.json({
        ...status("SUCCESS"),
        ITEMS: [this.listedItem(setting)],
      });
    }

    if (base === "static" && setting !== undefined) {
      if (setting.kind === "SLIDER" && setting.slider) {
        return c.json({
          ...status("SUCCESS"),
          HASHVAL: setting.hashval,
          ITEMS: [
            {
              CNAME: setting.cname,
              NAME: setting.name,
              TYPE: "T_VALUE_ABS_V1",
              CENTER: setting.slider.center,
              DECMARKER: "low_end",
              INCMARKER: "high_end",
              INCREMENT: setting.slider.increment,
              MAXIMUM: setting.slider.max,
              MINIMUM: setting.slider.min,
            },
          ],
        });
      }
      if (
        (setting.kind === "LIST" || setting.kind === "XLIST") &&
        setting.elements
      ) {
        return c.json({
          ...status("SUCCESS"),
          HASHVAL: setting.hashval,
          ITEMS: [
            {
              CNAME: setting.cname,
              NAME: setting.name,
              TYPE: WIRE_TYPES[setting.kind],
              ELEMENTS: setting.elements,
            },
          ],
        });
      }
    }

    return c.json(status("URI_NOT_FOUND", "No such setting"));
  }

  private async writeSetting(c: Context) {
    if (c.req.param("root") !== this.settingsRoot) {
      return c.json(status("URI_NOT_FOUND", "No such menu"));
    }
    if (!this.authorized(c)) {
      return c.json(status("REQUIRES_PAIRING", "Not paired"));
    }
    const setting =
      c.req.param("base") === "dynamic"
        ? this.lookup(this.subPath(c))
        : undefined;
    if (setting === undefined || setting.kind === "MENU") {
      return c.json(status("URI_NOT_FOUND", "No such setting"));
    }
    const body = ModifyBody.safeParse(await c.req.json());
    if (!body.success) {
      return c.json(status("INVALID_PARAMETER", "Malformed write"));
    }
    if (body.data.HASHVAL !== setting.hashval) {
      return c.json(status("HASHVAL_ERROR", "Hashval mismatch"));
    }
    if (setting.readOnly) {
      return c.json(status("FAILURE", "Read-only setting"));
    }
    setting.value = body.data.VALUE;
    setting.hashval = this.nextSettingHashval++;
    return c.json(status("SUCCESS"));
  }

  // ===========================================================================
  // Description
  // ===========================================================================

  private descriptionXml(): string {
    return [
      '<?xml version="1.0"?>',
      '<root xmlns="urn:schemas-upnp-org:device-1-0">',
      "  <specVersion><major>1</major><minor>0</minor></specVersion>",
      `  <URLBase>http://${this.ip}:${this.descriptionPort}</URLBase>`,
      "  <device>",
      "    <deviceType>urn:dial-multiscreen-org:device:dial:1</deviceType>",
      `    <friendlyName>${this.name}</friendlyName>`,
      `    <manufacturer>${this.manufacturer}</manufacturer>`,
      `    <modelName>${this.model}</modelName>`,
      `    <UDN>uuid:${this.uuid}</UDN>`,
      "  </device>",
      "</root>",
    ].join("\n");
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Connect a Device to the simulator through its transport.
 */
export async function connectSimulated(
  device: SimulatedDevice,
  options: Omit<ConnectOptions, "transport"> = {},
): Promise<Device> {
  const connected = await Device.connect(
    {
      name: device.name,
      manufacturer: device.manufacturer,
      model: device.model,
      ip: device.ip,
      uuid: device.uuid,
    },
    { ports: [device.apiPort], ...options, transport: device.transport },
  );
  return connected._unsafeUnwrap();
}

/**
 * Settings tree with one node of each writable kind, a disguised slider
 * and a read-only menu entry.
 */
export const sampleSettings = (): SimulatedSetting[] => [
  {
    cname: "picture",
    name: "Picture",
    kind: "MENU",
    hashval: 100,
    children: [
      {
        cname: "brightness",
        name: "Brightness",
        kind: "SLIDER",
        hashval: 101,
        value: 50,
        slider: { min: 0, max: 100, increment: 1, center: 50 },
      },
      {
        cname: "sharpness",
        name: "Sharpness",
        kind: "SLIDER",
        listedType: "T_VALUE_V1",
        hashval: 102,
        value: 10,
        slider: { min: 0, max: 20, increment: 1, center: 10 },
      },
      {
        cname: "picture_mode",
        name: "Picture Mode",
        kind: "XLIST",
        hashval: 103,
        value: "Standard",
        elements: ["Standard", "Vivid", "Game"],
      },
      {
        cname: "color_temperature",
        name: "Color Temperature",
        kind: "LIST",
        hashval: 104,
        value: "Normal",
        elements: ["Cool", "Normal", "Warm"],
      },
      {
        cname: "game_low_latency",
        name: "Game Low Latency",
        kind: "VALUE",
        hashval: 105,
        value: false,
      },
      {
        cname: "panel_gamma",
        name: "Panel Gamma",
        kind: "VALUE",
        hashval: 106,
        value: 2.2,
      },
      {
        cname: "model_name",
        name: "Model Name",
        kind: "VALUE",
        hashval: 107,
        value: "P65Q9-H1",
        readOnly: true,
      },
    ],
  },
  {
    cname: "audio",
    name: "Audio",
    kind: "MENU",
    hashval: 200,
    children: [
      {
        cname: "volume",
        name: "Volume",
        kind: "SLIDER",
        hashval: 201,
        value: 12,
        slider: { min: 0, max: 100, increment: 1, center: 0 },
      },
    ],
  },
  {
    cname: "sleep_timer",
    name: "Sleep Timer",
    kind: "LIST",
    hashval: 300,
    value: "Off",
    elements: ["Off", "30 minutes", "60 minutes"],
    hidden: true,
  },
];
