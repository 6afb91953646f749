/**
 * Device Module - Service Layer
 *
 * A Device is the session with one SmartCast display or sound bar. It
 * resolves the API port once, holds the auth token and settings root,
 * and is the dispatcher every other module sends its commands through.
 */
import { type Result, err, ok } from "neverthrow";

import { type App, AppCatalog } from "../apps/index.js";
import {
  type Command,
  type CommandDispatcher,
  changeInput,
  getCurrentApp,
  getCurrentInput,
  getDeviceInfo,
  getInputList,
  getPowerState,
  launchApp,
} from "../command/index.js";
import { getConnectionConfig, getDiscoveryConfig } from "../config.js";
import {
  type DeviceDescription,
  type SsdpOptions,
  defaultSsdpOptions,
  descriptionUrl,
  discoverDescriptions,
  fetchDescription,
} from "../discovery/index.js";
import {
  createLogger,
  logOperationComplete,
  logOperationFailed,
  logOperationStart,
} from "../logger.js";
import {
  beginPairing,
  cancelPairing,
  finishPairing,
  type PairingData,
} from "../pairing/index.js";
import {
  type AppPayload,
  type CurrentInput,
  type DeviceInfo,
  type Envelope,
  type Input,
  type SmartCastError,
  decodeEnvelope,
  deviceNotFound,
  errorTier,
  extractCurrentApp,
  extractCurrentInput,
  extractDeviceInfo,
  extractInputList,
  extractPowerState,
  formatSmartCastError,
  noReachablePort,
} from "../protocol/index.js";
import {
  type Button,
  type ButtonEvent,
  keyDown,
  keyPress,
  keyUp,
  sendButtonEvents,
} from "../remote/index.js";
import { SettingNode } from "../settings/index.js";
import { createHttpTransport, type Transport } from "../transport/index.js";
import { SessionState } from "./session.js";
import { buildRequest } from "./transform.js";

const log = createLogger("session");

/**
 * Who the device is, as learned from discovery.
 */
export type DeviceIdentity = DeviceDescription;

export type ConnectOptions = Readonly<{
  /** Defaults to the undici transport built from configuration */
  transport?: Transport;
  /** Candidate API ports, probed in order */
  ports?: readonly number[];
  /** Token saved from an earlier pairing */
  authToken?: string;
  /** Port of the description document, for `fromIp` */
  descriptionPort?: number;
  /** SSDP search settings, for `fromUuid` and `discoverDevices` */
  ssdp?: SsdpOptions;
}>;

export class Device implements CommandDispatcher {
  private constructor(
    private readonly identity: DeviceIdentity,
    readonly port: number,
    private readonly transport: Transport,
    private readonly state: SessionState,
  ) {}

  // ===========================================================================
  // Construction
  // ===========================================================================

  /**
   * Open a session: probe the candidate ports in order with a
   * device-info query and keep the first that answers. Transport
   * failures move on to the next port; anything the device itself
   * answers with ends the probe.
   */
  static async connect(
    identity: DeviceIdentity,
    options: ConnectOptions = {},
  ): Promise<Result<Device, SmartCastError>> {
    const transport = options.transport ?? createHttpTransport();
    const ports = options.ports ?? getConnectionConfig().ports;
    const startTime = Date.now();
    logOperationStart(log, "connect", { ip: identity.ip, ports });

    let lastError: SmartCastError | undefined;
    for (const port of ports) {
      const request = buildRequest(
        identity.ip,
        port,
        getDeviceInfo(),
        "",
        options.authToken,
      );
      const probe = (await transport(request))
        .andThen(decodeEnvelope)
        .andThen(extractDeviceInfo);

      if (probe.isOk()) {
        const state = new SessionState({
          authToken: options.authToken,
          settingsRoot: probe.value.settingsRoot,
        });
        logOperationComplete(log, "connect", startTime, {
          ip: identity.ip,
          port,
          settingsRoot: probe.value.settingsRoot,
        });
        return ok(new Device(identity, port, transport, state));
      }

      if (errorTier(probe.error) !== "transport") {
        logOperationFailed(log, "connect", formatSmartCastError(probe.error), {
          ip: identity.ip,
          port,
        });
        return err(probe.error);
      }

      log.debug({ ip: identity.ip, port }, "Port did not answer");
      lastError = probe.error;
    }

    const failure = noReachablePort(ports, lastError);
    logOperationFailed(log, "connect", formatSmartCastError(failure), {
      ip: identity.ip,
    });
    return err(failure);
  }

  /**
   * Connect to the device at `ip`, reading its identity from the
   * description document it serves.
   */
  static async fromIp(
    ip: string,
    options: ConnectOptions = {},
  ): Promise<Result<Device, SmartCastError>> {
    const transport = options.transport ?? createHttpTransport();
    const port =
      options.descriptionPort ?? getDiscoveryConfig().descriptionPort;

    const description = await fetchDescription(
      transport,
      descriptionUrl(ip, port),
    );
    if (description.isErr()) {
      return err(description.error);
    }
    if (description.value === null) {
      return err(deviceNotFound(ip));
    }
    return Device.connect(description.value, { ...options, transport });
  }

  /**
   * Discover the network and connect to the device with this UUID.
   */
  static async fromUuid(
    uuid: string,
    options: ConnectOptions = {},
  ): Promise<Result<Device, SmartCastError>> {
    const transport = options.transport ?? createHttpTransport();

    const found = await discoverDescriptions(
      transport,
      options.ssdp ?? defaultSsdpOptions(),
    );
    if (found.isErr()) {
      return err(found.error);
    }

    const match = found.value.find(
      (description) => description.uuid === uuid,
    );
    if (match === undefined) {
      return err(deviceNotFound(uuid));
    }
    return Device.connect(match, { ...options, transport });
  }

  // ===========================================================================
  // Identity
  // ===========================================================================

  get name(): string {
    return this.identity.name;
  }

  get manufacturer(): string {
    return this.identity.manufacturer;
  }

  get model(): string {
    return this.identity.model;
  }

  get ip(): string {
    return this.identity.ip;
  }

  get uuid(): string {
    return this.identity.uuid;
  }

  get authToken(): string | undefined {
    return this.state.current().authToken;
  }

  // ===========================================================================
  // Dispatch
  // ===========================================================================

  /**
   * Send a command and decode the envelope of the answer.
   */
  async send(command: Command): Promise<Result<Envelope, SmartCastError>> {
    const { authToken, settingsRoot } = this.state.current();
    const request = buildRequest(
      this.identity.ip,
      this.port,
      command,
      settingsRoot,
      authToken,
    );

    const result = (await this.transport(request)).andThen(decodeEnvelope);
    if (result.isErr()) {
      log.debug(
        { command: command.type, error: formatSmartCastError(result.error) },
        "Command failed",
      );
    }
    return result;
  }

  // ===========================================================================
  // Device State
  // ===========================================================================

  /**
   * Read device info. The settings root it reports replaces the one
   * cached at connection time.
   */
  async deviceInfo(): Promise<Result<DeviceInfo, SmartCastError>> {
    const info = (await this.send(getDeviceInfo())).andThen(
      extractDeviceInfo,
    );
    if (info.isOk()) {
      await this.state.setSettingsRoot(info.value.settingsRoot);
    }
    return info;
  }

  async isPoweredOn(): Promise<Result<boolean, SmartCastError>> {
    return (await this.send(getPowerState())).andThen(extractPowerState);
  }

  // ===========================================================================
  // Inputs
  // ===========================================================================

  async currentInput(): Promise<Result<CurrentInput, SmartCastError>> {
    return (await this.send(getCurrentInput())).andThen(extractCurrentInput);
  }

  async listInputs(): Promise<Result<Input[], SmartCastError>> {
    return (await this.send(getInputList())).andThen(extractInputList);
  }

  /**
   * Switch to the input named `name` (e.g. "HDMI-1").
   *
   * Reads the current input for its hashval, then writes. The two steps
   * are not atomic: if the hashval changes in between, the device's
   * rejection is returned.
   */
  async changeInput(name: string): Promise<Result<void, SmartCastError>> {
    const startTime = Date.now();
    logOperationStart(log, "changeInput", { name });

    const current = await this.currentInput();
    if (current.isErr()) {
      logOperationFailed(
        log,
        "changeInput",
        formatSmartCastError(current.error),
      );
      return err(current.error);
    }

    const changed = await this.send(changeInput(name, current.value.hashval));
    if (changed.isErr()) {
      logOperationFailed(
        log,
        "changeInput",
        formatSmartCastError(changed.error),
      );
      return err(changed.error);
    }

    logOperationComplete(log, "changeInput", startTime, { name });
    return ok(undefined);
  }

  // ===========================================================================
  // Remote
  // ===========================================================================

  keyPress(button: Button): Promise<Result<void, SmartCastError>> {
    return this.buttonEvents([keyPress(button)]);
  }

  keyDown(button: Button): Promise<Result<void, SmartCastError>> {
    return this.buttonEvents([keyDown(button)]);
  }

  keyUp(button: Button): Promise<Result<void, SmartCastError>> {
    return this.buttonEvents([keyUp(button)]);
  }

  /**
   * Send several key events in one request.
   */
  buttonEvents(
    events: readonly ButtonEvent[],
  ): Promise<Result<void, SmartCastError>> {
    return sendButtonEvents(this, events);
  }

  // ===========================================================================
  // Pairing
  // ===========================================================================

  beginPair(
    clientName: string,
    clientId: string,
  ): Promise<Result<PairingData, SmartCastError>> {
    return beginPairing(this, clientName, clientId);
  }

  /**
   * Finish pairing with the PIN shown on screen. The session adopts the
   * returned token.
   */
  async finishPair(
    pairing: PairingData,
    pin: string,
  ): Promise<Result<string, SmartCastError>> {
    const token = await finishPairing(this, pairing, pin);
    if (token.isOk()) {
      await this.state.setAuthToken(token.value);
    }
    return token;
  }

  cancelPair(pairing: PairingData): Promise<Result<void, SmartCastError>> {
    return cancelPairing(this, pairing);
  }

  /**
   * Use a token saved from an earlier pairing. It is checked right away
   * with a current-input query; if the device does not accept it the
   * previous token is put back and the error returned.
   */
  async setAuthToken(token: string): Promise<Result<void, SmartCastError>> {
    const previous = await this.state.setAuthToken(token);

    const check = await this.currentInput();
    if (check.isErr()) {
      await this.state.restoreAuthToken(token, previous);
      log.warn(
        { error: formatSmartCastError(check.error) },
        "Auth token rejected, previous token restored",
      );
      return err(check.error);
    }
    return ok(undefined);
  }

  // ===========================================================================
  // Settings
  // ===========================================================================

  /**
   * Root menu of the settings tree.
   */
  settingsRoot(): SettingNode {
    return SettingNode.root(this);
  }

  /**
   * Top-level settings nodes.
   */
  settings(): Promise<Result<SettingNode[], SmartCastError>> {
    return this.settingsRoot().expand();
  }

  // ===========================================================================
  // Apps
  // ===========================================================================

  /**
   * Payload of the app in the foreground, null when none is.
   */
  async currentApp(): Promise<Result<AppPayload | null, SmartCastError>> {
    return (await this.send(getCurrentApp())).andThen(extractCurrentApp);
  }

  /**
   * The current app resolved against the vendor's app catalogue.
   */
  async currentAppInfo(
    catalog: AppCatalog = new AppCatalog(this.transport),
  ): Promise<Result<App | null, SmartCastError>> {
    const payload = await this.currentApp();
    if (payload.isErr()) {
      return err(payload.error);
    }
    if (payload.value === null) {
      return ok(null);
    }
    return catalog.find(payload.value);
  }

  async launchApp(payload: AppPayload): Promise<Result<void, SmartCastError>> {
    const launched = await this.send(launchApp(payload));
    if (launched.isErr()) {
      return err(launched.error);
    }
    return ok(undefined);
  }
}

/**
 * Find every SmartCast device on the network and connect to each.
 * Devices that answer discovery but not on an API port are skipped.
 */
export async function discoverDevices(
  options: ConnectOptions = {},
): Promise<Result<Device[], SmartCastError>> {
  const transport = options.transport ?? createHttpTransport();

  const found = await discoverDescriptions(
    transport,
    options.ssdp ?? defaultSsdpOptions(),
  );
  if (found.isErr()) {
    return err(found.error);
  }

  const devices: Device[] = [];
  for (const description of found.value) {
    const device = await Device.connect(description, {
      ...options,
      transport,
    });
    if (device.isErr()) {
      log.warn(
        { ip: description.ip, error: formatSmartCastError(device.error) },
        "Skipping discovered device",
      );
      continue;
    }
    devices.push(device.value);
  }
  return ok(devices);
}
