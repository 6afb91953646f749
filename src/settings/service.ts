/**
 * Settings Module - Service Layer
 *
 * A SettingNode is one entry of the device's settings tree. Menus are
 * expanded on demand; every other node reads and writes through the
 * session's dispatcher. Writes are checked locally first: nothing is
 * sent unless the node is writable, the value has the right type and
 * it falls inside the slider bounds or the list elements.
 */
import { type Result, err, ok } from "neverthrow";

import {
  type CommandDispatcher,
  readSettings,
  writeSettings,
} from "../command/index.js";
import {
  createLogger,
  logOperationComplete,
  logOperationFailed,
  logOperationStart,
} from "../logger.js";
import {
  type SliderInfo,
  type SmartCastError,
  errorTier,
  extractElements,
  extractSettingItems,
  extractSliderInfo,
  formatSmartCastError,
  notAnElement,
  outOfBounds,
  readOnly,
  typeMismatch,
} from "../protocol/index.js";
import type {
  JsonKind,
  SettingInput,
  SettingKind,
  SettingNodeData,
  SettingValue,
} from "./schema.js";
import {
  ROOT_NODE_DATA,
  fromWireValue,
  isWithinBounds,
  jsonKindOf,
  nodeDataFromItem,
  toSettingValue,
  valueFits,
} from "./transform.js";

const log = createLogger("settings");

// =============================================================================
// Reads shared by nodes
// =============================================================================

/**
 * Slider bounds from the static endpoint, falling back to the dynamic
 * one. Transport failures are not retried against the second endpoint.
 */
export async function fetchSliderInfo(
  dispatcher: CommandDispatcher,
  path: string,
): Promise<Result<SliderInfo, SmartCastError>> {
  const fromStatic = (
    await dispatcher.send(readSettings("static", path))
  ).andThen(extractSliderInfo);

  if (fromStatic.isOk() || errorTier(fromStatic.error) === "transport") {
    return fromStatic;
  }

  return (await dispatcher.send(readSettings("dynamic", path))).andThen(
    extractSliderInfo,
  );
}

/**
 * Element list from the dynamic endpoint, then the static one. Empty
 * when neither reports any.
 */
export async function fetchElements(
  dispatcher: CommandDispatcher,
  path: string,
): Promise<Result<readonly string[], SmartCastError>> {
  for (const base of ["dynamic", "static"] as const) {
    const read = (await dispatcher.send(readSettings(base, path))).andThen(
      extractElements,
    );
    if (read.isOk()) {
      return ok(read.value);
    }
    if (errorTier(read.error) === "transport") {
      return err(read.error);
    }
  }
  return ok([]);
}

// =============================================================================
// SettingNode
// =============================================================================

export class SettingNode {
  private currentValue: SettingValue | undefined;
  private currentHashval: number | undefined;

  private constructor(
    private readonly dispatcher: CommandDispatcher,
    private readonly data: SettingNodeData,
  ) {
    this.currentValue = data.value;
    this.currentHashval = data.hashval;
  }

  /**
   * The root menu of a device's settings tree.
   */
  static root(dispatcher: CommandDispatcher): SettingNode {
    return new SettingNode(dispatcher, ROOT_NODE_DATA);
  }

  // ===========================================================================
  // Attributes
  // ===========================================================================

  get path(): string {
    return this.data.path;
  }

  get cname(): string {
    return this.data.cname;
  }

  get name(): string {
    return this.data.name;
  }

  get kind(): SettingKind {
    return this.data.kind;
  }

  get wireType(): string {
    return this.data.wireType;
  }

  get hidden(): boolean {
    return this.data.hidden;
  }

  get readOnly(): boolean {
    return this.data.readOnly;
  }

  get hashval(): number | undefined {
    return this.currentHashval;
  }

  value(): SettingValue | undefined {
    return this.currentValue;
  }

  /**
   * The value, only when it has the requested JSON type.
   */
  valueAs(kind: "boolean"): boolean | undefined;
  valueAs(kind: "number"): number | undefined;
  valueAs(kind: "string"): string | undefined;
  valueAs(kind: JsonKind): boolean | number | string | undefined {
    const current = this.currentValue;
    if (current === undefined || jsonKindOf(current) !== kind) {
      return undefined;
    }
    return current.value;
  }

  isBoolean(): boolean {
    return this.currentValue?.type === "boolean";
  }

  isNumber(): boolean {
    return (
      this.currentValue !== undefined &&
      jsonKindOf(this.currentValue) === "number"
    );
  }

  isString(): boolean {
    return this.currentValue?.type === "string";
  }

  // ===========================================================================
  // Traversal
  // ===========================================================================

  /**
   * Children of a menu, or this node alone for any other kind.
   *
   * Children the device lists as plain values are probed for slider
   * bounds; those that have them come back as sliders.
   */
  async expand(): Promise<Result<SettingNode[], SmartCastError>> {
    if (this.data.kind !== "MENU") {
      return ok([this]);
    }

    const startTime = Date.now();
    logOperationStart(log, "expand", { path: this.data.path });

    const listing = (
      await this.dispatcher.send(readSettings("dynamic", this.data.path))
    ).andThen(extractSettingItems);

    if (listing.isErr()) {
      logOperationFailed(log, "expand", formatSmartCastError(listing.error), {
        path: this.data.path,
      });
      return err(listing.error);
    }

    const children: SettingNode[] = [];
    for (const item of listing.value) {
      const data = nodeDataFromItem(this.data.path, item);
      if (data.kind !== "VALUE") {
        children.push(new SettingNode(this.dispatcher, data));
        continue;
      }

      const probe = await fetchSliderInfo(this.dispatcher, data.path);
      if (probe.isOk()) {
        log.debug({ path: data.path }, "Value node has slider bounds");
        children.push(
          new SettingNode(this.dispatcher, {
            ...data,
            kind: "SLIDER",
            slider: probe.value,
          }),
        );
      } else if (errorTier(probe.error) === "transport") {
        logOperationFailed(log, "expand", formatSmartCastError(probe.error), {
          path: data.path,
        });
        return err(probe.error);
      } else {
        children.push(new SettingNode(this.dispatcher, data));
      }
    }

    logOperationComplete(log, "expand", startTime, {
      path: this.data.path,
      children: children.length,
    });
    return ok(children);
  }

  /**
   * Slider bounds, re-read from the device on every call. Null for
   * nodes that are not sliders.
   */
  async sliderInfo(): Promise<Result<SliderInfo | null, SmartCastError>> {
    if (this.data.kind !== "SLIDER") {
      return ok(null);
    }
    return fetchSliderInfo(this.dispatcher, this.data.path);
  }

  /**
   * Possible values of a list node. Empty for any other kind.
   */
  async elements(): Promise<Result<readonly string[], SmartCastError>> {
    if (this.data.kind !== "LIST" && this.data.kind !== "XLIST") {
      return ok([]);
    }
    if (this.data.elements !== undefined && this.data.elements.length > 0) {
      return ok(this.data.elements);
    }
    return fetchElements(this.dispatcher, this.data.path);
  }

  // ===========================================================================
  // Writes
  // ===========================================================================

  /**
   * Write a new value. The device is only contacted once every local
   * check has passed. A successful write changes the device's hashval,
   * so the node re-reads its listing to pick up the new one.
   */
  async update(input: SettingInput): Promise<Result<void, SmartCastError>> {
    const { kind, path } = this.data;
    const current = this.currentValue;
    const hashval = this.currentHashval;

    if (
      kind === "MENU" ||
      kind === "OTHER" ||
      this.data.readOnly ||
      current === undefined ||
      hashval === undefined
    ) {
      return err(readOnly(path));
    }

    const next = toSettingValue(input);
    if (next === null || !valueFits(current, next)) {
      return err(typeMismatch(current.value, input));
    }

    const checked = await this.checkAllowed(next, input);
    if (checked.isErr()) {
      return err(checked.error);
    }

    const startTime = Date.now();
    logOperationStart(log, "update", { path });

    const written = await this.dispatcher.send(
      writeSettings(path, hashval, next.value),
    );
    if (written.isErr()) {
      logOperationFailed(log, "update", formatSmartCastError(written.error), {
        path,
      });
      return err(written.error);
    }

    this.currentValue = next;
    await this.refresh();
    logOperationComplete(log, "update", startTime, { path });
    return ok(undefined);
  }

  /**
   * Take the hashval, and the value when it differs, from the device's
   * current listing of this node. A failed read keeps the cached state.
   */
  private async refresh(): Promise<void> {
    const listing = (
      await this.dispatcher.send(readSettings("dynamic", this.data.path))
    ).andThen(extractSettingItems);
    if (listing.isErr()) {
      log.warn(
        { path: this.data.path, error: formatSmartCastError(listing.error) },
        "Could not re-read setting after write",
      );
      return;
    }

    const item = listing.value.find(
      (candidate) => candidate.CNAME === this.data.cname,
    );
    if (item === undefined) {
      log.warn({ path: this.data.path }, "Setting missing from its listing");
      return;
    }
    // The listing cannot tell 2 from 2.0; keep the written form unless
    // the device reports another value.
    const listed = fromWireValue(item.VALUE);
    if (listed !== undefined && listed.value !== this.currentValue?.value) {
      this.currentValue = listed;
    }
    this.currentHashval = item.HASHVAL ?? this.currentHashval;
  }

  /**
   * Slider bounds or list membership, depending on kind.
   */
  private async checkAllowed(
    next: SettingValue,
    input: SettingInput,
  ): Promise<Result<void, SmartCastError>> {
    switch (this.data.kind) {
      case "SLIDER": {
        if (next.type !== "integer" && next.type !== "float") {
          return ok(undefined);
        }
        const bounds: Result<SliderInfo, SmartCastError> = this.data.slider
          ? ok(this.data.slider)
          : await fetchSliderInfo(this.dispatcher, this.data.path);
        if (bounds.isErr()) {
          return err(bounds.error);
        }
        const { min, max } = bounds.value;
        return isWithinBounds(next.value, min, max)
          ? ok(undefined)
          : err(outOfBounds(next.value, min, max));
      }
      case "LIST":
      case "XLIST": {
        const elements = await this.elements();
        if (elements.isErr()) {
          return err(elements.error);
        }
        return next.type === "string" && elements.value.includes(next.value)
          ? ok(undefined)
          : err(notAnElement(input, elements.value));
      }
      default:
        return ok(undefined);
    }
  }
}
