/**
 * Apps Module - Service Layer
 *
 * Downloads the vendor's app lists and resolves launch payloads to apps.
 */
import { type Result, err, ok } from "neverthrow";

import { type AppCatalogConfig, getAppCatalogConfig } from "../config.js";
import { createLogger } from "../logger.js";
import {
  type AppPayload,
  type SmartCastError,
  decodeError,
} from "../protocol/index.js";
import { buildHeaders, type Transport } from "../transport/index.js";
import type { App } from "./schema.js";
import { findByPayload, parseAvailability, parseCatalog } from "./transform.js";

const log = createLogger("apps");

export class AppCatalog {
  private apps: readonly App[] = [];

  constructor(
    private readonly transport: Transport,
    private readonly sources: AppCatalogConfig = getAppCatalogConfig(),
  ) {}

  /**
   * Re-download both lists.
   */
  async refresh(): Promise<Result<readonly App[], SmartCastError>> {
    const availability = await this.fetchJson(this.sources.availabilityUrl);
    if (availability.isErr()) {
      return err(availability.error);
    }
    const catalog = await this.fetchJson(this.sources.catalogUrl);
    if (catalog.isErr()) {
      return err(catalog.error);
    }

    this.apps = parseCatalog(
      catalog.value,
      parseAvailability(availability.value),
    );
    log.info({ count: this.apps.length }, "App catalogue loaded");
    return ok(this.apps);
  }

  /**
   * The app launched by `payload`, downloading the lists on first use.
   */
  async find(
    payload: AppPayload,
  ): Promise<Result<App | null, SmartCastError>> {
    if (this.apps.length === 0) {
      const loaded = await this.refresh();
      if (loaded.isErr()) {
        return err(loaded.error);
      }
    }
    return ok(findByPayload(this.apps, payload));
  }

  private async fetchJson(
    url: string,
  ): Promise<Result<unknown, SmartCastError>> {
    const response = await this.transport({
      method: "GET",
      url,
      headers: buildHeaders(undefined),
    });
    return response.andThen((text): Result<unknown, SmartCastError> => {
      try {
        const data: unknown = JSON.parse(text);
        return ok(data);
      } catch (error) {
        const message =
          error instanceof Error ? error.message : String(error);
        return err(decodeError(`App list is not JSON: ${message}`, url));
      }
    });
  }
}
