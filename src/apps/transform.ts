/**
 * Apps transformations - pure functions over the catalogue lists.
 */
import {
  type AppPayload,
  AppPayloadWireSchema,
  toAppPayload,
} from "../protocol/index.js";
import {
  type App,
  AvailabilityEntrySchema,
  CatalogEntrySchema,
} from "./schema.js";

export const samePayload = (a: AppPayload, b: AppPayload): boolean =>
  a.nameSpace === b.nameSpace && a.appId === b.appId && a.message === b.message;

const parsePayload = (raw: unknown): AppPayload | null => {
  let value = raw;
  if (typeof raw === "string") {
    try {
      value = JSON.parse(raw);
    } catch {
      return null;
    }
  }
  const parsed = AppPayloadWireSchema.safeParse(value);
  return parsed.success ? toAppPayload(parsed.data) : null;
};

/**
 * App id to launch payload. Entries that do not parse are left out.
 */
export const parseAvailability = (
  data: unknown,
): Map<string, AppPayload> => {
  const payloads = new Map<string, AppPayload>();
  if (!Array.isArray(data)) {
    return payloads;
  }
  for (const raw of data) {
    const entry = AvailabilityEntrySchema.safeParse(raw);
    if (!entry.success) {
      continue;
    }
    const first = entry.data.chipsets["*"][0];
    const payload = first ? parsePayload(first.app_type_payload) : null;
    if (payload) {
      payloads.set(entry.data.id, payload);
    }
  }
  return payloads;
};

/**
 * Catalogue entries joined with their payloads.
 */
export const parseCatalog = (
  data: unknown,
  payloads: ReadonlyMap<string, AppPayload>,
): App[] => {
  if (!Array.isArray(data)) {
    return [];
  }
  const apps: App[] = [];
  for (const raw of data) {
    const entry = CatalogEntrySchema.safeParse(raw);
    if (!entry.success) {
      continue;
    }
    const payload = payloads.get(entry.data.id);
    apps.push({
      id: entry.data.id,
      name: entry.data.name,
      description: entry.data.mobileAppInfo.description,
      iconUrl: entry.data.mobileAppInfo.app_icon_image_url,
      ...(payload ? { payload } : {}),
    });
  }
  return apps;
};

export const findByPayload = (
  apps: readonly App[],
  payload: AppPayload,
): App | null =>
  apps.find((app) => app.payload && samePayload(app.payload, payload)) ?? null;
