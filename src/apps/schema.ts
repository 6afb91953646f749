/**
 * Apps Module - Schemas
 *
 * The vendor publishes two JSON lists: which payload launches each app,
 * and each app's name and icon.
 */
import { z } from "zod";

import type { AppPayload } from "../protocol/index.js";

/**
 * `app_type_payload` is sometimes an object, sometimes a JSON string.
 */
export const AvailabilityEntrySchema = z
  .object({
    id: z.string(),
    chipsets: z
      .object({
        "*": z
          .array(
            z
              .object({
                app_type_payload: z.union([z.string(), z.record(z.unknown())]),
              })
              .passthrough(),
          )
          .min(1),
      })
      .passthrough(),
  })
  .passthrough();

export const CatalogEntrySchema = z
  .object({
    id: z.string(),
    name: z.string(),
    mobileAppInfo: z
      .object({
        description: z.string(),
        app_icon_image_url: z.string(),
      })
      .passthrough(),
  })
  .passthrough();

export type App = Readonly<{
  id: string;
  name: string;
  description: string;
  iconUrl: string;
  payload?: AppPayload;
}>;
