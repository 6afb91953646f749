/**
 * Discovery Module - Schemas
 *
 * Shape of the UPnP description document once xml2js has turned it into
 * an object (no explicit arrays, attributes merged into elements).
 */
import { z } from "zod";

/**
 * Elements that carry attributes come back as `{ _: text, ...attrs }`.
 */
const XmlText = z.union([
  z.string(),
  z.object({ _: z.string() }).transform((node) => node._),
]);

export const DescriptionDocumentSchema = z.object({
  root: z.object({
    device: z
      .object({
        friendlyName: XmlText,
        manufacturer: XmlText,
        modelName: XmlText,
        UDN: XmlText,
      })
      .passthrough(),
  }),
});

/**
 * Identity of a device as learned from its description document.
 */
export type DeviceDescription = Readonly<{
  name: string;
  manufacturer: string;
  model: string;
  ip: string;
  uuid: string;
}>;

export type SsdpOptions = Readonly<{
  address: string;
  port: number;
  /** MX header value */
  waitSeconds: number;
  /** How long to collect answers; defaults to `waitSeconds` */
  collectMs?: number;
}>;
