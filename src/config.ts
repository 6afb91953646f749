/**
 * Typed configuration - read from the environment, parsed with Zod at import.
 * Every key has a default, so an empty environment is valid.
 * Invalid values throw immediately - fail fast.
 *
 * Covers:
 * - Logging
 * - Device API connection (ports, timeout, TLS)
 * - SSDP discovery
 * - App catalogue sources
 */
import { z } from "zod";

/**
 * Custom boolean parser for environment variables.
 * z.coerce.boolean() doesn't work with string "false" (it's truthy).
 */
const envBoolean = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((val) =>
      val === undefined ? defaultValue : val.toLowerCase() === "true",
    );

/**
 * Comma-separated list of TCP ports, order preserved.
 */
const envPortList = (defaultValue: string) =>
  z
    .string()
    .default(defaultValue)
    .transform((val) =>
      val
        .split(",")
        .map((part) => part.trim())
        .filter((part) => part !== "")
        .map(Number),
    )
    .pipe(z.array(z.number().int().min(1).max(65535)).min(1));

const ConfigSchema = z.object({
  // ==========================================================================
  // Runtime
  // ==========================================================================
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("production")
    .describe("Runtime environment"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("warn")
    .describe("Pino log level"),

  // ==========================================================================
  // Device API
  // ==========================================================================
  SMARTCAST_API_PORTS: envPortList("7345,9000").describe(
    "Candidate API ports, probed in order",
  ),
  SMARTCAST_TIMEOUT_MS: z.coerce
    .number()
    .positive()
    .default(3000)
    .describe("Per-request HTTP timeout (ms)"),
  SMARTCAST_ALLOW_SELF_SIGNED: envBoolean(true).describe(
    "Accept the self-signed certificate devices present",
  ),

  // ==========================================================================
  // Discovery
  // ==========================================================================
  SMARTCAST_DESCRIPTION_PORT: z.coerce
    .number()
    .int()
    .positive()
    .default(8008)
    .describe("Port serving the device description document"),
  SMARTCAST_SSDP_ADDRESS: z
    .string()
    .default("239.255.255.250")
    .describe("SSDP multicast address"),
  SMARTCAST_SSDP_PORT: z.coerce
    .number()
    .int()
    .positive()
    .default(1900)
    .describe("SSDP port"),
  SMARTCAST_SSDP_WAIT_SECONDS: z.coerce
    .number()
    .int()
    .positive()
    .default(3)
    .describe("MX value and response collection window (s)"),

  // ==========================================================================
  // App Catalogue
  // ==========================================================================
  SMARTCAST_APP_AVAILABILITY_URL: z
    .string()
    .url()
    .default(
      "http://hometest.buddytv.netdna-cdn.com/appservice/app_availability_prod.json",
    )
    .describe("App payload list"),
  SMARTCAST_APP_CATALOG_URL: z
    .string()
    .url()
    .default(
      "http://hometest.buddytv.netdna-cdn.com/appservice/vizio_apps_prod.json",
    )
    .describe("App name and icon list"),
});

// Parse at import - throws immediately if invalid
const parsed = ConfigSchema.safeParse(process.env);

if (!parsed.success) {
  throw new Error(
    `Invalid configuration: ${JSON.stringify(parsed.error.format())}`,
  );
}

export const config = parsed.data;

// Type export for use elsewhere
export type Config = z.infer<typeof ConfigSchema>;

// =============================================================================
// Derived Configuration Objects
// =============================================================================

export type ConnectionConfig = Readonly<{
  ports: readonly number[];
  timeoutMs: number;
  allowSelfSigned: boolean;
}>;

/**
 * Connection settings for the device API transport and port probing.
 */
export function getConnectionConfig(): ConnectionConfig {
  return {
    ports: config.SMARTCAST_API_PORTS,
    timeoutMs: config.SMARTCAST_TIMEOUT_MS,
    allowSelfSigned: config.SMARTCAST_ALLOW_SELF_SIGNED,
  };
}

export type DiscoveryConfig = Readonly<{
  address: string;
  port: number;
  waitSeconds: number;
  descriptionPort: number;
}>;

/**
 * SSDP search and description fetch settings.
 */
export function getDiscoveryConfig(): DiscoveryConfig {
  return {
    address: config.SMARTCAST_SSDP_ADDRESS,
    port: config.SMARTCAST_SSDP_PORT,
    waitSeconds: config.SMARTCAST_SSDP_WAIT_SECONDS,
    descriptionPort: config.SMARTCAST_DESCRIPTION_PORT,
  };
}

export type AppCatalogConfig = Readonly<{
  availabilityUrl: string;
  catalogUrl: string;
}>;

export function getAppCatalogConfig(): AppCatalogConfig {
  return {
    availabilityUrl: config.SMARTCAST_APP_AVAILABILITY_URL,
    catalogUrl: config.SMARTCAST_APP_CATALOG_URL,
  };
}
