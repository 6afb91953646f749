/**
 * Device transformations - pure functions building the HTTP request of
 * a command.
 */
import { type Command, body, endpoint, requestType } from "../command/index.js";
import { buildHeaders, type HttpRequest } from "../transport/index.js";

export const apiBaseUrl = (ip: string, port: number): string =>
  `https://${ip}:${port}`;

export const buildRequest = (
  ip: string,
  port: number,
  command: Command,
  settingsRoot: string,
  authToken: string | undefined,
): HttpRequest => {
  const payload = body(command);
  return {
    method: requestType(command),
    url: `${apiBaseUrl(ip, port)}${endpoint(command, settingsRoot)}`,
    headers: buildHeaders(authToken),
    ...(payload !== undefined ? { body: JSON.stringify(payload) } : {}),
  };
};
