/**
 * Microsoft Graph operations (Outlook mail and OneDrive files).
 *
 * Usage:
 *   const session = createGraphSession(config, logger);
 *   registerGraphOperations(registry, session);
 */

import type { AppConfig } from "../config/index.js";
import type { Logger } from "../logging/index.js";
import type { OperationRegistry } from "../pipeline/index.js";
import { HttpGraphClient, MsalTokenProvider } from "./client.js";
import { onedriveOperations } from "./onedrive.js";
import { outlookOperations } from "./outlook.js";
import { GraphSession } from "./session.js";

export {
  HttpGraphClient,
  MsalTokenProvider,
  collectPages,
  GRAPH_SCOPE,
  DEFAULT_GRAPH_BASE_URL,
  type GraphClient,
  type TokenProvider,
  type BinaryContent,
  type QueryParams,
  type HttpGraphClientOptions,
} from "./client.js";
export { GraphRequestError } from "./errors.js";
export { GraphSession, type GraphSessionOptions } from "./session.js";
export { outlookOperations } from "./outlook.js";
export { onedriveOperations, relativeParentPath } from "./onedrive.js";

/**
 * Session that connects over HTTP with MSAL app-only tokens on first use.
 */
export function createGraphSession(config: AppConfig, logger?: Logger): GraphSession {
  return new GraphSession({
    credentials: config.graph,
    connect: (credentials) =>
      new HttpGraphClient({
        baseUrl: config.graphBaseUrl,
        userId: credentials.userId,
        tokens: new MsalTokenProvider(credentials),
        logger: logger?.child("graph"),
      }),
  });
}

export function registerGraphOperations(registry: OperationRegistry, session: GraphSession): OperationRegistry {
  for (const operation of [...outlookOperations(session), ...onedriveOperations(session)]) {
    registry.register(operation);
  }
  return registry;
}
