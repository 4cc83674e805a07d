import { ADMIN_API_SCOPES } from "./config";
import type { SessionStorage } from "./session-storage";
import type { Session } from "./types";

/** Offline sessions built from a static token carry no OAuth id or state. */
export const SESSION_PLACEHOLDER = "NA";

/**
 * Application-level authentication context. Built once per client, before
 * the first session.
 */
export type ApiContext = Readonly<{
  apiKey: string;
  apiSecretKey: string;
  scopes: readonly string[];
  /**
   * Name of the host initiating the connection, not the target shop.
   */
  hostName: string;
  apiVersion: string;
  isEmbeddedApp: false;
  sessionStorage: SessionStorage;
}>;

export function createApiContext(options: {
  apiKey: string;
  apiSecretKey: string;
  hostName: string;
  apiVersion: string;
  sessionStorage: SessionStorage;
}): ApiContext {
  const context: ApiContext = {
    apiKey: options.apiKey,
    apiSecretKey: options.apiSecretKey,
    scopes: Object.freeze([...ADMIN_API_SCOPES]),
    hostName: options.hostName,
    apiVersion: options.apiVersion,
    isEmbeddedApp: false,
    sessionStorage: options.sessionStorage,
  };
  return Object.freeze(context);
}

export function createOfflineSession(
  shop: string,
  accessToken: string
): Session {
  const session: Session = {
    id: SESSION_PLACEHOLDER,
    shop,
    accessToken,
    isOnline: false,
    state: SESSION_PLACEHOLDER,
  };
  return Object.freeze(session);
}
