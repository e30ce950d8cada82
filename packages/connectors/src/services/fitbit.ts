/**
 * Fitbit Web API provider definition.
 *
 * Fitbit specifics:
 * - Token endpoint takes client credentials as Basic auth
 * - Refresh tokens rotate on every refresh and are single-use
 * - The token response carries the Fitbit user id (`user_id`)
 * - Intraday series need the "heartrate" scope and intraday access on the app
 */

import type { ProviderDefinition } from "../types";

/** Scopes requested when configuration does not override them */
export const FITBIT_DEFAULT_SCOPES = [
  "activity",
  "heartrate",
  "sleep",
  "weight",
  "profile",
];

export const fitbitProvider: ProviderDefinition = {
  id: "fitbit",
  name: "Fitbit",
  oauthConfig: {
    authUrl: "https://www.fitbit.com/oauth2/authorize",
    tokenUrl: "https://api.fitbit.com/oauth2/token",
    revokeUrl: "https://api.fitbit.com/oauth2/revoke",
    scopes: FITBIT_DEFAULT_SCOPES,
    useBasicAuth: true,
  },
  apiBaseUrl: "https://api.fitbit.com",
};
