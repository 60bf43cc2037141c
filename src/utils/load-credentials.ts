/**
 * Credential Loader
 * Reads API key / search engine ID pairs from an environment record
 */

import type { Credential } from "../types";

export type EnvRecord = Record<string, string | undefined>;

/**
 * Collect API_KEY_1/CX_1, API_KEY_2/CX_2, ... until the first incomplete pair,
 * falling back to a single API_KEY/CX pair when no numbered pair exists
 */
export function loadCredentials(env: EnvRecord): Credential[] {
  const credentials: Credential[] = [];

  for (let index = 1; ; index++) {
    const key = env[`API_KEY_${index}`];
    const scope = env[`CX_${index}`];
    if (!key || !scope) break;
    credentials.push({ key, scope });
  }

  if (credentials.length === 0 && env.API_KEY && env.CX) {
    credentials.push({ key: env.API_KEY, scope: env.CX });
  }

  return credentials;
}
