import type { FetchError } from "../errors.js";
import type { UsageSnapshot } from "../types.js";

export type FetchOutcome =
  | { ok: true; snapshot: UsageSnapshot }
  | { ok: false; error: FetchError };

export interface UsageFetcher {
  // Credentials are validated before they reach a fetcher.
  fetch(organizationId: string, sessionToken: string): Promise<FetchOutcome>;
}
