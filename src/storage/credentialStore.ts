import fs from "node:fs/promises";
import path from "node:path";

import { z } from "zod";

import type { Credentials } from "../types.js";
import { OrganizationIdSchema, SessionTokenSchema } from "../validation.js";
import { isNotFound } from "./settingsStore.js";

export interface CredentialStore {
  load(): Promise<Credentials | null>;
  save(credentials: Credentials): Promise<void>;
  delete(): Promise<void>;
}

const CredentialFileSchema = z.object({
  version: z.literal(1),
  organizationId: OrganizationIdSchema,
  sessionToken: SessionTokenSchema,
});

/**
 * Credentials in a JSON file readable only by the current user. Stands in
 * for an OS keychain, which this process does not talk to.
 */
export class FileCredentialStore implements CredentialStore {
  constructor(private readonly filePath: string) {}

  async load(): Promise<Credentials | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      return null;
    }
    const parsed = CredentialFileSchema.safeParse(json);
    if (!parsed.success) return null;
    return {
      organizationId: parsed.data.organizationId,
      sessionToken: parsed.data.sessionToken,
    };
  }

  async save(credentials: Credentials): Promise<void> {
    const file = CredentialFileSchema.parse({ version: 1, ...credentials });
    await fs.mkdir(path.dirname(this.filePath), { recursive: true, mode: 0o700 });
    await fs.writeFile(this.filePath, JSON.stringify(file, null, 2), {
      encoding: "utf8",
      mode: 0o600,
    });
    // writeFile only applies `mode` when it creates the file.
    await fs.chmod(this.filePath, 0o600);
  }

  async delete(): Promise<void> {
    await fs.rm(this.filePath, { force: true });
  }
}
