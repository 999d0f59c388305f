import { promises as fs } from "node:fs";
import path from "node:path";
import PQueue from "p-queue";
import { z } from "zod";
import {
  CredentialCorruptError,
  CredentialNotFoundError,
  InvalidAccountIdError,
  isWorkspaceAuthError,
} from "../errors.js";
import type { AuthStatus, CredentialRecord } from "../types.js";
import {
  atomicWrite,
  isMissingFileError,
  TEMP_FILE_PREFIX,
} from "../utils/fs.js";

const RECORD_EXTENSION = ".json";
const MAX_ACCOUNT_ID_LENGTH = 254;

const emailSchema = z.string().email().max(MAX_ACCOUNT_ID_LENGTH);

const credentialFileSchema = z.object({
  accessToken: z.string().min(1),
  refreshToken: z.string().min(1).nullable(),
  expiry: z.string().datetime(),
  scopes: z.array(z.string()),
  tokenType: z.string().min(1),
  refreshInvalid: z.boolean().optional(),
});

export type CredentialFile = z.infer<typeof credentialFileSchema>;

/**
 * Account ids are the lower-cased email. The email pattern admits no path
 * separators and no leading dot, so the id is also a safe filename stem.
 */
export function normalizeAccountId(value: string) {
  const normalized = value.trim().toLowerCase();
  if (!emailSchema.safeParse(normalized).success) {
    throw new InvalidAccountIdError(value);
  }
  return normalized;
}

function toFile(record: CredentialRecord): CredentialFile {
  return {
    accessToken: record.accessToken,
    refreshToken: record.refreshToken,
    expiry: new Date(record.expiresAt).toISOString(),
    scopes: [...record.scopes],
    tokenType: record.tokenType,
    ...(record.refreshInvalid === undefined
      ? {}
      : { refreshInvalid: record.refreshInvalid }),
  };
}

function fromFile(accountId: string, file: CredentialFile): CredentialRecord {
  return {
    accountId,
    accessToken: file.accessToken,
    refreshToken: file.refreshToken,
    expiresAt: Date.parse(file.expiry),
    scopes: file.scopes,
    tokenType: file.tokenType,
    ...(file.refreshInvalid === undefined
      ? {}
      : { refreshInvalid: file.refreshInvalid }),
  };
}

export function isUsable(record: CredentialRecord, now = Date.now()) {
  if (record.refreshInvalid) {
    return record.expiresAt > now;
  }
  return record.refreshToken !== null || record.expiresAt > now;
}

/**
 * One JSON file per account inside a single directory. The directory is
 * fixed at construction; nothing here looks at the environment.
 */
export class CredentialStore {
  readonly directory: string;
  private readonly queues = new Map<string, PQueue>();

  constructor(directory: string) {
    if (!path.isAbsolute(directory)) {
      throw new Error(
        `Credential store directory must be absolute: ${directory}`
      );
    }
    this.directory = directory;
  }

  filePathFor(accountId: string) {
    return path.join(
      this.directory,
      `${normalizeAccountId(accountId)}${RECORD_EXTENSION}`
    );
  }

  private queueFor(accountId: string) {
    let queue = this.queues.get(accountId);
    if (!queue) {
      queue = new PQueue({ concurrency: 1 });
      this.queues.set(accountId, queue);
    }
    return queue;
  }

  async load(accountId: string): Promise<CredentialRecord> {
    const id = normalizeAccountId(accountId);
    const filePath = this.filePathFor(id);
    let raw: string;
    try {
      raw = await fs.readFile(filePath, "utf8");
    } catch (err) {
      if (isMissingFileError(err)) {
        throw new CredentialNotFoundError(id);
      }
      throw err;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new CredentialCorruptError(id, filePath, { cause: err });
    }
    const result = credentialFileSchema.safeParse(parsed);
    if (!result.success) {
      throw new CredentialCorruptError(id, filePath, { cause: result.error });
    }
    return fromFile(id, result.data);
  }

  async find(accountId: string): Promise<CredentialRecord | null> {
    try {
      return await this.load(accountId);
    } catch (err) {
      if (isWorkspaceAuthError(err, "CredentialNotFound")) {
        return null;
      }
      throw err;
    }
  }

  /** Replaces the whole record. The stored identity is always `accountId`. */
  async save(
    accountId: string,
    record: CredentialRecord
  ): Promise<CredentialRecord> {
    const id = normalizeAccountId(accountId);
    if (!Number.isFinite(record.expiresAt)) {
      throw new RangeError(`Invalid expiry for ${id}: ${record.expiresAt}`);
    }
    const contents = JSON.stringify(toFile(record), null, 2);
    await this.queueFor(id).add(() =>
      atomicWrite(this.filePathFor(id), contents, { mode: 0o600 })
    );
    return { ...record, accountId: id };
  }

  async list(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.directory);
    } catch (err) {
      if (isMissingFileError(err)) {
        return [];
      }
      throw err;
    }
    const accounts: string[] = [];
    for (const entry of entries) {
      if (
        entry.startsWith(TEMP_FILE_PREFIX) ||
        !entry.endsWith(RECORD_EXTENSION)
      ) {
        continue;
      }
      const stem = entry.slice(0, -RECORD_EXTENSION.length);
      if (stem !== stem.toLowerCase() || !emailSchema.safeParse(stem).success) {
        continue;
      }
      accounts.push(stem);
    }
    return accounts.sort();
  }

  async delete(accountId: string) {
    const id = normalizeAccountId(accountId);
    await this.queueFor(id).add(() =>
      fs.rm(this.filePathFor(id), { force: true })
    );
  }

  async status(accountId: string, now = Date.now()): Promise<AuthStatus> {
    let record: CredentialRecord | null;
    try {
      record = await this.find(accountId);
    } catch (err) {
      if (isWorkspaceAuthError(err, "CredentialCorrupt")) {
        return { status: "corrupt", reason: err.message };
      }
      throw err;
    }
    if (!record) {
      return {
        status: "missing",
        reason: "No credential stored. Run login to authenticate this account.",
      };
    }
    if (record.refreshInvalid) {
      return {
        status: "invalid",
        reason: "Stored refresh token was rejected by Google. Run login again.",
      };
    }
    if (!isUsable(record, now)) {
      return {
        status: "expired",
        reason:
          "Access token expired and no refresh token is available. Run login again.",
      };
    }
    return { status: "ok" };
  }
}
