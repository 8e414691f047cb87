// src/services/CredentialStore.ts
import bcrypt from 'bcryptjs';
import fs from 'fs-extra';
import crypto from 'node:crypto';

export interface UserRecord {
  id: string;
  username: string;
  /** bcrypt hash */
  password: string;
}

/** Lookup side of the credential store, as used by AuthService. */
export interface CredentialStore {
  findByUsername(username: string): UserRecord | undefined;
}

export interface AccountOptions {
  username: string;
  /** Plain password to provision; generated when omitted. */
  password?: string;
  bcryptRounds?: number;
  /** Where a generated password is written (mode 0600). */
  credentialsFile?: string;
}

export interface ProvisionedAccount {
  username: string;
  created: boolean;
  /** Only set when the account was created by this call. */
  password?: string;
}

const isUserRecord = (row: unknown): row is UserRecord =>
  typeof row === 'object' &&
  row !== null &&
  'id' in row &&
  typeof row.id === 'string' &&
  'username' in row &&
  typeof row.username === 'string' &&
  'password' in row &&
  typeof row.password === 'string';

/**
 * Single-account credential store kept in a JSON file (mode 0600).
 *
 * The account is created on first run with a salted bcrypt hash; the plain
 * password is written once to the credentials file for the operator.
 * Without a file the account lives in memory for the life of the process.
 */
export class FileCredentialStore implements CredentialStore {
  private account: UserRecord | undefined;

  constructor(private readonly file?: string) {
    this.account = file ? this.load(file) : undefined;
  }

  /** Creates the account unless one already exists. */
  ensureAccount(options: AccountOptions): ProvisionedAccount {
    if (this.account) {
      return { username: this.account.username, created: false };
    }

    const generated = options.password === undefined;
    const password =
      options.password ?? crypto.randomBytes(32).toString('base64url');
    const account: UserRecord = {
      id: crypto.randomUUID(),
      username: options.username,
      password: bcrypt.hashSync(password, options.bcryptRounds ?? 12),
    };
    if (this.file) {
      fs.outputJsonSync(
        this.file,
        { ...account, created_at: new Date().toISOString() },
        { spaces: 2, mode: 0o600 },
      );
    }
    this.account = account;

    if (generated && options.credentialsFile) {
      fs.outputJsonSync(
        options.credentialsFile,
        { username: options.username, password },
        { spaces: 2, mode: 0o600 },
      );
      console.log(
        `[Auth] Provisioned account "${options.username}"; credentials written to ${options.credentialsFile}`,
      );
    } else {
      console.log(`[Auth] Provisioned account "${options.username}"`);
    }
    return { username: options.username, created: true, password };
  }

  findByUsername(username: string): UserRecord | undefined {
    return this.account?.username === username ? this.account : undefined;
  }

  private load(file: string): UserRecord | undefined {
    if (!fs.pathExistsSync(file)) return undefined;
    const data: unknown = fs.readJsonSync(file);
    if (!isUserRecord(data)) {
      throw new Error(`Account file ${file} is not a valid account record`);
    }
    return { id: data.id, username: data.username, password: data.password };
  }
}
