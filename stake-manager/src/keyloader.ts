/**
 * Load the wallet password from env or file.
 * The password is registered for redaction on load.
 */

import * as fs from "fs";
import * as path from "path";
import { registerSecret } from "../../server/secrets.ts";

const DEFAULT_PASSWORD_ENV = "WALLET_PASSWORD";

export interface PasswordLoaderOptions {
  passwordFile?: string;
  passwordEnv?: string;
}

export class SecretError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SecretError";
  }
}

/**
 * Returns the wallet password.
 * Lookup order: --password-file, the configured env var, then WALLET_PASSWORD.
 * Throws SecretError when nothing is found.
 */
export function loadWalletPassword(opts: PasswordLoaderOptions = {}): string {
  if (opts.passwordFile) {
    const resolved = path.resolve(opts.passwordFile);
    if (!fs.existsSync(resolved)) {
      throw new SecretError(`Password file not found: ${resolved}`);
    }
    const raw = fs.readFileSync(resolved, "utf-8").replace(/\r?\n$/, "");
    if (raw.length === 0) {
      throw new SecretError(`Password file is empty: ${resolved}`);
    }
    registerSecret("WALLET_PASSWORD", raw);
    return raw;
  }

  const envName = opts.passwordEnv ?? DEFAULT_PASSWORD_ENV;
  const value = process.env[envName] || process.env[DEFAULT_PASSWORD_ENV];
  if (!value) {
    throw new SecretError(
      `No wallet password found: set ${envName}${envName === DEFAULT_PASSWORD_ENV ? "" : ` or ${DEFAULT_PASSWORD_ENV}`} or pass --password-file`,
    );
  }
  registerSecret("WALLET_PASSWORD", value);
  return value;
}
