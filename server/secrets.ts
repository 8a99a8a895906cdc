/**
 * Secrets handling: never log or expose.
 * The wallet password is registered at runtime (its env var name is configurable);
 * notification tokens are picked up from the environment.
 */

const SENSITIVE_KEYS = [
  "WALLET_PASSWORD",
  "NTFY_TOKEN",
  "TELEGRAM_BOT_TOKEN",
  "PUSHOVER_APP_TOKEN",
  "PUSHBULLET_TOKEN",
];

const registered = new Map<string, string>();

/** Register a secret value read outside process.env (password file, config token). */
export function registerSecret(label: string, value: string): void {
  if (value.length > 0) registered.set(label, value);
}

/** Forget runtime-registered secrets (tests only) */
export function _clearSecrets(): void {
  registered.clear();
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Redact sensitive values from strings. Use before logging, notifying or responding. */
export function redactSecrets(str: string): string {
  let out = str;
  const pairs: Array<[string, string]> = [...registered.entries()];
  for (const key of SENSITIVE_KEYS) {
    const val = process.env[key];
    if (val) pairs.push([key, val]);
  }
  for (const [label, val] of pairs) {
    if (out.includes(val)) {
      out = out.replace(new RegExp(escapeRegExp(val), "g"), `[${label}]`);
    }
  }
  return out;
}
