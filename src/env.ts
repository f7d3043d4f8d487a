/**
 * Environment variable access.
 *
 * Values are read fresh on each call. Empty strings are returned as-is, so
 * callers can tell "set to empty" from "unset".
 */
export class Env {
  static get(name: string): string | undefined {
    return process.env[name];
  }
}
