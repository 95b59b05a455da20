/**
 * Session-related domain types
 */

export type SameSite = "Strict" | "Lax" | "None";

/**
 * Browser cookie as stored in the cookie file.
 * Passed through to the browser context unchanged.
 */
export interface SessionCookie {
  name: string;
  value: string;
  domain: string;
  path: string;
  /** Unix time in seconds, -1 for a session cookie */
  expires: number;
  httpOnly: boolean;
  secure: boolean;
  sameSite: SameSite;
}

/**
 * Sign-in credentials. Held in memory for one authentication attempt only.
 */
export interface Credentials {
  readonly identifier: string;
  readonly secret: string;
}
