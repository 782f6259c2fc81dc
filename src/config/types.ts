/**
 * Client configuration types.
 */

/** Connection and scheduling settings shared by every command */
export interface ClientConfig {
  /** Repository server base URL (no trailing slash) */
  url: string;

  /** Basic-auth user name */
  username: string;

  /** Basic-auth password */
  password: string;

  /** Maximum number of concurrent file transfers in a folder operation */
  concurrency: number;

  /** HTTP request timeout in milliseconds (0 = no timeout) */
  timeoutMs: number;
}

/** Default configuration values */
export const DEFAULT_CLIENT_CONFIG: ClientConfig = {
  url: 'http://localhost:8081',
  username: 'admin',
  password: 'admin',
  concurrency: 8,
  timeoutMs: 0,
};
