/**
 * Environment variable utilities
 */

type Env = Record<string, string | undefined>;

/**
 * Gets an environment variable as a string with a default value
 * @param k - Environment variable key
 * @param d - Default value if variable is not set or empty
 */
export const envStr = (k: string, d: string, env: Env = process.env): string =>
  env[k] || d;

/**
 * Gets an environment variable as an integer with a default value
 * @param k - Environment variable key
 * @param d - Default value if variable is not set or invalid
 */
export const envInt = (k: string, d: number, env: Env = process.env): number => {
  const v = env[k];
  if (!v) return d;
  const n = parseInt(v, 10);
  return Number.isFinite(n) ? n : d;
};

/**
 * Gets an environment variable as a boolean with a default value
 * @param k - Environment variable key
 * @param d - Default value if variable is not set
 * @returns true for "1", "true", "yes", "on", false for any other value
 */
export const envBool = (k: string, d: boolean, env: Env = process.env): boolean =>
  /^(1|true|yes|on)$/i.test(env[k] || String(d));
