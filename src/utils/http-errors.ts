/**
 * HTTP error detection utilities.
 */

import axios from "axios";

/**
 * Get the HTTP status of a failed axios request.
 * @returns The status code, or null for network errors and non-axios errors
 */
export function getHttpStatus(error: unknown): number | null {
  if (axios.isAxiosError(error)) {
    return error.response?.status ?? null;
  }
  return null;
}

/**
 * Check if an axios error was caused by the request timeout.
 */
export function isTimeoutError(error: unknown): boolean {
  return (
    axios.isAxiosError(error) &&
    (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT")
  );
}

/**
 * Short human-readable reason for a failed request.
 */
export function describeHttpError(error: unknown, timeout: number): string {
  const status = getHttpStatus(error);
  if (status !== null) {
    return `HTTP ${status}`;
  }
  if (isTimeoutError(error)) {
    return `timed out after ${timeout}ms`;
  }
  if (axios.isAxiosError(error) && error.code) {
    return `${error.code}: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}
