/**
 * Error Message Utility
 * Renders any thrown value as the `error` string of a detection response.
 */

import { AppError } from "./errors.js";

/**
 * Application errors carry a message meant for the caller and are used as-is;
 * anything else is prefixed with its error name.
 */
export function describeError(error: unknown): string {
  if (error instanceof AppError) {
    return error.message;
  }
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
