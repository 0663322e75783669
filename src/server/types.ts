/**
 * Shared server types
 *
 * @module server/types
 */

export type { ServerConfig } from './config.js';

export interface SuccessResult<T> {
  success: true;
  data: T;
}

/**
 * Wrap tool output in the success envelope
 */
export function successResult<T>(data: T): SuccessResult<T> {
  return { success: true, data };
}
