import { isAxiosError } from 'axios';

/**
 * Extracts a string message from an unknown error value.
 * Handles both Error instances and arbitrary thrown values.
 *
 * @param error - The caught error value (Error instance or any thrown value)
 * @returns The error message string
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Extracts the most useful message from a failed call to another relay node.
 *
 * Nest error bodies carry the reason in `message` (a string, or a list of
 * validation messages); everything else falls back to the transport error.
 */
export function getRemoteErrorMessage(error: unknown): string {
  if (isAxiosError(error)) {
    const data: unknown = error.response?.data;
    if (typeof data === 'object' && data !== null && 'message' in data) {
      const { message } = data;
      if (typeof message === 'string' && message.length > 0) {
        return message;
      }
      if (Array.isArray(message) && message.length > 0) {
        return message.map(String).join('; ');
      }
    }
    return error.message || 'Unknown error';
  }
  return getErrorMessage(error);
}
