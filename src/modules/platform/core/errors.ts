/**
 * Platform Module - Error Definitions
 */

export type PlatformErrorKind = 'AUTH' | 'HTTP' | 'NETWORK' | 'TIMEOUT' | 'UNKNOWN';

/**
 * Failure talking to the analytics platform.
 * `status` is the HTTP status when a response arrived.
 */
export interface PlatformError {
  readonly type: 'PlatformError';
  readonly kind: PlatformErrorKind;
  readonly message: string;
  readonly status?: number;
  readonly body?: unknown;
}

export const createPlatformError = (
  kind: PlatformErrorKind,
  message: string,
  details: { status?: number; body?: unknown } = {}
): PlatformError => ({
  type: 'PlatformError',
  kind,
  message,
  ...(details.status !== undefined && { status: details.status }),
  ...(details.body !== undefined && { body: details.body }),
});

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Best-effort human message from a platform error body.
 * The platform answers with a plain string, `{ message }` or `{ errors: {...} }`.
 */
export const extractPlatformMessage = (body: unknown, status: number): string => {
  if (typeof body === 'string' && body.trim() !== '') return body.trim();
  if (isRecord(body)) {
    const message = body['message'];
    if (typeof message === 'string' && message !== '') return message;
    const errors = body['errors'];
    if (isRecord(errors)) {
      const parts = Object.entries(errors).map(([key, value]) => `${key}: ${String(value)}`);
      if (parts.length > 0) return parts.join('; ');
    }
  }
  return `Request failed with status ${String(status)}`;
};
