import { createHash } from 'crypto';
import { RATE_LIMIT_CONSTANTS } from '../constants/rate-limit.constants';

type HeaderValue = string | string[] | undefined;

export interface ClientRequest {
  ip?: string;
  socket?: { remoteAddress?: string };
  headers: Record<string, HeaderValue>;
}

function firstHeader(value: HeaderValue): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Originating address of a request.
 *
 * The first X-Forwarded-For entry wins over the direct connection address.
 */
export function getClientAddress(request: ClientRequest): string {
  const forwardedFor = firstHeader(request.headers['x-forwarded-for']);
  const forwardedIp = forwardedFor?.split(',')[0]?.trim();

  if (forwardedIp) {
    return forwardedIp;
  }

  return request.ip || request.socket?.remoteAddress || 'unknown';
}

/**
 * Key used to approximate "one client" for rate limiting.
 *
 * Address and a User-Agent prefix are combined and hashed with SHA-256 so
 * raw addresses are never held in memory. Clients behind one NAT with the
 * same browser share a key.
 *
 * @returns first 16 hex characters of the digest
 */
export function getClientIdentifier(request: ClientRequest): string {
  const address = getClientAddress(request);
  const userAgent = (firstHeader(request.headers['user-agent']) ?? '').slice(
    0,
    RATE_LIMIT_CONSTANTS.USER_AGENT_PREFIX_LENGTH,
  );

  return createHash('sha256').update(`${address}:${userAgent}`).digest('hex').substring(0, 16);
}
