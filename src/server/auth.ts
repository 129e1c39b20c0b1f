/**
 * HTTP basic authentication in front of every route.
 */

import { createHash, timingSafeEqual } from 'node:crypto';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { AuthenticationError } from '../common/errors.js';
import { authLog } from '../common/logger.js';

export const AUTH_CHALLENGE = 'Basic realm="restricted", charset="UTF-8"';

export interface BasicCredentials {
  username: string;
  password: string;
}

const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Extract credentials from an `Authorization: Basic ...` header.
 */
export function parseBasicAuth(header: string | undefined): BasicCredentials | undefined {
  if (!header || header.slice(0, 6).toLowerCase() !== 'basic ') return undefined;

  const encoded = header.slice(6).trim();
  if (!BASE64.test(encoded)) return undefined;

  const decoded = Buffer.from(encoded, 'base64').toString('utf-8');
  const colon = decoded.indexOf(':');
  if (colon < 0) return undefined;

  return {
    username: decoded.slice(0, colon),
    password: decoded.slice(colon + 1),
  };
}

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf-8').digest();
}

/**
 * Compare credentials in constant time. Both sides are hashed first so the
 * comparison never depends on the secret's length.
 */
export function credentialsMatch(given: BasicCredentials, expected: BasicCredentials): boolean {
  const usernameMatch = timingSafeEqual(digest(given.username), digest(expected.username));
  const passwordMatch = timingSafeEqual(digest(given.password), digest(expected.password));
  return usernameMatch && passwordMatch;
}

/**
 * @throws AuthenticationError when the request lacks matching credentials
 */
export function authenticate(request: FastifyRequest, expected: BasicCredentials): void {
  const given = parseBasicAuth(request.headers.authorization);
  if (!given) {
    throw new AuthenticationError('Authentication required');
  }
  if (!credentialsMatch(given, expected)) {
    throw new AuthenticationError('Invalid credentials');
  }
}

/**
 * Reject every request without matching credentials with a 401 challenge.
 */
export function registerBasicAuth(app: FastifyInstance, expected: BasicCredentials): void {
  app.addHook('onRequest', async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      authenticate(request, expected);
    } catch (err) {
      if (!(err instanceof AuthenticationError)) throw err;
      authLog('%s %s rejected: %s', request.method, request.url, err.message);
      return reply
        .status(401)
        .header('WWW-Authenticate', AUTH_CHALLENGE)
        .type('text/plain; charset=utf-8')
        .send('Unauthorized\n');
    }
  });
}
