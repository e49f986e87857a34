/**
 * Authentication Tokens
 */

import type { AuthToken } from '../types'

/**
 * Creates a basic authentication token
 */
function basic(username: string, password: string, realm?: string): AuthToken {
  const token: AuthToken = {
    scheme: 'basic',
    principal: username,
    credentials: password,
  }
  if (realm !== undefined) {
    token.realm = realm
  }
  return token
}

/**
 * Creates a bearer authentication token for SSO
 */
function bearer(token: string): AuthToken {
  return {
    scheme: 'bearer',
    credentials: token,
  }
}

/**
 * Creates a token for any other `Authorization` scheme
 */
function custom(scheme: string, credentials: string): AuthToken {
  return {
    scheme,
    credentials,
  }
}

/**
 * Build the `Authorization` header value for a token
 */
export function authorizationHeader(token: AuthToken): string {
  switch (token.scheme) {
    case 'basic': {
      const credentials = Buffer.from(
        `${token.principal ?? ''}:${token.credentials ?? ''}`,
        'utf8'
      ).toString('base64')
      return `Basic ${credentials}`
    }
    case 'bearer':
      return `Bearer ${token.credentials ?? ''}`
    default:
      return `${token.scheme} ${token.credentials ?? ''}`
  }
}

export const auth = {
  basic,
  bearer,
  custom,
}

export type { AuthToken }
