import { decodeProtectedHeader, errors, importJWK, jwtVerify, type JWTPayload } from 'jose';
import type { KeyLookup } from './keys.js';
import { describeError } from '../shared/errors.js';

export type TokenFailureReason =
  | 'malformed_token'
  | 'missing_key_id'
  | 'unknown_key_id'
  | 'algorithm_not_allowed'
  | 'invalid_signature'
  | 'token_expired'
  | 'invalid_audience'
  | 'invalid_claims';

export type TokenValidationResult =
  | { valid: true; claims: JWTPayload; keyId: string }
  | { valid: false; reason: TokenFailureReason; detail: string };

export interface TokenValidationOptions {
  audiences: string[];
  algorithms?: string[];
  clockToleranceSeconds?: number;
}

export const DEFAULT_ALGORITHMS = ['RS256'];

/** Entra ID issues access tokens whose audience is either the bare client id or its api:// URI. */
export const audiencesForClient = (clientId: string) => [clientId, `api://${clientId}`];

const failure = (reason: TokenFailureReason, detail: string): TokenValidationResult => ({ valid: false, reason, detail });

const classifyVerifyError = (error: unknown): TokenValidationResult => {
  if (error instanceof errors.JWTExpired) {
    return failure('token_expired', 'token has expired');
  }
  if (error instanceof errors.JWTClaimValidationFailed) {
    if (error.claim === 'aud') {
      return failure('invalid_audience', 'token audience does not match this agent');
    }
    return failure('invalid_claims', `claim "${error.claim}" failed validation: ${error.reason}`);
  }
  if (error instanceof errors.JWSSignatureVerificationFailed) {
    return failure('invalid_signature', 'token signature verification failed');
  }
  if (error instanceof errors.JOSEAlgNotAllowed) {
    return failure('algorithm_not_allowed', describeError(error));
  }
  return failure('malformed_token', describeError(error));
};

export const validateBearerToken = async (
  token: string,
  keys: KeyLookup,
  options: TokenValidationOptions,
): Promise<TokenValidationResult> => {
  const algorithms = options.algorithms ?? DEFAULT_ALGORITHMS;

  let header: ReturnType<typeof decodeProtectedHeader>;
  try {
    header = decodeProtectedHeader(token);
  } catch (error) {
    return failure('malformed_token', describeError(error));
  }

  if (!header.alg) {
    return failure('malformed_token', 'token header has no "alg"');
  }
  if (!algorithms.includes(header.alg)) {
    return failure('algorithm_not_allowed', `algorithm ${header.alg} is not accepted`);
  }
  if (!header.kid) {
    return failure('missing_key_id', 'token header has no "kid"');
  }

  const jwk = keys.get(header.kid);
  if (!jwk) {
    return failure('unknown_key_id', `signing key ${header.kid} is not published by the issuer`);
  }

  try {
    const key = await importJWK(jwk, header.alg);
    const { payload } = await jwtVerify(token, key, {
      audience: options.audiences,
      algorithms,
      clockTolerance: options.clockToleranceSeconds ?? 0,
    });
    return { valid: true, claims: payload, keyId: header.kid };
  } catch (error) {
    return classifyVerifyError(error);
  }
};
