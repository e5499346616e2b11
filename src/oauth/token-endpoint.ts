import { z } from "zod";
import type { TokenSet } from "../types.js";
import { debug } from "../utils/log.js";
import {
  AuthNetworkError,
  RefreshError,
  TokenExchangeError,
  TokenResponseMalformedError,
} from "./errors.js";

const tokenResponseSchema = z
  .object({
    access_token: z.string().min(1),
    refresh_token: z.string().min(1).optional(),
    expires_in: z.number().nonnegative(),
    token_type: z.string(),
  })
  .transform((raw) => ({
    accessToken: raw.access_token,
    refreshToken: raw.refresh_token,
    expiresIn: raw.expires_in,
    tokenType: raw.token_type,
  }));

export type TokenResponse = z.output<typeof tokenResponseSchema>;

export type TokenGrant =
  | {
      grant_type: "authorization_code";
      code: string;
      redirect_uri: string;
      client_id: string;
      client_secret: string;
      code_verifier: string;
    }
  | {
      grant_type: "refresh_token";
      refresh_token: string;
      client_id: string;
      client_secret: string;
    };

export function encodeForm(params: Record<string, string>) {
  return Object.entries(params)
    .map(
      ([key, value]) =>
        `${encodeURIComponent(key)}=${encodeURIComponent(value)}`
    )
    .join("&");
}

export function toTokenSet(response: TokenResponse, issuedAt = Date.now()) {
  const set: TokenSet = {
    accessToken: response.accessToken,
    refreshToken: response.refreshToken,
    expiresAt: issuedAt + response.expiresIn * 1000,
    tokenType: response.tokenType,
  };
  return set;
}

/**
 * POSTs a grant to the token endpoint. Failures are classified by the grant
 * that was sent, so a rejected refresh surfaces as {@link RefreshError} and a
 * rejected code exchange as {@link TokenExchangeError}.
 */
export async function requestTokens(options: {
  tokenUrl: string;
  grant: TokenGrant;
  fetchFn?: typeof fetch;
}): Promise<TokenResponse> {
  const fetchFn = options.fetchFn ?? globalThis.fetch;
  let response: Response;
  try {
    response = await fetchFn(options.tokenUrl, {
      method: "POST",
      headers: {
        "Content-Type": "application/x-www-form-urlencoded",
        Accept: "application/json",
      },
      body: encodeForm(options.grant),
    });
  } catch (err) {
    throw new AuthNetworkError(err);
  }

  if (!response.ok) {
    const body = await response.text().catch(() => "<unreadable>");
    if (options.grant.grant_type === "refresh_token") {
      throw new RefreshError(response.status, body);
    }
    throw new TokenExchangeError(response.status, body);
  }

  let payload: unknown;
  try {
    payload = await response.json();
  } catch (err) {
    throw new TokenResponseMalformedError({ cause: err });
  }
  const parsed = tokenResponseSchema.safeParse(payload);
  if (!parsed.success) {
    debug(`Token response rejected: ${parsed.error.message}`);
    throw new TokenResponseMalformedError({ cause: parsed.error });
  }
  return parsed.data;
}
