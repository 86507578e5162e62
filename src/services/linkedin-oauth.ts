import type { OAuthConfig } from "../config.js";
import { AuthError, NetworkError, errorMessage, httpError } from "../errors.js";
import type { FetchFn } from "../types/index.js";

export const AUTHORIZATION_URL = "https://www.linkedin.com/oauth/v2/authorization";
export const TOKEN_URL = "https://www.linkedin.com/oauth/v2/accessToken";
export const DEFAULT_SCOPES = ["w_member_social", "openid", "profile"] as const;

export interface AuthorizationUrlOptions {
  clientId: string;
  redirectUri: string;
  scopes?: readonly string[];
  state?: string;
}

export function buildAuthorizationUrl({
  clientId,
  redirectUri,
  scopes = DEFAULT_SCOPES,
  state = "commit-digest",
}: AuthorizationUrlOptions): string {
  const url = new URL(AUTHORIZATION_URL);
  url.searchParams.set("response_type", "code");
  url.searchParams.set("client_id", clientId);
  url.searchParams.set("redirect_uri", redirectUri);
  url.searchParams.set("scope", scopes.join(" "));
  url.searchParams.set("state", state);
  return url.toString();
}

/**
 * Pulls the authorization code out of the URL LinkedIn redirected to.
 */
export function extractAuthorizationCode(redirectedUrl: string): string {
  let url: URL;
  try {
    url = new URL(redirectedUrl.trim());
  } catch {
    throw new AuthError(`Not a valid URL: ${redirectedUrl}`);
  }
  const error = url.searchParams.get("error");
  if (error) {
    const description = url.searchParams.get("error_description");
    throw new AuthError(`Authorization was refused: ${error}${description ? ` (${description})` : ""}`);
  }
  const code = url.searchParams.get("code");
  if (!code) {
    throw new AuthError("No authorization code found in URL");
  }
  return code;
}

export interface TokenSet {
  accessToken: string;
  expiresIn?: number;
  idToken?: string;
  scope?: string;
}

export async function exchangeAuthorizationCode(
  config: OAuthConfig,
  code: string,
  fetchFn: FetchFn = globalThis.fetch.bind(globalThis)
): Promise<TokenSet> {
  let response: Response;
  try {
    response = await fetchFn(TOKEN_URL, {
      method: "POST",
      headers: { "Content-Type": "application/x-www-form-urlencoded" },
      body: new URLSearchParams({
        grant_type: "authorization_code",
        code,
        redirect_uri: config.redirectUri,
        client_id: config.clientId,
        client_secret: config.clientSecret,
      }).toString(),
    });
  } catch (error) {
    throw new NetworkError(`Network error exchanging authorization code: ${errorMessage(error)}`, { cause: error });
  }

  if (!response.ok) {
    throw httpError("LinkedIn token endpoint", response.status, await response.text().catch(() => ""));
  }

  const body: unknown = await response.json().catch(() => null);
  if (typeof body !== "object" || body === null || !("access_token" in body) || typeof body.access_token !== "string") {
    throw new AuthError("Token response has no access_token");
  }

  return {
    accessToken: body.access_token,
    expiresIn: "expires_in" in body && typeof body.expires_in === "number" ? body.expires_in : undefined,
    idToken: "id_token" in body && typeof body.id_token === "string" ? body.id_token : undefined,
    scope: "scope" in body && typeof body.scope === "string" ? body.scope : undefined,
  };
}

/**
 * Reads the `sub` claim of an OpenID id token. The signature is not checked;
 * the value is only used to name the posting member.
 */
export function decodeIdTokenSubject(idToken: string): string | null {
  const [, payload] = idToken.split(".");
  if (!payload) {
    return null;
  }

  let claims: unknown;
  try {
    claims = JSON.parse(Buffer.from(payload, "base64url").toString("utf-8"));
  } catch {
    return null;
  }

  if (typeof claims === "object" && claims !== null && "sub" in claims && typeof claims.sub === "string" && claims.sub) {
    return claims.sub;
  }
  return null;
}
