/**
 * OCI Distribution Spec client (pull operations only)
 *
 * Native TypeScript implementation for downloading manifests and blobs from
 * OCI-compliant registries. Endpoints are tried in order so that mirrors can
 * serve content before the registry itself.
 *
 * @see https://github.com/opencontainers/distribution-spec/blob/main/spec.md
 */

import type { HttpClient } from "#/core";
import { USER_AGENT } from "#/constants";
import { TokenResponseSchema } from "#/schemas";
import type { OciEndpoint, OciRegistryConfig, PullResult } from "./oci.types";
import { MANIFEST_MEDIA_TYPES } from "./oci.types";

type AuthChallenge =
  | { scheme: "basic" }
  | { scheme: "bearer"; realm: string; service?: string; scope?: string };

export class OciClient {
  private endpoints: OciEndpoint[];
  private http: HttpClient;
  // Keyed by endpoint host and challenge; a token never leaves the endpoint it was issued for
  private tokenCache: Map<string, string> = new Map();

  constructor(config: OciRegistryConfig, http: HttpClient) {
    if (config.endpoints.length === 0) {
      throw new Error("OCI client requires at least one endpoint");
    }
    this.endpoints = config.endpoints;
    this.http = http;
  }

  /**
   * Get request headers for OCI registry API, carrying only the endpoint's own credentials
   */
  private getHeaders(endpoint: OciEndpoint, accept?: string): Record<string, string> {
    const headers: Record<string, string> = {
      "User-Agent": USER_AGENT,
    };

    if (accept) {
      headers["Accept"] = accept;
    }

    const registryToken = endpoint.credentials?.registryToken;
    if (registryToken) {
      headers["Authorization"] = `Bearer ${registryToken}`;
    }

    return headers;
  }

  /**
   * Build OCI registry URL
   * @param endpoint - Endpoint serving the repository
   * @param name - Repository name (e.g., "library/redis")
   * @param path - API path after the name
   */
  private buildUrl(endpoint: OciEndpoint, name: string, path: string): string {
    const scheme = endpoint.http ? "http" : "https";
    return `${scheme}://${endpoint.host}/v2/${name}${path}`;
  }

  /**
   * Parse WWW-Authenticate header from a 401 response
   *
   * Expected formats:
   *   Bearer realm="<url>",service="<service>",scope="<scope>"
   *   Basic realm="<realm>"
   */
  private parseWwwAuthenticate(header: string): AuthChallenge | undefined {
    const trimmed = header.trim();

    if (/^basic\b/i.test(trimmed)) {
      return { scheme: "basic" };
    }

    if (!/^bearer\s/i.test(trimmed)) {
      return undefined;
    }

    const params = trimmed.slice("Bearer ".length);
    const realm = params.match(/realm="([^"]+)"/)?.[1];
    const service = params.match(/service="([^"]+)"/)?.[1];
    const scope = params.match(/scope="([^"]+)"/)?.[1];

    if (!realm) {
      return undefined;
    }

    return { scheme: "bearer", realm, service, scope };
  }

  private basicAuthorization(endpoint: OciEndpoint): string | undefined {
    const { username, password } = endpoint.credentials ?? {};
    if (!username || password === undefined) {
      return undefined;
    }
    return `Basic ${Buffer.from(`${username}:${password}`).toString("base64")}`;
  }

  /**
   * Obtain a registry Bearer token for a challenge
   *
   * Registries answer anonymous or PAT-authenticated requests with 401 and a
   * token endpoint:
   * 1. With an identity token, exchange it (OAuth2 refresh_token grant, POST)
   * 2. Otherwise call the endpoint with Basic auth when credentials are known,
   *    or anonymously for public repositories
   * 3. Use the returned token for the retried request
   */
  private async exchangeToken(
    endpoint: OciEndpoint,
    challenge: Extract<AuthChallenge, { scheme: "bearer" }>,
    signal?: AbortSignal
  ): Promise<string | undefined> {
    const cacheKey = `${endpoint.host}|${challenge.realm}|${challenge.service ?? ""}|${challenge.scope ?? ""}`;
    const cached = this.tokenCache.get(cacheKey);
    if (cached) {
      return cached;
    }

    let response: Response;
    const identityToken = endpoint.credentials?.identityToken;

    if (identityToken) {
      const form = new URLSearchParams({
        grant_type: "refresh_token",
        client_id: USER_AGENT,
        refresh_token: identityToken,
      });
      if (challenge.service) form.set("service", challenge.service);
      if (challenge.scope) form.set("scope", challenge.scope);

      response = await this.http.fetch(challenge.realm, {
        method: "POST",
        headers: {
          "Content-Type": "application/x-www-form-urlencoded",
          "User-Agent": USER_AGENT,
        },
        body: form.toString(),
        signal,
      });
    } else {
      const tokenUrl = new URL(challenge.realm);
      if (challenge.service) tokenUrl.searchParams.set("service", challenge.service);
      if (challenge.scope) tokenUrl.searchParams.set("scope", challenge.scope);

      const headers: Record<string, string> = { "User-Agent": USER_AGENT };
      const basic = this.basicAuthorization(endpoint);
      if (basic) {
        headers["Authorization"] = basic;
      }

      response = await this.http.fetch(tokenUrl.toString(), { headers, signal });
    }

    if (!response.ok) {
      return undefined;
    }

    const parsed = TokenResponseSchema.safeParse(await response.json());
    const exchangedToken = parsed.success ? parsed.data : undefined;

    if (exchangedToken) {
      this.tokenCache.set(cacheKey, exchangedToken);
    }

    return exchangedToken;
  }

  /**
   * Fetch with automatic authentication on 401 responses
   *
   * 1. Make the request with current credentials
   * 2. If 401 with WWW-Authenticate, answer the challenge (Basic or Bearer)
   * 3. Retry the request once with the new Authorization header
   */
  private async authenticatedFetch(
    endpoint: OciEndpoint,
    url: string,
    headers: Record<string, string>,
    signal?: AbortSignal
  ): Promise<Response> {
    const response = await this.http.fetch(url, { headers, redirect: "follow", signal });

    if (response.status !== 401) {
      return response;
    }

    const wwwAuthenticate = response.headers.get("www-authenticate");
    const challenge = wwwAuthenticate ? this.parseWwwAuthenticate(wwwAuthenticate) : undefined;
    if (!challenge) {
      return response;
    }

    let authorization: string | undefined;
    if (challenge.scheme === "basic") {
      authorization = this.basicAuthorization(endpoint);
    } else {
      const token = await this.exchangeToken(endpoint, challenge, signal);
      authorization = token ? `Bearer ${token}` : undefined;
    }

    if (!authorization) {
      return response;
    }

    return this.http.fetch(url, {
      headers: { ...headers, Authorization: authorization },
      redirect: "follow",
      signal,
    });
  }

  /**
   * Pull a manifest by tag or digest
   *
   * GET /v2/<name>/manifests/<reference>
   */
  async pullManifest(name: string, reference: string, signal?: AbortSignal): Promise<PullResult> {
    // Accept both OCI manifest and Docker manifest for compatibility
    return this.pull("manifest", name, reference, MANIFEST_MEDIA_TYPES.join(", "), signal);
  }

  /**
   * Pull a blob by digest
   *
   * GET /v2/<name>/blobs/<digest>
   */
  async pullBlob(name: string, digest: string, signal?: AbortSignal): Promise<PullResult> {
    return this.pull("blob", name, digest, undefined, signal);
  }

  /**
   * Try each endpoint in turn; a mirror failure falls through to the next
   * endpoint and the last endpoint's result is returned as-is.
   */
  private async pull(
    kind: "manifest" | "blob",
    name: string,
    target: string,
    accept: string | undefined,
    signal?: AbortSignal
  ): Promise<PullResult> {
    let result: PullResult = { success: false, error: `No endpoint for ${name}` };

    for (const endpoint of this.endpoints) {
      result = await this.pullFrom(kind, endpoint, name, target, accept, signal);
      if (result.success) {
        return result;
      }
    }

    return result;
  }

  private async pullFrom(
    kind: "manifest" | "blob",
    endpoint: OciEndpoint,
    name: string,
    target: string,
    accept: string | undefined,
    signal?: AbortSignal
  ): Promise<PullResult> {
    try {
      const path = kind === "manifest" ? `/manifests/${target}` : `/blobs/${target}`;
      const url = this.buildUrl(endpoint, name, path);
      const response = await this.authenticatedFetch(endpoint, url, this.getHeaders(endpoint, accept), signal);

      if (!response.ok) {
        if (response.status === 404) {
          return {
            success: false,
            status: 404,
            error:
              kind === "manifest"
                ? `Manifest not found: ${name}${target.includes(":") ? "@" : ":"}${target}`
                : `Blob not found: ${target}`,
          };
        }
        return {
          success: false,
          status: response.status,
          error: `Failed to pull ${kind}: ${response.status} ${response.statusText}`,
        };
      }

      const buffer = await response.arrayBuffer();

      return {
        success: true,
        data: Buffer.from(buffer),
        mediaType: parseContentType(response.headers.get("content-type")),
        digest: response.headers.get("docker-content-digest") ?? undefined,
      };
    } catch (err) {
      signal?.throwIfAborted();
      const message = err instanceof Error ? err.message : "Unknown error";
      return {
        success: false,
        error: `Failed to pull ${kind}: ${message}`,
      };
    }
  }
}

function parseContentType(header: string | null): string | undefined {
  const mediaType = header?.split(";")[0]?.trim();
  return mediaType ? mediaType : undefined;
}
