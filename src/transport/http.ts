import type { Agent } from 'http';
import axios, { AxiosError, type AxiosInstance, type AxiosProxyConfig, type AxiosRequestConfig } from 'axios';
import { SocksProxyAgent } from 'socks-proxy-agent';
import { CancelledError, ConfigError, UpstreamError } from '../reliability/errors';
import type { Identity, Route, StrategyProfile, Transport } from '../reliability/types';

export interface HttpRequest {
  url: string;
  method?: 'GET' | 'HEAD' | 'POST';
  headers?: Record<string, string>;
  body?: unknown;
}

export interface HttpResponse {
  url: string;
  status: number;
  headers: Record<string, string>;
  body: string;
}

export interface HttpTransportOptions {
  httpClient?: AxiosInstance;
  agentFor?: RelayAgentFactory;
}

const HTTP_PROXY_PROTOCOLS = new Set(['http', 'https']);
const SOCKS_PROTOCOLS = new Set(['socks', 'socks4', 'socks4a', 'socks5', 'socks5h']);

/** Header carrying the strategy's pinned client signature next to the identity fingerprint. */
export const CLIENT_AGENT_HEADER = 'X-Client-User-Agent';

export type RelayAgentFactory = (endpoint: string) => Agent;
export type RelayConfig = Pick<AxiosRequestConfig, 'proxy' | 'httpAgent' | 'httpsAgent'>;

function relayProtocol(endpoint: string): string {
  let url: URL;
  try {
    url = new URL(endpoint);
  } catch {
    throw new ConfigError(`Invalid relay endpoint: ${endpoint}`, 'relayEndpoint');
  }
  return url.protocol.replace(':', '');
}

export function isSupportedRelayEndpoint(endpoint: string): boolean {
  try {
    const protocol = relayProtocol(endpoint);
    return HTTP_PROXY_PROTOCOLS.has(protocol) || SOCKS_PROTOCOLS.has(protocol);
  } catch {
    return false;
  }
}

/**
 * Routes a request through its relay. http(s) relays become an axios proxy;
 * socks relays are tunnelled through an agent from `agentFor`.
 */
export function toRelayConfig(route: Route, agentFor: RelayAgentFactory): RelayConfig {
  if (route.kind === 'direct') {
    return { proxy: false };
  }

  const protocol = relayProtocol(route.endpoint);
  if (SOCKS_PROTOCOLS.has(protocol)) {
    const agent = agentFor(route.endpoint);
    return { proxy: false, httpAgent: agent, httpsAgent: agent };
  }
  if (!HTTP_PROXY_PROTOCOLS.has(protocol)) {
    throw new ConfigError(`Unsupported relay protocol: ${protocol}`, 'relayEndpoint');
  }

  const url = new URL(route.endpoint);
  const proxy: AxiosProxyConfig = {
    protocol,
    host: url.hostname,
    port: url.port ? Number(url.port) : protocol === 'https' ? 443 : 80,
  };
  if (url.username) {
    proxy.auth = { username: decodeURIComponent(url.username), password: decodeURIComponent(url.password) };
  }
  return { proxy };
}

/**
 * One SOCKS agent per relay endpoint, kept for the life of the transport so
 * connections through the same relay are pooled.
 */
export function createSocksAgentCache(): RelayAgentFactory {
  const agents = new Map<string, SocksProxyAgent>();

  return (endpoint) => {
    let agent = agents.get(endpoint);
    if (agent === undefined) {
      agent = new SocksProxyAgent(endpoint);
      agents.set(endpoint, agent);
    }
    return agent;
  };
}

export function buildRequestConfig(
  request: HttpRequest,
  identity: Identity,
  profile: StrategyProfile,
  signal: AbortSignal,
  agentFor: RelayAgentFactory = createSocksAgentCache()
): AxiosRequestConfig {
  const headers: Record<string, string> = {
    ...profile.headers,
    ...request.headers,
    'User-Agent': identity.fingerprint,
  };
  if (profile.userAgent !== undefined) {
    headers[CLIENT_AGENT_HEADER] = profile.userAgent;
  }

  return {
    url: request.url,
    method: request.method ?? 'GET',
    data: request.body,
    headers,
    ...toRelayConfig(identity.route, agentFor),
    signal,
    responseType: 'text',
    transformResponse: (data: unknown) => data,
    validateStatus: () => true,
  };
}

function flattenHeaders(headers: unknown): Record<string, string> {
  const result: Record<string, string> = {};
  if (typeof headers !== 'object' || headers === null) {
    return result;
  }
  for (const [key, value] of Object.entries(headers)) {
    if (value !== undefined && value !== null) {
      result[key.toLowerCase()] = Array.isArray(value) ? value.join(', ') : String(value);
    }
  }
  return result;
}

export function createHttpTransport(options: HttpTransportOptions = {}): Transport<HttpRequest, HttpResponse> {
  const httpClient = options.httpClient ?? axios.create();
  const agentFor = options.agentFor ?? createSocksAgentCache();

  return async (request, identity, profile, signal) => {
    try {
      const response = await httpClient.request<string>(buildRequestConfig(request, identity, profile, signal, agentFor));

      if (response.status >= 400) {
        throw new UpstreamError(`HTTP ${response.status} from ${request.url}`, response.status);
      }

      return {
        url: request.url,
        status: response.status,
        headers: flattenHeaders(response.headers),
        body: typeof response.data === 'string' ? response.data : String(response.data ?? ''),
      };
    } catch (error) {
      if (axios.isCancel(error)) {
        // The attempt wrapper decides between timeout and cancellation from
        // the signal's reason; surface that reason when there is one.
        throw signal.reason instanceof Error ? signal.reason : new CancelledError();
      }
      if (error instanceof AxiosError && error.response) {
        throw new UpstreamError(error.message, error.response.status, { cause: error });
      }
      throw error;
    }
  };
}
