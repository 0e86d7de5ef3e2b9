/**
 * HTTP Client Factory
 * ===================
 *
 * Creates axios clients for market-data providers with the per-call timeout and
 * optional proxy. No retry interceptor: a failed call falls through to the next
 * source in the chain instead.
 */

import axios, { type AxiosInstance, type AxiosRequestConfig } from 'axios';
import { HttpsProxyAgent } from 'https-proxy-agent';
import { HTTP_TIMEOUT_MS } from '../config/hedging.defaults.js';

export interface HttpClientOptions {
  timeoutMs?: number;
  proxyUrl?: string;
}

/** The part of axios the providers call */
export type HttpGetter = Pick<AxiosInstance, 'get'>;

export function createHttpClient(options: HttpClientOptions = {}): AxiosInstance {
  const axiosConfig: AxiosRequestConfig = {
    timeout: options.timeoutMs ?? HTTP_TIMEOUT_MS,
    headers: {
      'User-Agent': 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36',
      Accept: 'application/json',
    },
  };

  if (options.proxyUrl) {
    const agent = new HttpsProxyAgent(options.proxyUrl);
    axiosConfig.httpsAgent = agent;
    axiosConfig.httpAgent = agent;
    // Agent handles the tunnel; axios' own proxy handling would double it
    axiosConfig.proxy = false;
  }

  return axios.create(axiosConfig);
}
