/**
 * HTTP Client Factory
 *
 * Axios instance used for the upstream CSV feed. No retry interceptor:
 * retry policy belongs to whoever triggers the crawl.
 */

import axios, { AxiosInstance, AxiosRequestConfig } from 'axios';
import { HttpsProxyAgent } from 'https-proxy-agent';

export interface HttpClientOptions {
  timeoutMs: number;
  userAgent: string;
  proxyUrl?: string;
}

export function createHttpClient(options: HttpClientOptions): AxiosInstance {
  const axiosConfig: AxiosRequestConfig = {
    timeout: options.timeoutMs,
    headers: {
      'User-Agent': options.userAgent,
    },
    maxRedirects: 5,
  };

  if (options.proxyUrl) {
    const agent = new HttpsProxyAgent(options.proxyUrl);
    axiosConfig.httpsAgent = agent;
    axiosConfig.httpAgent = agent;
    axiosConfig.proxy = false; // Disable axios proxy, use agent instead
  }

  return axios.create(axiosConfig);
}
