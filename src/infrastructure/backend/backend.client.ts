import axios, { type AxiosInstance } from 'axios';

import { config } from '@config/env.config';

let instance: AxiosInstance | null = null;

function createInstance(): AxiosInstance {
  const { BACKEND_URL, BACKEND_COOKIE } = config;
  if (!BACKEND_URL) {
    throw new Error('BACKEND_URL is not configured');
  }
  return axios.create({
    baseURL: BACKEND_URL.replace(/\/+$/, ''),
    headers: BACKEND_COOKIE ? { Cookie: BACKEND_COOKIE } : {},
    timeout: 15000,
  });
}

export function isBackendConfigured(): boolean {
  return Boolean(config.BACKEND_URL);
}

function getAxios(): AxiosInstance {
  if (!instance) {
    instance = createInstance();
  }
  return instance;
}

export { getAxios as getBackendAxios };
