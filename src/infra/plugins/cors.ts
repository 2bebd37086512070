/**
 * CORS plugin for Fastify
 * Configures Cross-Origin Resource Sharing with environment-based allowed origins
 */

import cors from '@fastify/cors';

import type { AppConfig } from '../config/env.js';
import type { FastifyInstance } from 'fastify';

/**
 * Get the set of allowed origins from configuration
 */
export function getAllowedOriginsSet(config: AppConfig): Set<string> {
  const set = new Set<string>();

  // Parse comma-separated ALLOWED_ORIGINS
  if (config.cors.allowedOrigins !== undefined && config.cors.allowedOrigins !== '') {
    config.cors.allowedOrigins
      .split(',')
      .map((s) => s.trim())
      .filter((s) => s !== '')
      .forEach((u) => set.add(u));
  }

  if (config.cors.clientBaseUrl !== undefined && config.cors.clientBaseUrl !== '') {
    set.add(config.cors.clientBaseUrl.trim());
  }

  return set;
}

export function isLocalhostOrigin(origin: string): boolean {
  try {
    const url = new URL(origin);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      return false;
    }

    // Match hostnames exactly (avoid `startsWith('http://localhost')` pitfalls)
    return (
      url.hostname === 'localhost' || url.hostname === '127.0.0.1' || url.hostname === '[::1]'
    );
  } catch {
    return false;
  }
}

/**
 * Register CORS plugin with Fastify.
 * The dashboard only reads, so GET/POST (GraphQL) and preflight are enough.
 */
export async function registerCors(fastify: FastifyInstance, config: AppConfig): Promise<void> {
  const allowedOrigins = getAllowedOriginsSet(config);

  await fastify.register(cors, {
    origin: (origin, cb) => {
      // Allow server-to-server or same-origin requests
      if (origin === undefined || origin === '') {
        cb(null, true);
        return;
      }

      if (allowedOrigins.has(origin)) {
        cb(null, true);
        return;
      }

      // Development also accepts any localhost dashboard
      if (config.server.isDevelopment && isLocalhostOrigin(origin)) {
        cb(null, true);
        return;
      }

      cb(new Error('CORS origin not allowed'), false);
    },
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['content-type', 'x-requested-with', 'accept'],
    exposedHeaders: ['content-length'],
  });
}
