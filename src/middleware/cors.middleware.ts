import cors from 'cors';
import config from '../config/environment';

const LOOPBACK_HOSTS = new Set(['localhost', '127.0.0.1', '[::1]']);

export interface CorsPolicy {
  allowedOrigins: string[];
  /** Accept any localhost origin, whatever its port */
  allowLoopback: boolean;
}

/**
 * Whether a browser origin may call the API. Requests without an origin
 * (curl, server-to-server) are not subject to CORS.
 */
export function isOriginAllowed(origin: string | undefined, policy: CorsPolicy): boolean {
  if (!origin) return true;
  if (policy.allowedOrigins.includes('*') || policy.allowedOrigins.includes(origin)) return true;
  if (!policy.allowLoopback || !URL.canParse(origin)) return false;
  return LOOPBACK_HOSTS.has(new URL(origin).hostname);
}

// A refused origin gets no CORS headers, so the browser blocks the response
export const createCorsMiddleware = (policy: CorsPolicy) =>
  cors({
    origin: (origin, callback) => callback(null, isOriginAllowed(origin, policy)),
    credentials: true,
  });

export const corsMiddleware = createCorsMiddleware({
  allowedOrigins: config.cors.allowedOrigins,
  allowLoopback: config.env === 'development',
});
