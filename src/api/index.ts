export { GatewayServer, httpStatusFor } from './server.js';
export {
  ADMIN_KEY_PREFIX,
  createAuthenticator,
  createCorsMiddleware,
  extractBearerToken,
  generateAdminKey,
} from './auth.js';
export type { Authenticator, RequestHandler } from './auth.js';
export * from './types.js';
