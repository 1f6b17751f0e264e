export { errorMiddleware } from './error.middleware.js';
export { createAuthMiddleware, type AuthOptions } from './auth.middleware.js';
