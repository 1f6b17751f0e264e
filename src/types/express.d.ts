import 'express-serve-static-core';

export interface CallerIdentity {
  userId: string;
  role: string;
  username?: string;
}

declare module 'express-serve-static-core' {
  interface Request {
    /** Resolved by the auth middleware; absent on unauthenticated routes. */
    caller?: CallerIdentity;
  }
}
