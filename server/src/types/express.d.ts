// Augments Express's Request with the caller resolved by the auth middleware.
export {};

declare global {
  namespace Express {
    interface Request {
      userId?: string;
      /** Aborted on client disconnect or request timeout */
      signal?: AbortSignal;
    }
  }
}
