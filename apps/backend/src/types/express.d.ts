declare global {
  namespace Express {
    interface Request {
      /** Set by the requestContext middleware; echoed in X-Request-Id and in error bodies. */
      requestId?: string;
    }
  }
}

export {};
