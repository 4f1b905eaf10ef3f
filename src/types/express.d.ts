// src/types/express.d.ts

declare global {
  namespace Express {
    interface Request {
      /** Set by the traceId middleware for every request */
      trace_id?: string;
    }
  }
}

export {};
