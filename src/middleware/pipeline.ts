/**
 * Middleware composition for the API handlers. Every endpoint has the error
 * handler; logging, authentication, the body limit and body validation are
 * added per endpoint.
 */

export interface HandlerContext {
  /** Set by the auth middleware for admin routes. */
  clientId: string | null;
}

export type Handler = (req: Request, ctx: HandlerContext) => Promise<Response>;
export type Middleware = (next: Handler) => Handler;

/** The first middleware is the outermost wrapper. */
export function pipeline(...middlewares: Middleware[]): (handler: Handler) => Handler {
  return (handler) => middlewares.reduceRight<Handler>((next, mw) => mw(next), handler);
}
