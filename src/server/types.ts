/**
 * Express request augmentation shared by the server modules.
 */

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      /** UUID assigned to every request, echoed in the X-Request-Id header */
      requestId: string;
    }
  }
}

export {};
