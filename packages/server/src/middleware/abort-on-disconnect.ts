import type { Request } from "express";

/**
 * Signal that aborts when the client goes away before the response is
 * written.
 */
export function abortOnDisconnect(req: Request): AbortSignal {
  const controller = new AbortController();
  req.res?.on("close", () => {
    if (!req.res?.writableFinished) {
      console.warn(`[server] Client disconnected from ${req.method} ${req.path}; aborting`);
      controller.abort();
    }
  });
  return controller.signal;
}
