/**
 * Assemble the hono app served on the listen address.
 */
import { Hono } from "hono";

import { errorHandler } from "./errorHandler.js";
import { requestIdMiddleware } from "./middleware/requestId.js";
import { type RouteDependencies, createRoutes } from "./routes.js";

export function createApp(deps: RouteDependencies): Hono {
  const app = new Hono();

  app.use("*", requestIdMiddleware);
  app.onError(errorHandler);
  app.route("/", createRoutes(deps));

  return app;
}
