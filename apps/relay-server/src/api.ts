import { getServerContext } from "./context";
import { jsonError, withErrorHandling } from "./http/responses";
import { createGeocodeHandler } from "./routes/navigation/geocode";
import { createReverseHandler } from "./routes/navigation/reverse";
import { createRouteHandler } from "./routes/navigation/route";
import { handlePlaces } from "./routes/places";
import { createHealthHandler, createStatusHandler } from "./routes/status";

/**
 * Handlers mounted by the web app's `app/api` route files. Each one looks up the running relay on
 * every request.
 */
export const apiHandlers = {
  status: withErrorHandling(() => createStatusHandler(getServerContext().relay)()),
  health: withErrorHandling(() => createHealthHandler(getServerContext())()),
  route: withErrorHandling((request) => createRouteHandler(getServerContext().routing)(request)),
  geocode: withErrorHandling((request) => createGeocodeHandler(getServerContext().routing)(request)),
  reverse: withErrorHandling((request) => createReverseHandler(getServerContext().routing)(request)),
  places: withErrorHandling(handlePlaces),
  notFound: withErrorHandling(async () => jsonError(404, "not_found"))
};

export type { RequestHandler } from "./http/responses";
export { HttpError } from "./http/responses";
export { type ServerContext, getServerContext, setServerContext } from "./context";
