import { apiHandlers } from "@pathsense/relay-server";

export const runtime = "nodejs";

export const POST = apiHandlers.route;
