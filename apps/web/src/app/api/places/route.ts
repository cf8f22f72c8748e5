import { apiHandlers } from "@pathsense/relay-server";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export const GET = apiHandlers.places;
