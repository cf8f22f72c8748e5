import { NextResponse } from "next/server";

export class HttpError extends Error {
  readonly status: number;
  readonly code: string;

  constructor(status: number, code: string, message: string = code) {
    super(message);
    this.name = "HttpError";
    this.status = status;
    this.code = code;
  }
}

export type RequestHandler = (request: Request) => Promise<Response>;

type Logger = Pick<Console, "error">;

export const json = (body: unknown, init: ResponseInit = {}) => NextResponse.json(body, init);

export const jsonError = (status: number, error: string) =>
  json({ status: "error", error }, { status });

export async function readJson(request: Request): Promise<unknown> {
  try {
    return await request.json();
  } catch {
    throw new HttpError(400, "invalid_json");
  }
}

/**
 * Maps `HttpError` to its JSON body and anything else to a logged 500.
 */
export function withErrorHandling(handler: RequestHandler, logger: Logger = console): RequestHandler {
  return async (request) => {
    try {
      return await handler(request);
    } catch (error) {
      if (error instanceof HttpError) {
        return jsonError(error.status, error.code);
      }
      const { pathname } = new URL(request.url);
      logger.error(`[Http] ${request.method} ${pathname} failed:`, error);
      return jsonError(500, "internal_error");
    }
  };
}
