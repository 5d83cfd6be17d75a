import { NextRequest, NextResponse } from "next/server";

/**
 * API key gate for /api/*.
 *
 * Accepted from the `X-API-Key` header, an `Authorization: Bearer` header or
 * the `apiKey` query parameter, in that order. With `API_KEY` unset every
 * request passes (local development).
 */
export function middleware(request: NextRequest) {
  const apiKey = process.env.API_KEY;
  if (!apiKey) {
    return NextResponse.next();
  }

  const provided = readApiKey(request);
  if (!provided) {
    return unauthorized(
      "Missing API key. Provide via X-API-Key header, Bearer token or apiKey query parameter."
    );
  }

  if (!timingSafeEqual(provided, apiKey)) {
    return unauthorized("Invalid API key.");
  }

  return NextResponse.next();
}

function readApiKey(request: NextRequest): string | null {
  const header = request.headers.get("x-api-key");
  if (header) return header;

  const authorization = request.headers.get("authorization");
  const bearer = authorization?.match(/^Bearer\s+(.+)$/i);
  if (bearer) return bearer[1].trim();

  return request.nextUrl.searchParams.get("apiKey");
}

function unauthorized(message: string) {
  return NextResponse.json({ error: { code: "UNAUTHORIZED", message } }, { status: 401 });
}

/**
 * Constant-time comparison; the edge runtime has no node:crypto.
 * Length differences still walk the whole provided key.
 */
function timingSafeEqual(provided: string, expected: string): boolean {
  let diff = provided.length ^ expected.length;
  for (let i = 0; i < provided.length; i++) {
    diff |= provided.charCodeAt(i) ^ expected.charCodeAt(i % expected.length);
  }
  return diff === 0;
}

export const config = {
  matcher: "/api/:path*",
};
