import { HttpsError } from "firebase-functions/v2/https";
import { handleListKids } from "../kids/listKids";
import { handleSeedDemo } from "../seed/seedDemo";
import type { StorageGateway } from "../storage/gateway";
import { handleGetKidTimeline } from "../timeline/getKidTimeline";
import { optionalString, parseBooleanFlag, toHttpsError } from "../utils/errors";
import { handleDiagnostics } from "./diagnostics";

export interface ApiRequest {
  method: string;
  path: string;
  query: Record<string, unknown>;
}

export interface ApiResponse {
  status(code: number): ApiResponse;
  json(body: unknown): unknown;
}

export interface ApiDependencies {
  gateway: StorageGateway;
}

type RouteHandler = (req: ApiRequest, params: string[]) => Promise<unknown>;

interface Route {
  method: "GET" | "POST";
  pattern: RegExp;
  handle: RouteHandler;
}

function buildRoutes({ gateway }: ApiDependencies): Route[] {
  return [
    {
      method: "GET",
      pattern: /^\/$/,
      handle: async () => ({ status: "ok" })
    },
    {
      method: "GET",
      pattern: /^\/test$/,
      handle: () => handleDiagnostics(gateway)
    },
    {
      method: "GET",
      pattern: /^\/api\/hello$/,
      handle: async () => ({ message: "Hello from the backend API!" })
    },
    {
      method: "GET",
      pattern: /^\/api\/kids$/,
      handle: (req) =>
        handleListKids(gateway, {
          grandparent: optionalString(req.query["grandparent"], "grandparent")
        })
    },
    {
      method: "GET",
      pattern: /^\/api\/kids\/([^/]+)\/timeline$/,
      handle: (req, [kidId]) =>
        handleGetKidTimeline(gateway, {
          kidId: decodeSegment(kidId, "kid id"),
          includePrivate: parseBooleanFlag(req.query["include_private"], "include_private"),
          grandparent: optionalString(req.query["grandparent"], "grandparent")
        })
    },
    {
      method: "POST",
      pattern: /^\/api\/seed$/,
      handle: () => handleSeedDemo(gateway)
    }
  ];
}

function decodeSegment(segment: string | undefined, field: string): string {
  try {
    return decodeURIComponent(segment ?? "");
  } catch {
    throw new HttpsError("invalid-argument", `Invalid ${field}`);
  }
}

function trimTrailingSlash(path: string): string {
  return path.length > 1 ? path.replace(/\/+$/, "") : path;
}

export function createApiHandler(deps: ApiDependencies) {
  const routes = buildRoutes(deps);

  return async (req: ApiRequest, res: ApiResponse): Promise<void> => {
    const path = trimTrailingSlash(req.path);

    try {
      for (const route of routes) {
        const match = route.pattern.exec(path);
        if (match && route.method === req.method) {
          const body = await route.handle(req, match.slice(1));
          res.status(200).json(body);
          return;
        }
      }
      throw new HttpsError("not-found", `No route for ${req.method} ${path}`);
    } catch (error) {
      const httpsError = toHttpsError(error);
      res.status(httpsError.httpErrorCode.status).json({ error: httpsError.toJSON() });
    }
  };
}
