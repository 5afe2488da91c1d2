import { Request, Response, NextFunction } from "express";
import { Tenant } from "../types/tenant";
import { getTenantByApiKey, isSupabaseConfigured } from "../db/tenants";
import { config } from "../config";

// Extend Express Request to include tenant context
declare global {
  namespace Express {
    interface Request {
      tenant?: Tenant;
    }
  }
}

// Used when Supabase isn't configured (dev mode)
export const DEVELOPMENT_TENANT: Tenant = {
  id: "00000000-0000-0000-0000-000000000000",
  name: "Development Tenant",
  api_key: "dev-api-key",
  is_active: true,
  created_at: "1970-01-01T00:00:00.000Z",
  updated_at: "1970-01-01T00:00:00.000Z",
};

export type TenantResolution =
  | { ok: true; tenant: Tenant }
  | { ok: false; status: 401 | 403; error: string };

/**
 * Middleware to authenticate the caller via API key.
 * Looks for key in: X-API-Key header, Authorization Bearer, or ?api_key query param
 */
export async function tenantAuth(req: Request, res: Response, next: NextFunction) {
  try {
    const resolution = await resolveTenant(extractApiKey(req));

    if (!resolution.ok) {
      return res.status(resolution.status).json({ error: resolution.error });
    }

    req.tenant = resolution.tenant;
    next();
  } catch (error) {
    const message = error instanceof Error ? error.message : "Auth error";
    console.error(`[tenantAuth] Error:`, message);
    return res.status(500).json({ error: message });
  }
}

/**
 * Decide which tenant an API key belongs to. Without Supabase every caller
 * is the development tenant.
 */
export async function resolveTenant(apiKey: string | null): Promise<TenantResolution> {
  if (!isSupabaseConfigured()) {
    if (config.logLevel === "debug") {
      console.log(`[tenantAuth] Supabase not configured, using development tenant`);
    }
    return { ok: true, tenant: DEVELOPMENT_TENANT };
  }

  if (!apiKey) {
    return {
      ok: false,
      status: 401,
      error: "Missing API key. Provide via X-API-Key header, Authorization Bearer, or api_key query param",
    };
  }

  const tenant = await getTenantByApiKey(apiKey);
  if (!tenant) {
    return { ok: false, status: 401, error: "Invalid API key" };
  }
  if (!tenant.is_active) {
    return { ok: false, status: 403, error: "Tenant account is inactive" };
  }

  if (config.logLevel === "debug") {
    console.log(`[tenantAuth] Authenticated tenant: ${tenant.name} (${tenant.id})`);
  }
  return { ok: true, tenant };
}

export function extractApiKey(req: Pick<Request, "headers" | "query">): string | null {
  // 1. X-API-Key header
  const headerKey = req.headers["x-api-key"];
  if (typeof headerKey === "string" && headerKey) {
    return headerKey;
  }

  // 2. Authorization: Bearer <key>
  const authHeader = req.headers.authorization;
  if (authHeader?.startsWith("Bearer ")) {
    return authHeader.slice(7);
  }

  // 3. Query param
  const queryKey = req.query.api_key;
  if (typeof queryKey === "string" && queryKey) {
    return queryKey;
  }

  return null;
}
