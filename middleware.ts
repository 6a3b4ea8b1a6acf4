import type { NextRequest } from "next/server";
import { NextResponse } from "next/server";
import { getConfig } from "@/lib/config";
import { API_KEY_HEADER, API_KEY_ID_HEADER, checkRequest, type GatewayOptions } from "@/lib/gateway/gateway";
import { UsagePlan } from "@/lib/gateway/usage-plan";
import { logger } from "@/lib/logging/logger";

export const config = {
  matcher: ["/query", "/search"],
};

let gateway: GatewayOptions | null = null;

function getGateway(): GatewayOptions {
  if (!gateway) {
    const { gateway: g } = getConfig();
    gateway = {
      apiKeys: g.apiKeys,
      plan: new UsagePlan(g),
      logger: logger.child({ component: "gateway" }),
    };
  }
  return gateway;
}

export async function middleware(req: NextRequest) {
  let opts: GatewayOptions;
  try {
    opts = getGateway();
  } catch (err) {
    logger.error("gateway.config_invalid", { error: err });
    return NextResponse.json({ message: "Internal server error" }, { status: 500 });
  }

  const result = await checkRequest(req, opts);
  if (result.kind === "respond") return result.response;

  // Handlers see which key was used only through its fingerprint
  const headers = new Headers(req.headers);
  headers.delete(API_KEY_HEADER);
  headers.set(API_KEY_ID_HEADER, result.keyId);
  return NextResponse.next({ request: { headers } });
}
