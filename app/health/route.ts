// app/health/route.ts
import { checkHealth } from "@/lib/rag/health";
import { getRagService } from "@/lib/rag/service";
import { errorMessage } from "@/lib/errors";
import { jsonResponse } from "@/lib/server/http";
import { genRequestId } from "@/lib/server/reqid";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET() {
  const reqId = genRequestId();
  const t0 = Date.now();
  try {
    const { config, index } = getRagService();
    const report = await checkHealth(config, index);
    return jsonResponse(200, report, { requestId: reqId, startedAt: t0 });
  } catch (err) {
    return jsonResponse(500, { ok: false, error: errorMessage(err) }, { requestId: reqId, startedAt: t0 });
  }
}
