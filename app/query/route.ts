// app/query/route.ts
import { NextRequest } from "next/server";
import { handleQuery } from "@/lib/rag/handler";
import { getRagService } from "@/lib/rag/service";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function POST(req: NextRequest) {
  return handleQuery(req, getRagService);
}
