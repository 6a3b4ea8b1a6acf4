// app/search/route.ts
// Retrieval only: nearest chunks for a question, no generation.
import { NextRequest } from "next/server";
import { handleSearch } from "@/lib/rag/handler";
import { getRagService } from "@/lib/rag/service";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function POST(req: NextRequest) {
  return handleSearch(req, getRagService);
}
