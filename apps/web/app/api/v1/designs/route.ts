import type { NextResponse } from "next/server";
import { listDesigns } from "../../../../lib/server/http/handlers";
import { getDesignService } from "../../../../lib/server/service";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET(request: Request): Promise<NextResponse> {
  return listDesigns(request, getDesignService);
}
