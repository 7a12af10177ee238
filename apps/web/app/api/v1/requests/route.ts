import type { NextResponse } from "next/server";
import { createDesign } from "../../../../lib/server/http/handlers";
import { getDesignService } from "../../../../lib/server/service";

export const runtime = "nodejs";

export async function POST(request: Request): Promise<NextResponse> {
  return createDesign(request, getDesignService);
}
