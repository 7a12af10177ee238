import type { NextResponse } from "next/server";
import { health } from "../../../../lib/server/http/handlers";
import { getDesignService } from "../../../../lib/server/service";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET(): Promise<NextResponse> {
  return health(getDesignService);
}
