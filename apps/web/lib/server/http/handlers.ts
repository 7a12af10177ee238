import { NextResponse } from "next/server";
import { z } from "zod";
import type {
  DesignListResponse,
  DesignStatistics,
  HealthResponse,
  RequestOutcome
} from "@shirtsmith/contracts";
import { ConfigError } from "../config";
import { FulfillmentError } from "../fulfillment/errors";
import { matchesTrigger } from "../intent/triggers";
import { createLogger } from "../logger";
import type { DesignService } from "../service";

export type ServiceProvider = () => DesignService;

const CreateDesignSchema = z.object({
  message: z.string().trim().min(1, "must not be empty").max(2000),
  userId: z.string().trim().min(1, "must not be empty").max(200),
  displayName: z.string().trim().min(1, "must not be empty").max(100)
});

const fallbackLogger = createLogger({ bindings: { service: "shirtsmith" } });

function badRequest(message: string): NextResponse {
  return new NextResponse(message, { status: 400 });
}

function serviceFor(provide: ServiceProvider): DesignService | NextResponse {
  try {
    return provide();
  } catch (error) {
    if (error instanceof ConfigError) {
      fallbackLogger.error("service.misconfigured", { issues: error.issues });
      return new NextResponse("The design service is not configured.", { status: 500 });
    }
    throw error;
  }
}

function vendorFailure(service: DesignService, event: string, error: unknown): NextResponse {
  service.logger.error(event, {
    error,
    ...(error instanceof FulfillmentError ? { status: error.status, vendorBody: error.body } : {})
  });
  return new NextResponse("The print shop could not be reached.", { status: 502 });
}

export function outcomeStatus(outcome: RequestOutcome): number {
  if (outcome.success) {
    return 201;
  }
  return outcome.errorKind === "fulfillment_failure" ? 502 : 500;
}

export async function createDesign(request: Request, provide: ServiceProvider): Promise<NextResponse> {
  let payload: unknown;
  try {
    payload = await request.json();
  } catch {
    return badRequest("Invalid JSON body.");
  }

  const parsed = CreateDesignSchema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return badRequest(issue ? `Field '${issue.path.join(".")}' ${issue.message}.` : "Invalid request body.");
  }

  const service = serviceFor(provide);
  if (service instanceof NextResponse) {
    return service;
  }

  const { message, userId, displayName } = parsed.data;
  if (!matchesTrigger(message, service.config.triggerKeywords)) {
    return new NextResponse(
      `Mention one of: ${service.config.triggerKeywords.join(", ")}.`,
      { status: 422 }
    );
  }

  const outcome = await service.orchestrator.handleRequest(message, userId, displayName, {
    signal: request.signal
  });
  return NextResponse.json<RequestOutcome>(outcome, { status: outcomeStatus(outcome) });
}

export async function listDesigns(request: Request, provide: ServiceProvider): Promise<NextResponse> {
  const service = serviceFor(provide);
  if (service instanceof NextResponse) {
    return service;
  }

  const userId = new URL(request.url).searchParams.get("userId")?.trim();
  try {
    const designs = userId
      ? await service.history.designsForUser(userId, { signal: request.signal })
      : await service.history.allDesigns({ signal: request.signal });
    return NextResponse.json<DesignListResponse>({ designs });
  } catch (error) {
    return vendorFailure(service, "history.list_failed", error);
  }
}

export async function designStatistics(request: Request, provide: ServiceProvider): Promise<NextResponse> {
  const service = serviceFor(provide);
  if (service instanceof NextResponse) {
    return service;
  }

  try {
    return NextResponse.json<DesignStatistics>(await service.history.statistics({ signal: request.signal }));
  } catch (error) {
    return vendorFailure(service, "history.stats_failed", error);
  }
}

export async function health(provide: ServiceProvider): Promise<NextResponse> {
  const service = serviceFor(provide);
  if (service instanceof NextResponse) {
    return service;
  }

  const connected = await service.fulfillment.verify();
  return NextResponse.json<HealthResponse>({ vendor: service.fulfillment.vendor, connected });
}
