import type {
  CreateDesignRequest,
  DesignListResponse,
  DesignStatistics,
  HealthResponse,
  RequestOutcome
} from "@shirtsmith/contracts";

const API_BASE = process.env.NEXT_PUBLIC_API_BASE_URL ?? "/api/v1";

async function readJson<T>(response: Response): Promise<T> {
  return (await response.json()) as T;
}

async function parseResponse<T>(response: Response): Promise<T> {
  if (!response.ok) {
    const text = await response.text();
    throw new Error(text || `Request failed with ${response.status}`);
  }
  return readJson<T>(response);
}

export async function createDesign(payload: CreateDesignRequest): Promise<RequestOutcome> {
  const response = await fetch(`${API_BASE}/requests`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(payload)
  });

  // Failed requests still carry an outcome with friendly text.
  if (!response.ok && response.headers.get("content-type")?.includes("application/json")) {
    return readJson<RequestOutcome>(response);
  }
  return parseResponse<RequestOutcome>(response);
}

export async function listDesigns(userId: string): Promise<DesignListResponse> {
  const response = await fetch(`${API_BASE}/designs?userId=${encodeURIComponent(userId)}`);
  return parseResponse<DesignListResponse>(response);
}

export async function getStats(): Promise<DesignStatistics> {
  const response = await fetch(`${API_BASE}/designs/stats`);
  return parseResponse<DesignStatistics>(response);
}

export async function getHealth(): Promise<HealthResponse> {
  const response = await fetch(`${API_BASE}/health`);
  return parseResponse<HealthResponse>(response);
}
