export const DESIGN_STYLES = [
  "modern",
  "retro",
  "bold",
  "script",
  "graffiti",
  "vintage",
  "minimal"
] as const;

export type DesignStyle = (typeof DESIGN_STYLES)[number];

export const DEFAULT_STYLE: DesignStyle = "modern";

export const MAX_PHRASE_LENGTH = 100;

export const PLACEHOLDER_PHRASE = "Custom";

export interface DesignRequest {
  readonly phrase: string;
  readonly style: DesignStyle;
  readonly wantsImage: boolean;
  readonly imageDescription: string | null;
  readonly colorPreference: string | null;
}

export interface TextLayout {
  fontSize: number;
  lines: string[];
  lineHeight: number;
  blockWidth: number;
  blockHeight: number;
}

export interface RenderedDesign {
  imageBytes: Uint8Array;
  format: "png";
  width: number;
  height: number;
  layout: TextLayout;
  localReference?: string;
}

export type OrderStatus = "pending" | "in_progress" | "complete" | "failed";

export type FulfillmentVendor = "printify" | "prodigi";

export interface FulfillmentOrder {
  orderId: string;
  externalReference: string;
  displayName: string;
  orderUrl: string;
  price?: number;
  currency?: string;
  status: OrderStatus;
  createdAt?: string;
}

export interface OrderPage {
  orders: FulfillmentOrder[];
  nextCursor: string | null;
}

export interface DesignStatistics {
  totalCount: number;
  distinctUserCount: number;
  perUserAverage: number;
  latestDesign: FulfillmentOrder | null;
}

export type ErrorKind = "render_failure" | "fulfillment_failure" | "internal_error";

export type RequestStage = "received" | "parsed" | "rendered" | "submitted" | "done" | "failed";

export interface RequestOutcome {
  success: boolean;
  stage: RequestStage;
  responseText: string;
  orderUrl?: string;
  orderId?: string;
  errorKind?: ErrorKind;
  phrase?: string;
}

export interface CreateDesignRequest {
  message: string;
  userId: string;
  displayName: string;
}

export interface DesignListResponse {
  designs: FulfillmentOrder[];
}

export interface HealthResponse {
  vendor: FulfillmentVendor;
  connected: boolean;
}

export const STAGE_LABELS = [
  "Reading your request",
  "Drawing the design",
  "Sending it to the print shop",
  "Fetching your link"
] as const;
