import type { DesignRequest } from "@shirtsmith/contracts";

export type IntentSource = "llm" | "fallback";

export interface ExtractOptions {
  signal?: AbortSignal;
}

/**
 * One way of turning a chat message into a design request. Returning `null`
 * hands the message to the next strategy in line.
 */
export interface IntentStrategy {
  readonly source: IntentSource;
  extract(message: string, options: ExtractOptions): Promise<DesignRequest | null>;
}
