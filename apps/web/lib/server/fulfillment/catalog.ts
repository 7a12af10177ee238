import type { DesignStatistics, FulfillmentOrder, OrderPage } from "@shirtsmith/contracts";
import type { Logger } from "../logger";
import type { FulfillmentClient, ListOptions } from "./client";
import { belongsToUser, decodeReference } from "./reference";

export const MAX_PAGES = 200;

export interface CatalogOptions extends ListOptions {
  maxPages?: number;
  logger?: Logger;
}

export async function listAllOrders(
  client: FulfillmentClient,
  options: CatalogOptions = {}
): Promise<FulfillmentOrder[]> {
  const { maxPages = MAX_PAGES, logger, signal } = options;
  const orders: FulfillmentOrder[] = [];
  const seenCursors = new Set<string>();
  let cursor: string | null = null;

  for (let page = 0; ; page += 1) {
    if (page >= maxPages) {
      logger?.warn("history.truncated", { pages: page, orders: orders.length, nextCursor: cursor });
      break;
    }

    const result: OrderPage = await client.list(cursor, { signal });
    if (result.orders.length === 0) {
      break;
    }
    orders.push(...result.orders);

    if (!result.nextCursor || seenCursors.has(result.nextCursor)) {
      break;
    }
    seenCursors.add(result.nextCursor);
    cursor = result.nextCursor;
  }

  return orders;
}

export async function searchByReferencePrefix(
  client: FulfillmentClient,
  prefix: string,
  userId: string,
  options: CatalogOptions = {}
): Promise<FulfillmentOrder[]> {
  const orders = await listAllOrders(client, options);
  return orders.filter((order) => belongsToUser(order.externalReference, prefix, userId));
}

export function summarise(orders: FulfillmentOrder[], prefix: string): DesignStatistics {
  const users = new Set<string>();
  let attributed = 0;

  for (const order of orders) {
    const decoded = decodeReference(order.externalReference, prefix);
    if (decoded) {
      users.add(decoded.userId);
      attributed += 1;
    }
  }

  return {
    totalCount: orders.length,
    distinctUserCount: users.size,
    perUserAverage: users.size > 0 ? attributed / users.size : 0,
    latestDesign: orders[0] ?? null
  };
}

export async function collectStats(
  client: FulfillmentClient,
  prefix: string,
  options: CatalogOptions = {}
): Promise<DesignStatistics> {
  return summarise(await listAllOrders(client, options), prefix);
}
