import type { DesignStatistics, FulfillmentOrder } from "@shirtsmith/contracts";
import {
  collectStats,
  listAllOrders,
  MAX_PAGES,
  searchByReferencePrefix,
  type CatalogOptions
} from "../fulfillment/catalog";
import type { FulfillmentClient, ListOptions } from "../fulfillment/client";
import type { Logger } from "../logger";

/**
 * Design history rebuilt from the vendor's own listing. Holds no state of its
 * own, so two calls against an unchanged store return the same designs.
 */
export class DesignHistoryIndex {
  private readonly logger: Logger;

  constructor(
    private readonly client: FulfillmentClient,
    private readonly referencePrefix: string,
    logger: Logger,
    private readonly maxPages: number = MAX_PAGES
  ) {
    this.logger = logger.child({ component: "history" });
  }

  private catalogOptions(options: ListOptions): CatalogOptions {
    return { signal: options.signal, maxPages: this.maxPages, logger: this.logger };
  }

  async designsForUser(userId: string, options: ListOptions = {}): Promise<FulfillmentOrder[]> {
    const designs = await searchByReferencePrefix(this.client, this.referencePrefix, userId, this.catalogOptions(options));
    this.logger.debug("history.user_designs", { userId, count: designs.length });
    return designs;
  }

  async allDesigns(options: ListOptions = {}): Promise<FulfillmentOrder[]> {
    const designs = await listAllOrders(this.client, this.catalogOptions(options));
    this.logger.debug("history.all_designs", { count: designs.length });
    return designs;
  }

  async statistics(options: ListOptions = {}): Promise<DesignStatistics> {
    const stats = await collectStats(this.client, this.referencePrefix, this.catalogOptions(options));
    this.logger.debug("history.statistics", { totalCount: stats.totalCount, users: stats.distinctUserCount });
    return stats;
  }
}
