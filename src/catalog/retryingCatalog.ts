// src/catalog/retryingCatalog.ts
import { CatalogUnavailableError, errorMessage } from "../errors";
import type { CatalogOffer } from "../types";
import { Scheduler, sleep } from "../util/clock";
import type { CatalogGateway, QueryOptions } from "./catalogGateway";

export type RetryOptions = {
  backoffMs: number;
  scheduler: Scheduler;
  // shutdown signal, used when a call brings none of its own
  signal?: AbortSignal;
};

/** One retry after `backoffMs`, then CatalogUnavailableError. */
export class RetryingCatalogGateway implements CatalogGateway {
  constructor(
    private readonly inner: CatalogGateway,
    private readonly opts: RetryOptions
  ) {}

  query(categoryHint: string, specification?: string | null, opts: QueryOptions = {}): Promise<CatalogOffer[]> {
    return this.withRetry("query", opts, (o) => this.inner.query(categoryHint, specification, o));
  }

  listCategories(opts: QueryOptions = {}): Promise<string[]> {
    return this.withRetry("listCategories", opts, (o) => this.inner.listCategories(o));
  }

  getVendorPhone(vendorId: string, opts: QueryOptions = {}): Promise<string | null> {
    return this.withRetry("getVendorPhone", opts, (o) => this.inner.getVendorPhone(vendorId, o));
  }

  private async withRetry<T>(
    operation: string,
    opts: QueryOptions,
    run: (opts: QueryOptions) => Promise<T>
  ): Promise<T> {
    const signal = opts.signal ?? this.opts.signal;

    try {
      return await run({ signal });
    } catch (first) {
      if (signal?.aborted) throw first;
      console.warn(`[CATALOG][${operation}] failed, retrying in ${this.opts.backoffMs}ms`, errorMessage(first));
    }

    await sleep(this.opts.scheduler, this.opts.backoffMs, signal);

    try {
      return await run({ signal });
    } catch (second) {
      if (signal?.aborted) throw second;
      console.error(`[CATALOG][${operation}] failed after retry`, errorMessage(second));
      if (second instanceof CatalogUnavailableError) throw second;
      throw new CatalogUnavailableError(`catalog ${operation} failed: ${errorMessage(second)}`, {
        cause: second,
      });
    }
  }
}
