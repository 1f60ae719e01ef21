// src/catalog/inMemoryCatalog.ts
import fs from "fs";
import { z } from "zod";
import type { CatalogOffer } from "../types";
import {
  CatalogGateway,
  QueryOptions,
  filterBySpecification,
  matchesCategory,
} from "./catalogGateway";

const SeedSchema = z.object({
  vendors: z.array(
    z.object({
      id: z.string().min(1),
      name: z.string().min(1),
      phone: z.string().nullable().optional(),
    })
  ),
  offers: z.array(
    z.object({
      vendor_id: z.string().min(1),
      item_name: z.string().min(1),
      category: z.string().min(1),
      specification_tags: z.array(z.string()).default([]),
      unit_price: z.number().positive(),
      currency: z.string().default("BRL"),
    })
  ),
});

export type CatalogSeed = z.input<typeof SeedSchema>;

export function offersFromSeed(seed: unknown): CatalogOffer[] {
  const parsed = SeedSchema.parse(seed);
  const vendors = new Map(parsed.vendors.map((v) => [v.id, v]));

  return parsed.offers.map((o) => {
    const vendor = vendors.get(o.vendor_id);
    if (!vendor) throw new Error(`catalog seed: unknown vendor "${o.vendor_id}"`);
    return Object.freeze({
      vendor_id: vendor.id,
      vendor_name: vendor.name,
      vendor_phone: vendor.phone ?? null,
      item_name: o.item_name,
      category: o.category,
      specification_tags: o.specification_tags,
      unit_price: o.unit_price,
      currency: o.currency,
    });
  });
}

export function loadCatalogSeedFile(path: string): CatalogOffer[] {
  const raw: unknown = JSON.parse(fs.readFileSync(path, "utf8"));
  return offersFromSeed(raw);
}

export class InMemoryCatalogGateway implements CatalogGateway {
  constructor(private readonly offers: readonly CatalogOffer[]) {}

  async query(categoryHint: string, specification?: string | null, opts: QueryOptions = {}): Promise<CatalogOffer[]> {
    opts.signal?.throwIfAborted();
    const inCategory = this.offers.filter((o) => matchesCategory(o, categoryHint));
    return filterBySpecification(inCategory, specification);
  }

  async listCategories(): Promise<string[]> {
    return Array.from(new Set(this.offers.map((o) => o.category))).sort();
  }

  async getVendorPhone(vendorId: string): Promise<string | null> {
    return this.offers.find((o) => o.vendor_id === vendorId)?.vendor_phone ?? null;
  }
}
