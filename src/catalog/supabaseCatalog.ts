// src/catalog/supabaseCatalog.ts
import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import { CatalogUnavailableError } from "../errors";
import type { CatalogOffer } from "../types";
import {
  CatalogGateway,
  QueryOptions,
  filterBySpecification,
  matchesCategory,
} from "./catalogGateway";

/**
 * Tables (see sql/catalog.sql):
 *  - vendors(id text pk, name text, phone text)
 *  - catalog_offers(id uuid pk, vendor_id text fk, item_name text, category text,
 *                   specification_tags text[], unit_price numeric, currency text, active bool)
 */
const OFFER_COLUMNS =
  "vendor_id, item_name, category, specification_tags, unit_price, currency, vendors(name, phone)";

const VendorJoinSchema = z.object({
  name: z.string(),
  phone: z.string().nullable().optional(),
});

const OfferRowSchema = z.object({
  vendor_id: z.string(),
  item_name: z.string(),
  category: z.string(),
  specification_tags: z.array(z.string()).nullable().optional(),
  unit_price: z.coerce.number().positive(),
  currency: z.string().nullable().optional(),
  // PostgREST returns a to-one embed as an object, some setups as a 1-element array
  vendors: z.union([VendorJoinSchema, z.array(VendorJoinSchema)]).nullable(),
});

export function offerFromRow(row: unknown): CatalogOffer | null {
  const parsed = OfferRowSchema.safeParse(row);
  if (!parsed.success) {
    console.warn("[CATALOG] skipping malformed row", parsed.error.issues[0]?.message);
    return null;
  }
  const r = parsed.data;
  const vendor = Array.isArray(r.vendors) ? r.vendors[0] : r.vendors;

  return {
    vendor_id: r.vendor_id,
    vendor_name: vendor?.name || r.vendor_id,
    vendor_phone: vendor?.phone ?? null,
    item_name: r.item_name,
    category: r.category,
    specification_tags: r.specification_tags ?? [],
    unit_price: r.unit_price,
    currency: r.currency || "BRL",
  };
}

// PostgREST filter syntax reserves these inside or()/ilike
function sanitizeForFilter(text: string): string {
  return text.replace(/[,()%*\\]/g, " ").trim();
}

export class SupabaseCatalogGateway implements CatalogGateway {
  constructor(private readonly supa: SupabaseClient) {}

  async query(categoryHint: string, specification?: string | null, opts: QueryOptions = {}): Promise<CatalogOffer[]> {
    const hint = sanitizeForFilter(categoryHint);
    if (!hint) return [];

    let req = this.supa
      .from("catalog_offers")
      .select(OFFER_COLUMNS)
      .eq("active", true)
      .or(`category.ilike.%${hint}%,item_name.ilike.%${hint}%`)
      .limit(200);
    if (opts.signal) req = req.abortSignal(opts.signal);

    const { data, error } = await req;
    if (error) {
      console.warn("[CATALOG] query error", { categoryHint, error: error.message });
      throw new CatalogUnavailableError(`catalog query failed: ${error.message}`, { cause: error });
    }

    const offers = (data ?? [])
      .map(offerFromRow)
      .filter((o): o is CatalogOffer => o !== null)
      // ilike is accent-sensitive; keep the shared matcher as the final word
      .filter((o) => matchesCategory(o, categoryHint));

    return filterBySpecification(offers, specification);
  }

  async listCategories(opts: QueryOptions = {}): Promise<string[]> {
    let req = this.supa.from("catalog_offers").select("category").eq("active", true);
    if (opts.signal) req = req.abortSignal(opts.signal);

    const { data, error } = await req;
    if (error) {
      throw new CatalogUnavailableError(`category listing failed: ${error.message}`, { cause: error });
    }
    const names = z.array(z.object({ category: z.string() })).parse(data ?? []);
    return Array.from(new Set(names.map((r) => r.category))).sort();
  }

  async getVendorPhone(vendorId: string, opts: QueryOptions = {}): Promise<string | null> {
    let req = this.supa.from("vendors").select("phone").eq("id", vendorId).limit(1);
    if (opts.signal) req = req.abortSignal(opts.signal);

    const { data, error } = await req;
    if (error) {
      throw new CatalogUnavailableError(`vendor lookup failed: ${error.message}`, { cause: error });
    }
    const rows = z.array(z.object({ phone: z.string().nullable() })).parse(data ?? []);
    return rows[0]?.phone ?? null;
  }
}
