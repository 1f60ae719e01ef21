// src/budget/purchaseFinalizer.ts
import { DateTime } from "luxon";
import type { CatalogGateway, QueryOptions } from "../catalog/catalogGateway";
import { errorMessage } from "../errors";
import type { Quote, QuoteLine, VendorQuote } from "../types";
import { buildWaMeLink, normalizePhone } from "../util/phone";
import { formatMoney } from "./money";

export type FinalizedPurchase = {
  vendor: VendorQuote;
  vendor_phone: string | null;
  customer_message: string;
  store_message: string;
  // wa.me link with store_message pre-filled; null without a vendor phone
  store_link: string | null;
};

function customerProductLines(lines: QuoteLine[], currency: string): string {
  return lines
    .map((l) =>
      l.quantity > 1
        ? `• ${l.quantity}x ${l.item_name}: ${formatMoney(l.subtotal, currency)} (${formatMoney(l.unit_price, currency)} cada)`
        : `• ${l.item_name}: ${formatMoney(l.unit_price, currency)}`
    )
    .join("\n");
}

function storeProductLines(lines: QuoteLine[], currency: string): string {
  return lines
    .flatMap((l) => [
      `• ${l.quantity}x ${l.item_name}`,
      `  Valor unitário: ${formatMoney(l.unit_price, currency)}`,
      `  Subtotal: ${formatMoney(l.subtotal, currency)}`,
    ])
    .join("\n");
}

export function buildStoreMessage(
  vendor: VendorQuote,
  customerId: string,
  currency: string,
  at: Date,
  timezone: string
): string {
  const when = DateTime.fromJSDate(at).setZone(timezone).toFormat("dd/MM/yyyy 'às' HH:mm");
  return [
    "🛒 *NOVO ORÇAMENTO - RADAR*",
    "",
    `📅 *Data:* ${when}`,
    `📞 *Cliente:* ${customerId}`,
    "",
    "📦 *PRODUTOS SOLICITADOS:*",
    storeProductLines(vendor.lines, currency),
    "",
    `💰 *VALOR TOTAL: ${formatMoney(vendor.total, currency)}*`,
    "",
    "Por favor, entre em contato com o cliente para confirmar valores, entrega e disponibilidade.",
  ].join("\n");
}

export function buildCustomerMessage(vendor: VendorQuote, currency: string, storeLink: string | null): string {
  const total = formatMoney(vendor.total, currency);
  const parts = [
    "✅ *Pedido Confirmado!*",
    "",
    `🏪 Loja: ${vendor.vendor_name}`,
    "",
    "📋 *Produtos:*",
    customerProductLines(vendor.lines, currency),
    "",
    `💰 *Valor Total: ${total}*`,
    "",
    `📞 A loja ${vendor.vendor_name} vai confirmar valores, entrega e forma de pagamento.`,
  ];
  if (storeLink) {
    parts.push("", "🔗 *Envie o pedido para a loja:*", storeLink);
  }
  parts.push("", "Obrigado pela preferência! 🎉");
  return parts.join("\n");
}

/**
 * Closes a quote on its cheapest vendor. A missing or failing phone lookup
 * only drops the link; it never blocks the confirmation.
 */
export class PurchaseFinalizer {
  constructor(
    private readonly catalog: CatalogGateway,
    private readonly timezone: string
  ) {}

  async finalize(userId: string, quote: Quote, at: Date, opts: QueryOptions = {}): Promise<FinalizedPurchase> {
    const vendor = quote.cheapest_vendor;
    if (!vendor) throw new Error("finalize: quote has no eligible vendor");

    const phone = normalizePhone(vendor.vendor_phone) ?? (await this.lookupPhone(vendor.vendor_id, opts));
    const store_message = buildStoreMessage(vendor, userId, quote.currency, at, this.timezone);
    const store_link = phone ? buildWaMeLink(phone, store_message) : null;

    console.log("[FINALIZE] purchase closed", {
      userId,
      vendor: vendor.vendor_id,
      total: vendor.total,
      hasLink: !!store_link,
    });

    return {
      vendor,
      vendor_phone: phone,
      customer_message: buildCustomerMessage(vendor, quote.currency, store_link),
      store_message,
      store_link,
    };
  }

  private async lookupPhone(vendorId: string, opts: QueryOptions): Promise<string | null> {
    try {
      return normalizePhone(await this.catalog.getVendorPhone(vendorId, opts));
    } catch (e) {
      console.warn("[FINALIZE][phone lookup err]", { vendorId, error: errorMessage(e) });
      return null;
    }
  }
}
