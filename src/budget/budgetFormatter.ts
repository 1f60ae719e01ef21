// src/budget/budgetFormatter.ts
// pt-BR WhatsApp views. Everything here is pure string building.
import type { BasketLine, Quote, VendorQuote } from "../types";
import { formatMoney } from "./money";

const RULE = "─".repeat(30);

export function keycap(n: number): string {
  return n >= 0 && n <= 9 ? `${n}️⃣` : `${n}.`;
}

// ─────────────────────────────────────────────
// Quote views
// ─────────────────────────────────────────────

export function formatQuoteSummary(quote: Quote): string {
  const cheapest = quote.cheapest_vendor;
  if (!cheapest) return "❌ Nenhuma loja encontrada.";

  const lines = ["📦 *Orçamento Completo:*", ""];
  quote.per_vendor_totals.forEach((v, i) => {
    const total = formatMoney(v.total, quote.currency);
    lines.push(i === 0 ? `🏆 *${v.vendor_name}*: ${total} ⭐` : `🏪 ${v.vendor_name}: ${total}`);
  });

  lines.push("", `💰 *Melhor opção:* ${cheapest.vendor_name}`);
  if (quote.savings_vs_next === null) {
    lines.push("💵 *Economia:* não se aplica (só uma loja tem todos os itens)");
  } else {
    lines.push(`💵 *Economia:* ${formatMoney(quote.savings_vs_next, quote.currency)}`);
  }

  lines.push(
    "",
    "*Escolha uma opção:*",
    `${keycap(1)} Finalizar compra na ${cheapest.vendor_name}`,
    `${keycap(2)} Ver detalhes da ${cheapest.vendor_name}`,
    `${keycap(3)} Ver detalhes de todas as lojas`
  );
  return lines.join("\n");
}

export function formatVendorDetails(vendor: VendorQuote, currency = "BRL"): string {
  const lines = [`🏪 *${vendor.vendor_name}* - ${formatMoney(vendor.total, currency)}:`, ""];
  for (const l of vendor.lines) {
    if (l.quantity > 1) {
      lines.push(
        `• ${l.quantity}x ${l.item_name}: ${formatMoney(l.subtotal, currency)} (${formatMoney(l.unit_price, currency)} cada)`
      );
    } else {
      lines.push(`• ${l.item_name}: ${formatMoney(l.unit_price, currency)}`);
    }
  }
  lines.push("", `💰 *Total:* ${formatMoney(vendor.total, currency)}`);
  return lines.join("\n");
}

export function formatBestDetail(quote: Quote): string {
  const cheapest = quote.cheapest_vendor;
  if (!cheapest) return "❌ Erro: orçamento não encontrado.";
  return [
    formatVendorDetails(cheapest, quote.currency),
    "",
    "*Escolha uma opção:*",
    `${keycap(1)} Finalizar compra`,
    `${keycap(0)} Voltar ao orçamento`,
  ].join("\n");
}

export function formatAllDetails(quote: Quote): string {
  const cheapest = quote.cheapest_vendor;
  if (!cheapest) return "❌ Nenhuma loja encontrada.";

  const lines = ["📋 *Detalhes de Todas as Lojas:*", ""];
  quote.per_vendor_totals.forEach((v, i) => {
    if (i > 0) lines.push("", RULE, "");
    lines.push(formatVendorDetails(v, quote.currency));
  });
  lines.push(
    "",
    RULE,
    "",
    "*Escolha uma opção:*",
    `${keycap(1)} Finalizar compra na ${cheapest.vendor_name}`,
    `${keycap(0)} Voltar ao orçamento`
  );
  return lines.join("\n");
}

// ─────────────────────────────────────────────
// Collecting phase
// ─────────────────────────────────────────────

export function formatClarification(line: BasketLine): string {
  const skipHint = "Digite *pular* para tirar este item do orçamento.";

  if (!line.candidate_offers.length) {
    return [
      `❌ Não encontrei *${line.raw_mention}* em nenhuma loja.`,
      "Descreva de outro jeito ou digite *pular* para tirar este item do orçamento.",
    ].join("\n");
  }

  const head = line.unmatched_specification
    ? `🔎 Não encontrei *${line.category}* "${line.unmatched_specification}". Temos estas opções:`
    : `🔎 Qual *${line.category}* você precisa?`;

  const options = line.candidate_offers.map((o, i) => {
    const tags = o.specification_tags.length ? ` (${o.specification_tags.join(", ")})` : "";
    return `${keycap(i + 1)} ${o.item_name}${tags} - a partir de ${formatMoney(o.unit_price, o.currency)}`;
  });

  return [head, "", ...options, "", "Responda com o número ou a especificação.", skipHint].join("\n");
}

export function formatAdded(lines: BasketLine[]): string | null {
  const named = lines.flatMap((l) => (l.chosen_offer ? [l.chosen_offer.item_name] : []));
  if (!named.length) return null;
  return `✅ Adicionado: ${named.join(", ")}`;
}

export function formatLineDropped(line: BasketLine): string {
  return `🗑️ Removido do orçamento: ${line.raw_mention}`;
}

// ─────────────────────────────────────────────
// Notices
// ─────────────────────────────────────────────

export const GREETING = "Radar ativado 🚨";

export function formatEmptyExtraction(): string {
  return "🤔 Não entendi quais produtos você procura. Pode mandar o nome e a especificação? Ex.: *cimento CP-II 50kg*";
}

export function formatCatalogDegraded(): string {
  return "⚠️ Nosso catálogo está instável agora. Tente de novo em alguns instantes; seu orçamento continua salvo.";
}

export function formatNoEligibleVendor(): string {
  return "😕 Nenhuma loja tem todos os itens do seu pedido. O orçamento foi descartado; tente com menos itens ou outras especificações.";
}

export function formatApology(): string {
  return "❌ Tivemos um problema ao processar sua mensagem. Tente novamente.";
}
