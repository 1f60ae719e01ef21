// src/ai/itemExtractor.ts
import OpenAI from "openai";
import { z } from "zod";
import { zodTextFormat } from "openai/helpers/zod";
import { normalizeText } from "../catalog/catalogGateway";
import { errorMessage } from "../errors";
import { TURN_DELIMITER } from "../ingest/messageDebouncer";
import type { ItemRequest, Turn } from "../types";

export type ExtractionContext = {
  recent: Turn[]; // newest first, as the turn store returns them
  categories: string[]; // known catalog categories, may be empty
};

export interface ItemExtractor {
  extract(text: string, ctx: ExtractionContext): Promise<ItemRequest[]>;
}

// ─────────────────────────────────────────────
// Rules extractor (offline / fallback)
// ─────────────────────────────────────────────

const QUANTITY_PREFIX =
  /^(\d{1,4})(?:\s*x)?\s+(?:(?:sacos?|unidades?|latas?|pe[cç]as?|barras?)\s+)?(?:de\s+)?/i;

function splitMentions(text: string): string[] {
  return String(text || "")
    .split(TURN_DELIMITER)
    .flatMap((line) => line.split(/[,;]/))
    .map((s) => s.trim())
    .filter(Boolean);
}

function findCategory(normalized: string, categories: string[]): string | null {
  let best: string | null = null;
  for (const category of categories) {
    const key = normalizeText(category);
    if (!key || !normalized.includes(key)) continue;
    if (!best || key.length > normalizeText(best).length) best = category;
  }
  return best;
}

/**
 * One request per line (or comma-separated mention). A line naming no known
 * category is read as the specification of the request right before it, so
 * "cimento" followed by "CP-II" becomes a single request.
 */
export class RuleItemExtractor implements ItemExtractor {
  async extract(text: string, ctx: ExtractionContext): Promise<ItemRequest[]> {
    const out: ItemRequest[] = [];

    for (const mention of splitMentions(text)) {
      const qty = QUANTITY_PREFIX.exec(mention);
      const body = qty ? mention.slice(qty[0].length).trim() : mention;
      const normalized = normalizeText(body);
      if (!normalized) continue;

      if (!ctx.categories.length) {
        out.push({
          raw_mention: mention,
          category_hint: body,
          specification: null,
          quantity: qty ? Number(qty[1]) : undefined,
        });
        continue;
      }

      const category = findCategory(normalized, ctx.categories);
      if (!category) {
        const prev = out[out.length - 1];
        if (prev && !prev.specification) {
          prev.specification = body;
          prev.raw_mention = `${prev.raw_mention} ${mention}`;
        }
        continue;
      }

      const rest = normalized.replace(normalizeText(category), " ").replace(/\s+/g, " ").trim();
      out.push({
        raw_mention: mention,
        category_hint: category,
        specification: rest || null,
        quantity: qty ? Number(qty[1]) : undefined,
      });
    }

    return out;
  }
}

// ─────────────────────────────────────────────
// OpenAI extractor
// ─────────────────────────────────────────────

export const ExtractionSchema = z.object({
  items: z.array(
    z.object({
      raw_mention: z.string(), // the user's words for this item
      category_hint: z.string(), // product family, e.g. "cimento"
      specification: z.string().nullable(), // e.g. "CP-II 50kg"
      quantity: z.number().int().nullable(),
    })
  ),
});

export type Extraction = z.infer<typeof ExtractionSchema>;

export type ExtractionPrompt = {
  system: string;
  user: string;
};

/** The one call into the model; swapped for a stub in tests. */
export type ExtractionCall = (prompt: ExtractionPrompt) => Promise<Extraction | null>;

export function openAIExtractionCall(client: OpenAI, model: string): ExtractionCall {
  return async ({ system, user }) => {
    const response = await client.responses.parse({
      model,
      input: [
        { role: "system", content: system },
        { role: "user", content: user },
      ],
      text: {
        format: zodTextFormat(ExtractionSchema, "item_requests"),
      },
    });
    return response.output_parsed;
  };
}

const SYSTEM_PROMPT = `
You extract construction-material purchase requests from Brazilian Portuguese WhatsApp messages.

Return one item per product the customer wants priced, in the order they were mentioned:
- raw_mention: the customer's own words for that item.
- category_hint: the product family. Prefer one of KNOWN_CATEGORIES when it fits.
- specification: type, size, grade or capacity the customer stated (e.g. "CP-II", "50kg", "1000L"), else null.
- quantity: units requested when stated, else null.

Lines of the latest message may continue each other ("cimento" then "CP-II" is one item).
Never invent items, specifications or quantities. Greetings and small talk yield an empty list.
`;

export function buildExtractionPrompt(text: string, ctx: ExtractionContext): ExtractionPrompt {
  const history = ctx.recent
    .slice()
    .reverse()
    .map((t) => `${t.role.toUpperCase()}: ${t.content}`)
    .join("\n");

  const user = `
KNOWN_CATEGORIES: ${ctx.categories.length ? ctx.categories.join(", ") : "unknown"}

RECENT_CONVERSATION (oldest first):
${history || "(none)"}

LATEST_MESSAGE:
"""${text}"""
`;
  return { system: SYSTEM_PROMPT, user };
}

function toItemRequests(extraction: Extraction): ItemRequest[] {
  return extraction.items.flatMap((it) => {
    const category = it.category_hint.trim();
    if (!category) return [];
    return [
      {
        raw_mention: it.raw_mention.trim() || category,
        category_hint: category,
        specification: it.specification?.trim() || null,
        quantity: it.quantity && it.quantity > 0 ? it.quantity : undefined,
      },
    ];
  });
}

/**
 * Model-backed extraction. Any model failure (network, refusal, unparsable
 * output) falls back to the rules extractor for that turn.
 */
export class OpenAIItemExtractor implements ItemExtractor {
  constructor(
    private readonly call: ExtractionCall,
    private readonly fallback: ItemExtractor = new RuleItemExtractor()
  ) {}

  async extract(text: string, ctx: ExtractionContext): Promise<ItemRequest[]> {
    try {
      const parsed = await this.call(buildExtractionPrompt(text, ctx));
      if (!parsed) {
        console.warn("[EXTRACT] model returned nothing parsable, using rules");
        return this.fallback.extract(text, ctx);
      }
      const requests = toItemRequests(parsed);
      console.log("[EXTRACT] model items", { count: requests.length });
      return requests;
    } catch (err) {
      console.error("[EXTRACT] LLM failed, falling back:", errorMessage(err));
      return this.fallback.extract(text, ctx);
    }
  }
}
