// src/whatsapp/evolution.ts
import axios, { AxiosInstance } from "axios";
import { z } from "zod";
import { TransportError, errorMessage } from "../errors";

// ─────────────────────────────
// Inbound: Evolution API webhook
// ─────────────────────────────

const WebhookSchema = z.object({
  event: z.string().optional(),
  instance: z.string().optional(),
  data: z
    .object({
      key: z
        .object({
          remoteJid: z.string().optional(),
          fromMe: z.boolean().optional(),
          id: z.string().optional(),
        })
        .passthrough()
        .optional(),
      message: z
        .object({
          conversation: z.string().nullish(),
          extendedTextMessage: z.object({ text: z.string().nullish() }).passthrough().nullish(),
        })
        .passthrough()
        .nullish(),
      messageTimestamp: z.union([z.number(), z.string()]).optional(),
      pushName: z.string().nullish(),
    })
    .passthrough()
    .optional(),
});

export type InboundMessage = {
  user_id: string;
  text: string;
  message_id: string | null;
  push_name: string | null;
};

export type WebhookParseResult =
  | { ok: true; message: InboundMessage }
  | { ok: false; reason: "invalid_payload" | "from_me" | "no_sender" | "no_text" };

export function parseEvolutionWebhook(body: unknown): WebhookParseResult {
  const parsed = WebhookSchema.safeParse(body);
  if (!parsed.success || !parsed.data.data) return { ok: false, reason: "invalid_payload" };

  const data = parsed.data.data;
  if (data.key?.fromMe) return { ok: false, reason: "from_me" };

  const userId = (data.key?.remoteJid || "").split("@")[0]?.trim() || "";
  if (!userId) return { ok: false, reason: "no_sender" };

  const text = (data.message?.conversation ?? data.message?.extendedTextMessage?.text ?? "").trim();
  if (!text) return { ok: false, reason: "no_text" };

  return {
    ok: true,
    message: {
      user_id: userId,
      text,
      message_id: data.key?.id || null,
      push_name: data.pushName || null,
    },
  };
}

// ─────────────────────────────
// Outbound
// ─────────────────────────────

export interface MessageTransport {
  sendText(userId: string, text: string): Promise<void>;
}

export type EvolutionOptions = {
  baseUrl: string;
  apiKey: string;
  instance: string;
  timeoutMs?: number;
  http?: AxiosInstance;
};

export class EvolutionTransport implements MessageTransport {
  private readonly http: AxiosInstance;

  constructor(private readonly opts: EvolutionOptions) {
    this.http = opts.http ?? axios.create();
  }

  async sendText(userId: string, text: string): Promise<void> {
    if (!userId || !text) throw new TransportError("number and text are required");

    const url = `${this.opts.baseUrl}/message/sendText/${this.opts.instance}`;
    try {
      const res = await this.http.post(
        url,
        { number: userId, text },
        {
          headers: { "Content-Type": "application/json", apikey: this.opts.apiKey },
          timeout: this.opts.timeoutMs ?? 10_000,
        }
      );
      console.log("[EVOLUTION] sent", { to: userId, status: res.status });
    } catch (e) {
      console.error("[EVOLUTION][send err]", { to: userId, error: errorMessage(e) });
      throw new TransportError(`send to ${userId} failed: ${errorMessage(e)}`, { cause: e });
    }
  }
}

/** Used when no gateway is configured: replies only reach the log. */
export class LogTransport implements MessageTransport {
  async sendText(userId: string, text: string): Promise<void> {
    console.log("[WA][outbound]", { to: userId, text });
  }
}
