// src/routes/webhook.ts
import express from "express";
import type { MessageDebouncer } from "../ingest/messageDebouncer";
import { parseEvolutionWebhook } from "../whatsapp/evolution";

/**
 * Evolution API `messages.upsert` receiver. Always answers 200 so the
 * gateway does not retry; the body says what happened to the message.
 */
export function createWebhookRouter(debouncer: MessageDebouncer) {
  const webhook = express.Router();

  webhook.post("/", (req, res) => {
    const parsed = parseEvolutionWebhook(req.body);
    if (!parsed.ok) {
      if (parsed.reason === "invalid_payload") {
        console.warn("[WEBHOOK] unrecognised payload", { event: req.body?.event });
      }
      return res.json({ status: "ignored", reason: parsed.reason });
    }

    const { user_id, text, message_id } = parsed.message;
    const status = debouncer.ingest(user_id, text, { messageId: message_id });
    console.log("[WEBHOOK] inbound", { from: user_id, messageId: message_id, status });
    return res.json({ status });
  });

  return webhook;
}
