import type { IncomingMessage, RequestListener, ServerResponse } from "http";

export type WebhookHandler = (req: IncomingMessage, res: ServerResponse) => Promise<unknown>;

export const HEALTH_TEXT = "🧾 Ledger bot is running!";

/**
 * HTTP entry for webhook mode: health check on GET, Telegram updates on
 * POST, 405 for anything else.
 */
export function createRequestListener(
  handleWebhook: WebhookHandler,
  webhookSecret?: string
): RequestListener {
  return (req, res) => {
    if (req.method === "GET") {
      res.writeHead(200, { "Content-Type": "text/plain; charset=utf-8" });
      res.end(HEALTH_TEXT);
      return;
    }

    if (req.method === "POST") {
      // Telegram sends X-Telegram-Bot-Api-Secret-Token when secret_token
      // was set via setWebhook. Reject anything else.
      if (webhookSecret) {
        const headerSecret = req.headers["x-telegram-bot-api-secret-token"];
        if (headerSecret !== webhookSecret) {
          console.warn("[Security] Invalid webhook secret. Rejecting request.");
          res.writeHead(401, { "Content-Type": "text/plain" });
          res.end("Unauthorized");
          return;
        }
      }

      handleWebhook(req, res).catch((error: unknown) => {
        console.error("[Server] Unhandled error in webhook handler:", error);
        // 200 so Telegram does not retry the same update forever
        if (!res.headersSent) {
          res.writeHead(200, { "Content-Type": "text/plain" });
          res.end("OK");
        }
      });
      return;
    }

    res.writeHead(405, { "Content-Type": "text/plain" });
    res.end("Method not allowed");
  };
}
