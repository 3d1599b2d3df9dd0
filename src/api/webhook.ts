import { Router } from "express";
import type { Logger } from "pino";
import type { CallDesk } from "../services/calls.js";
import { Unauthorized } from "../core/errors.js";
import { parseInput } from "../core/validate.js";
import { safeEqual } from "../auth/token.js";
import { WebhookSchema, callIdOf, dialedNumber, toCallReport } from "../voice/events.js";
import { bindRequestId, requestIdOf, route } from "./http.js";

/**
 * Voice vendor server messages. Only the end-of-call report writes anything;
 * assistant requests are answered from the business profile.
 */
export function makeVoiceWebhook(args: { calls: CallDesk; webhookSecret?: string; logger: Logger }) {
  const r = Router();
  const log = args.logger;

  r.post(
    "/webhook",
    route(async (req, res) => {
      if (args.webhookSecret && !safeEqual(req.header("x-vapi-secret") || "", args.webhookSecret)) {
        throw new Unauthorized("invalid_webhook_secret");
      }

      const { message } = parseInput(WebhookSchema, req.body);
      const callId = callIdOf(message);
      if (callId) bindRequestId(req, res, callId);

      switch (message.type) {
        case "end-of-call-report": {
          const result = await args.calls.completeCall(toCallReport(message, requestIdOf(req)));
          res.json({ ok: true, ...result });
          return;
        }
        case "assistant-request": {
          const out = await args.calls.assistantFor(dialedNumber(message));
          res.json({ ok: true, ...out });
          return;
        }
        default:
          log.debug({ type: message.type, callId }, "webhook: ignored");
          res.json({ ok: true, ignored: message.type });
      }
    }),
  );

  return r;
}
