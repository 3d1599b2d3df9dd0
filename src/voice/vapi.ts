import { z } from "zod";
import type { Logger } from "pino";
import type { Business } from "../types/contracts.js";
import { UpstreamUnavailable } from "../core/errors.js";
import type { FetchLike } from "../store/hosted.js";
import { assistantConfig } from "./prompts.js";

/** The slice of the voice vendor this service drives. */
export interface VoiceVendor {
  /** Create or update the vendor assistant for `business`; resolves to its assistant id. */
  registerPrompt(business: Business): Promise<string>;
}

const AssistantSchema = z.object({ id: z.string().min(1) }).passthrough();

export class VapiClient implements VoiceVendor {
  private apiKey: string;
  private apiUrl: string;
  private fetchImpl: FetchLike;
  private log?: Logger;
  private now: () => Date;

  constructor(args: { apiKey: string; apiUrl: string; fetch?: FetchLike; logger?: Logger; now?: () => Date }) {
    this.apiKey = args.apiKey;
    this.apiUrl = args.apiUrl.replace(/\/+$/, "");
    this.fetchImpl = args.fetch ?? ((url, init) => fetch(url, init));
    this.log = args.logger;
    this.now = args.now ?? (() => new Date());
  }

  async registerPrompt(business: Business): Promise<string> {
    const body = assistantConfig(business, this.now());
    const url = business.assistantId
      ? `${this.apiUrl}/assistant/${encodeURIComponent(business.assistantId)}`
      : `${this.apiUrl}/assistant`;
    const method = business.assistantId ? "PATCH" : "POST";

    let r: Response;
    try {
      r = await this.fetchImpl(url, {
        method,
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify(body),
      });
    } catch (e) {
      throw new UpstreamUnavailable("voice vendor", { message: String(e) });
    }

    const txt = await r.text();
    if (r.status >= 500 || r.status === 429) {
      throw new UpstreamUnavailable("voice vendor", { status: r.status });
    }
    if (!r.ok) {
      throw new Error(`voice vendor rejected ${method} /assistant: ${r.status} ${txt.slice(0, 200)}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(txt);
    } catch {
      throw new UpstreamUnavailable("voice vendor", { reason: "invalid_response" });
    }
    const out = AssistantSchema.safeParse(parsed);
    if (!out.success) throw new UpstreamUnavailable("voice vendor", { reason: "invalid_response" });

    this.log?.info({ businessId: business.id, assistantId: out.data.id, method }, "voice: prompt registered");
    return out.data.id;
  }
}
