import crypto from "node:crypto";
import { z } from "zod";

const ClaimsSchema = z.object({
  sub: z.string().min(1),
  biz: z.string().min(1).nullable(),
  exp: z.number().int(),
});

/** Who the bearer is and which business (if any) their session is scoped to. */
export type TokenClaims = z.infer<typeof ClaimsSchema>;

export type TokenOptions = {
  secret: string;
  ttlMinutes: number;
  now?: () => number;
};

function sign(secret: string, payload: string) {
  return crypto.createHmac("sha256", secret).update(`v1.${payload}`).digest("base64url");
}

/** Constant-time string comparison. */
export function safeEqual(a: string, b: string) {
  const ab = Buffer.from(a);
  const bb = Buffer.from(b);
  return ab.length === bb.length && crypto.timingSafeEqual(ab, bb);
}

export function issueToken(sub: string, biz: string | null, opts: TokenOptions): string {
  const now = opts.now ? opts.now() : Date.now();
  const claims: TokenClaims = { sub, biz, exp: Math.floor(now / 1000) + opts.ttlMinutes * 60 };
  const payload = Buffer.from(JSON.stringify(claims)).toString("base64url");
  return `v1.${payload}.${sign(opts.secret, payload)}`;
}

/** Claims of a well-formed, correctly signed, unexpired token; null otherwise. */
export function verifyToken(token: string, opts: Pick<TokenOptions, "secret" | "now">): TokenClaims | null {
  const parts = token.split(".");
  if (parts.length !== 3 || parts[0] !== "v1") return null;
  const [, payload, sig] = parts;
  if (!safeEqual(sig, sign(opts.secret, payload))) return null;

  let decoded: unknown;
  try {
    decoded = JSON.parse(Buffer.from(payload, "base64url").toString("utf8"));
  } catch {
    return null;
  }
  const parsed = ClaimsSchema.safeParse(decoded);
  if (!parsed.success) return null;

  const now = opts.now ? opts.now() : Date.now();
  if (parsed.data.exp * 1000 <= now) return null;
  return parsed.data;
}
