import { z } from "zod";
import type { Logger } from "pino";
import type { Store } from "../store/store.js";
import { digitsOf } from "../store/store.js";
import type { Business, User } from "../types/contracts.js";
import { Conflict, NotFound, Unauthorized } from "../core/errors.js";
import { canTransitionUser } from "../core/transitions.js";
import { parseInput } from "../core/validate.js";
import { hashPassword, verifyPassword } from "../auth/password.js";
import { issueToken } from "../auth/token.js";
import type { VoiceVendor } from "../voice/vapi.js";

const text = (max: number) => z.string().trim().min(1).max(max);

const SignupSchema = z.object({
  email: z.string().trim().toLowerCase().email().max(200),
  password: z.string().min(8).max(200),
  businessName: text(200),
  fullName: text(200),
  occupation: text(200),
  phone: text(40),
});

const LoginSchema = z.object({
  email: z.string().trim().toLowerCase().min(1).max(200),
  password: z.string().min(1).max(200),
});

const ProfileSchema = z.object({
  businessType: z.string().trim().max(100).optional(),
  address: z.string().trim().max(500).optional(),
  description: z.string().trim().max(2000).optional(),
  policies: z.string().trim().max(4000).optional(),
  reservationRules: z.string().trim().max(4000).optional(),
  script: z.string().trim().max(2000).optional(),
  knowledgeBase: z.string().trim().max(10000).optional(),
});

const BusinessCreateSchema = ProfileSchema.extend({
  ownerId: z.string().min(1),
  name: text(200),
  phone: text(40).refine((p) => p.replace(/\D/g, "").length >= 7, "phone needs at least 7 digits"),
}).strict();

const BusinessPatchSchema = ProfileSchema.extend({
  name: text(200),
  phone: text(40).refine((p) => p.replace(/\D/g, "").length >= 7, "phone needs at least 7 digits"),
})
  .partial()
  .strict()
  .refine((p) => Object.values(p).some((v) => v !== undefined), "nothing to update");

export type PublicUser = Omit<User, "passwordHash">;

export function publicUser(u: User): PublicUser {
  const { passwordHash: _hash, ...rest } = u;
  return rest;
}

export function createAccounts(args: {
  store: Store;
  tokenSecret: string;
  tokenTtlMinutes: number;
  voice?: VoiceVendor;
  logger: Logger;
  now?: () => Date;
}) {
  const log = args.logger;
  const now = args.now ?? (() => new Date());

  async function signup(raw: unknown) {
    const input = parseInput(SignupSchema, raw);
    if (await args.store.findUserByEmail(input.email)) throw new Conflict("email_taken");

    const user = await args.store.createUser({
      email: input.email,
      businessName: input.businessName,
      fullName: input.fullName,
      occupation: input.occupation,
      phone: input.phone,
      passwordHash: await hashPassword(input.password),
      status: "pending",
      createdAt: now().toISOString(),
    });

    log.info({ userId: user.id }, "account: signed up");
    return { user: publicUser(user) };
  }

  /** Same answer for an unknown email and a wrong password. */
  async function login(raw: unknown) {
    const input = parseInput(LoginSchema, raw);
    const user = await args.store.findUserByEmail(input.email);
    if (!user || !(await verifyPassword(input.password, user.passwordHash))) {
      throw new Unauthorized("invalid_credentials");
    }

    // only an active, linked account gets a business-scoped session
    const biz = user.status === "active" && user.businessId ? user.businessId : null;
    const token = issueToken(user.id, biz, {
      secret: args.tokenSecret,
      ttlMinutes: args.tokenTtlMinutes,
      now: () => now().getTime(),
    });

    log.info({ userId: user.id, scoped: biz !== null }, "account: logged in");
    return { token, user: publicUser(user) };
  }

  async function me(userId: string) {
    const user = await args.store.getUser(userId);
    if (!user) throw new Unauthorized("invalid_token");
    const business = user.businessId ? await args.store.getBusiness(user.businessId) : null;
    return { user: publicUser(user), business };
  }

  async function activateUser(id: string) {
    const user = await args.store.getUser(id);
    if (!user) throw new NotFound("user_not_found");
    if (!canTransitionUser(user.status, "active")) {
      throw new Conflict("invalid_transition", { from: user.status, to: "active" });
    }
    const updated = await args.store.updateUser(id, { status: "active" });
    if (!updated) throw new NotFound("user_not_found");

    log.info({ userId: id }, "account: activated");
    return { user: publicUser(updated) };
  }

  async function createBusiness(raw: unknown) {
    const input = parseInput(BusinessCreateSchema, raw);
    const owner = await args.store.getUser(input.ownerId);
    if (!owner) throw new NotFound("owner_not_found");
    if (owner.businessId) throw new Conflict("owner_has_business", { businessId: owner.businessId });

    const { ownerId, ...profile } = input;
    // a retry after the owner link failed finds the business it already made
    const existing = await args.store.findBusinessByPhone(digitsOf(input.phone));
    if (existing && existing.ownerId !== ownerId) throw new Conflict("phone_taken");
    if (existing) {
      await args.store.updateUser(ownerId, { businessId: existing.id });
      log.warn({ businessId: existing.id, ownerId }, "business: relinked to owner");
      return { business: existing };
    }

    const business = await args.store.createBusiness({ ...profile, ownerId, createdAt: now().toISOString() });
    await args.store.updateUser(ownerId, { businessId: business.id });

    log.info({ businessId: business.id, ownerId }, "business: created");
    return { business };
  }

  async function updateBusiness(id: string, raw: unknown) {
    const patch = parseInput(BusinessPatchSchema, raw);
    if (!(await args.store.getBusiness(id))) throw new NotFound("business_not_found");
    const business = await args.store.updateBusiness(id, patch);
    if (!business) throw new NotFound("business_not_found");

    log.info({ businessId: id, fields: Object.keys(patch) }, "business: updated");
    return { business };
  }

  async function registerVoicePrompt(id: string): Promise<{ business: Business }> {
    const current = await args.store.getBusiness(id);
    if (!current) throw new NotFound("business_not_found");
    if (!args.voice) throw new Conflict("voice_not_configured");

    const assistantId = await args.voice.registerPrompt(current);
    const business = await args.store.updateBusiness(id, { assistantId });
    if (!business) throw new NotFound("business_not_found");
    return { business };
  }

  return { signup, login, me, activateUser, createBusiness, updateBusiness, registerVoicePrompt };
}

export type Accounts = ReturnType<typeof createAccounts>;
