// src/services/auth.ts
import bcrypt from "bcrypt";
import jwt from "jsonwebtoken";
import { z } from "zod";
import { USER_TYPES } from "../db/schema";
import type { User, UserPreference, UserSession } from "../db/schema";
import { AuthError, ConflictError, NotFoundError, ValidationError } from "../errors";
import { logger } from "../logger";
import { UNIQUE } from "../store/constraints";
import type { Patch } from "../store/types";
import { newId } from "../utils/id";
import type { Actor, ServiceContext } from "./context";
import { mapUnique } from "./unique";

export type RegisterInput = {
  username: string;
  email: string;
  password: string;
  firstName?: string;
  lastName?: string;
  phoneNumber?: string;
  dateOfBirth?: string;
  driversLicenseNumber?: string;
  licenseExpiryDate?: string;
};

export type ProfileInput = Partial<
  Pick<
    User,
    | "firstName" | "lastName" | "email" | "phoneNumber" | "dateOfBirth" | "addressLine1" | "addressLine2"
    | "city" | "postalCode" | "country" | "driversLicenseNumber" | "licenseExpiryDate"
  >
>;

export type PreferencesInput = Partial<Omit<UserPreference, "userId" | "updatedAt">>;

export type ClientMeta = { ip?: string; userAgent?: string };

export type TokenPair = { accessToken: string; refreshToken: string; expiresIn: number };

const TokenClaims = z.object({
  sub: z.string(),
  jti: z.string(),
  type: z.enum(["access", "refresh"]),
  role: z.enum(USER_TYPES).optional(),
  exp: z.number(),
});

const ACCOUNT_CONFLICTS = {
  [UNIQUE.username]: "username_taken",
  [UNIQUE.email]: "email_taken",
  [UNIQUE.driversLicense]: "license_taken",
};

// fields a customer must fill in before asking to be verified
const VERIFICATION_FIELDS = ["phoneNumber", "dateOfBirth", "driversLicenseNumber", "licenseExpiryDate"] as const;

export class AuthService {
  constructor(private readonly ctx: ServiceContext) {}

  async register(input: RegisterInput, meta: ClientMeta = {}) {
    const { store } = this.ctx;
    if (await store.users.findByUsername(input.username)) throw new ConflictError("username_taken");
    if (await store.users.findByEmail(input.email)) throw new ConflictError("email_taken");

    const now = this.ctx.clock();
    const passwordHash = await bcrypt.hash(input.password, this.ctx.config.auth.bcryptRounds);
    const user = await mapUnique(
      store.users.insert({
        id: newId(),
        username: input.username,
        email: input.email,
        passwordHash,
        firstName: input.firstName ?? "",
        lastName: input.lastName ?? "",
        userType: "customer",
        phoneNumber: input.phoneNumber ?? null,
        dateOfBirth: input.dateOfBirth ?? null,
        addressLine1: null,
        addressLine2: null,
        city: null,
        postalCode: null,
        country: "Malawi",
        driversLicenseNumber: input.driversLicenseNumber ?? null,
        licenseExpiryDate: input.licenseExpiryDate ?? null,
        isActive: true,
        isVerified: false,
        verificationLevel: "unverified",
        verificationDate: null,
        isSuspended: false,
        suspensionReason: null,
        loyaltyPoints: 0,
        loyaltyTier: "bronze",
        lastLogin: now,
        lastLoginIp: meta.ip ?? null,
        createdAt: now,
        updatedAt: now,
      }),
      ACCOUNT_CONFLICTS,
    );
    await store.preferences.insert(this.defaultPreferences(user.id, now));
    await this.touchSession(user.id, meta, now);
    logger.info({ userId: user.id }, "user registered");
    return { user, tokens: this.issueTokens(user) };
  }

  async login(login: string, password: string, meta: ClientMeta = {}) {
    const user = await this.ctx.store.users.findByLogin(login);
    if (!user || !(await bcrypt.compare(password, user.passwordHash))) {
      throw new AuthError("invalid_credentials", "invalid username or password");
    }
    if (!user.isActive) throw new AuthError("account_inactive");

    const now = this.ctx.clock();
    const updated = (await this.ctx.store.users.update(user.id, { lastLogin: now, lastLoginIp: meta.ip ?? null })) ?? user;
    await this.touchSession(user.id, meta, now);
    return { user: updated, tokens: this.issueTokens(updated) };
  }

  /** Blacklists the refresh token; a failure there is logged and logout still succeeds. */
  async logout(userId: string, refreshToken?: string) {
    await this.ctx.store.sessions.deactivateAll(userId);
    if (!refreshToken) return;
    try {
      const claims = this.verify(refreshToken, "refresh");
      await this.ctx.store.revokedTokens.revoke(claims.jti, new Date(claims.exp * 1000));
    } catch (err) {
      logger.warn({ err, userId }, "could not blacklist refresh token at logout");
    }
  }

  /** Rotates the refresh token: the presented one is revoked and a new pair issued. Each token redeems once. */
  async refresh(refreshToken: string) {
    const claims = this.verify(refreshToken, "refresh");
    const fresh = await this.ctx.store.revokedTokens.revoke(claims.jti, new Date(claims.exp * 1000));
    if (!fresh) throw new AuthError("token_revoked");
    const user = await this.ctx.store.users.findById(claims.sub);
    if (!user || !user.isActive) throw new AuthError("invalid_token");
    return this.issueTokens(user);
  }

  /** Resolves a bearer access token to its actor. */
  authenticate(accessToken: string): Actor {
    const claims = this.verify(accessToken, "access");
    if (!claims.role) throw new AuthError("invalid_token");
    return { id: claims.sub, role: claims.role };
  }

  /** Like `authenticate`, but the role comes from the stored account, so a demotion applies before the token expires. */
  async resolve(accessToken: string): Promise<Actor> {
    const { id } = this.authenticate(accessToken);
    const user = await this.ctx.store.users.findById(id);
    if (!user || !user.isActive) throw new AuthError("unauthorized", "account unavailable");
    return { id: user.id, role: user.userType };
  }

  async profile(userId: string) {
    const user = await this.ctx.store.users.findById(userId);
    if (!user) throw new NotFoundError("user");
    return user;
  }

  async updateProfile(userId: string, input: ProfileInput) {
    const { store } = this.ctx;
    if (input.email) {
      const other = await store.users.findByEmail(input.email);
      if (other && other.id !== userId) throw new ConflictError("email_taken");
    }
    const patch: Patch<User> = { ...input, updatedAt: this.ctx.clock() };
    const user = await mapUnique(store.users.update(userId, patch), ACCOUNT_CONFLICTS);
    if (!user) throw new NotFoundError("user");
    return user;
  }

  async dashboard(userId: string) {
    const { store } = this.ctx;
    const user = await this.profile(userId);
    const bookings = await store.bookings.list({ customerId: userId });
    const preferences = await store.preferences.findByUser(userId);
    return {
      user,
      totalBookings: bookings.length,
      activeBookings: bookings.filter((b) => b.status === "confirmed" || b.status === "active").length,
      // cents
      totalSpent: bookings.filter((b) => b.status === "completed").reduce((sum, b) => sum + b.totalAmount, 0),
      recentBookings: bookings.slice(0, 5),
      preferences: preferences ?? null,
    };
  }

  async changePassword(userId: string, oldPassword: string, newPassword: string) {
    const user = await this.profile(userId);
    if (!(await bcrypt.compare(oldPassword, user.passwordHash))) {
      throw new ValidationError("old password is incorrect", { oldPassword: ["is incorrect"] });
    }
    const passwordHash = await bcrypt.hash(newPassword, this.ctx.config.auth.bcryptRounds);
    await this.ctx.store.users.update(userId, { passwordHash, updatedAt: this.ctx.clock() });
  }

  sessions(userId: string): Promise<UserSession[]> {
    return this.ctx.store.sessions.listForUser(userId);
  }

  async preferences(userId: string) {
    const existing = await this.ctx.store.preferences.findByUser(userId);
    return existing ?? this.ctx.store.preferences.insert(this.defaultPreferences(userId, this.ctx.clock()));
  }

  async updatePreferences(userId: string, input: PreferencesInput) {
    await this.preferences(userId);
    const updated = await this.ctx.store.preferences.update(userId, { ...input, updatedAt: this.ctx.clock() });
    if (!updated) throw new NotFoundError("preferences");
    return updated;
  }

  async verificationStatus(userId: string) {
    const user = await this.profile(userId);
    return {
      isVerified: user.isVerified,
      verificationLevel: user.verificationLevel,
      verificationDate: user.verificationDate,
      missingFields: VERIFICATION_FIELDS.filter((f) => !user[f]),
    };
  }

  async requestVerification(userId: string) {
    const status = await this.verificationStatus(userId);
    if (status.isVerified) throw new ConflictError("already_verified");
    if (status.verificationLevel === "pending") throw new ConflictError("verification_pending");
    if (status.missingFields.length > 0) {
      throw new ValidationError(
        "profile is incomplete",
        Object.fromEntries(status.missingFields.map((f) => [f, ["is required for verification"]])),
      );
    }
    const user = await this.ctx.store.users.update(userId, { verificationLevel: "pending", updatedAt: this.ctx.clock() });
    if (!user) throw new NotFoundError("user");
    return user;
  }

  async isUsernameAvailable(username: string) {
    return !(await this.ctx.store.users.findByUsername(username));
  }

  async isEmailAvailable(email: string) {
    return !(await this.ctx.store.users.findByEmail(email));
  }

  private issueTokens(user: Pick<User, "id" | "userType">): TokenPair {
    const { auth } = this.ctx.config;
    const accessToken = jwt.sign(
      { sub: user.id, role: user.userType, type: "access", jti: newId() },
      auth.accessSecret,
      { expiresIn: auth.accessTtlSeconds },
    );
    const refreshToken = jwt.sign(
      { sub: user.id, type: "refresh", jti: newId() },
      auth.refreshSecret,
      { expiresIn: auth.refreshTtlSeconds },
    );
    return { accessToken, refreshToken, expiresIn: auth.accessTtlSeconds };
  }

  private verify(token: string, type: "access" | "refresh") {
    const secret = type === "access" ? this.ctx.config.auth.accessSecret : this.ctx.config.auth.refreshSecret;
    let decoded: unknown;
    try {
      decoded = jwt.verify(token, secret);
    } catch {
      throw new AuthError("invalid_token");
    }
    const claims = TokenClaims.safeParse(decoded);
    if (!claims.success || claims.data.type !== type) throw new AuthError("invalid_token");
    return claims.data;
  }

  private async touchSession(userId: string, meta: ClientMeta, now: Date) {
    const userAgent = meta.userAgent ?? "unknown";
    const existing = await this.ctx.store.sessions.findByUserAgent(userId, userAgent);
    if (existing) {
      await this.ctx.store.sessions.update(existing.id, { isActive: true, lastActivity: now, ipAddress: meta.ip ?? null });
      return;
    }
    await this.ctx.store.sessions.insert({
      id: newId(),
      userId,
      ipAddress: meta.ip ?? null,
      userAgent,
      deviceType: deviceType(userAgent),
      isActive: true,
      createdAt: now,
      lastActivity: now,
    });
  }

  private defaultPreferences(userId: string, now: Date): UserPreference {
    return {
      userId,
      emailNotifications: true,
      smsNotifications: false,
      pushNotifications: true,
      marketingEmails: false,
      autoInsurance: true,
      preferredFuelPolicy: "full_to_full",
      currency: this.ctx.config.currency,
      language: "en",
      dateFormat: "DD/MM/YYYY",
      timeFormat: "24h",
      updatedAt: now,
    };
  }
}

function deviceType(userAgent: string) {
  if (/mobile|android|iphone/i.test(userAgent)) return "mobile";
  if (/ipad|tablet/i.test(userAgent)) return "tablet";
  return "desktop";
}
