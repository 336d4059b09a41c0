// tests/api/auth.test.ts
import { afterEach, beforeEach, describe, expect, it, jest } from "@jest/globals";
import request from "supertest";
import { bearer, signUp, testApp } from "../support/app";
import type { TestApp } from "../support/app";
import { createMemoryStore } from "../support/memory-store";

describe("auth API", () => {
  let t: TestApp;

  beforeEach(() => {
    t = testApp();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("registers a customer and hides the password hash", async () => {
    const res = await request(t.app)
      .post("/api/auth/register")
      .send({ username: "thandi", email: "Thandi@Example.com", password: "password123", passwordConfirm: "password123" })
      .expect(201);

    expect(res.body.user).toMatchObject({ username: "thandi", email: "thandi@example.com", userType: "customer", loyaltyTier: "bronze" });
    expect(res.body.user.passwordHash).toBeUndefined();
    expect(typeof res.body.accessToken).toBe("string");
    expect(typeof res.body.refreshToken).toBe("string");
    expect(res.body.expiresIn).toBe(3600);
  });

  it("rejects mismatched passwords field by field", async () => {
    const res = await request(t.app)
      .post("/api/auth/register")
      .send({ username: "thandi", email: "thandi@example.com", password: "password123", passwordConfirm: "password124" })
      .expect(400);
    expect(res.body).toEqual({ error: "validation_error", fields: { passwordConfirm: ["passwords do not match"] } });
  });

  it("refuses a taken username", async () => {
    await signUp(t, "thandi");
    const res = await request(t.app)
      .post("/api/auth/register")
      .send({ username: "thandi", email: "other@example.com", password: "password123", passwordConfirm: "password123" })
      .expect(400);
    expect(res.body).toEqual({ error: "username_taken", detail: "username_taken" });
  });

  it("reports username and email availability", async () => {
    await signUp(t, "thandi");
    const taken = await request(t.app).get("/api/auth/check-username").query({ username: "thandi" }).expect(200);
    expect(taken.body).toEqual({ username: "thandi", is_available: false });
    const free = await request(t.app).get("/api/auth/check-email").query({ email: "NEW@example.com" }).expect(200);
    expect(free.body).toEqual({ email: "new@example.com", is_available: true });
  });

  it("logs in by username or e-mail", async () => {
    await signUp(t, "thandi");
    await request(t.app).post("/api/auth/login").send({ username: "thandi", password: "password123" }).expect(200);
    const byEmail = await request(t.app)
      .post("/api/auth/login")
      .send({ username: "thandi@example.com", password: "password123" })
      .expect(200);
    expect(byEmail.body.user.username).toBe("thandi");

    const wrong = await request(t.app).post("/api/auth/login").send({ username: "thandi", password: "nope-nope" }).expect(401);
    expect(wrong.body.error).toBe("invalid_credentials");
  });

  it("guards the profile behind a bearer token", async () => {
    const res = await request(t.app).get("/api/auth/profile").expect(401);
    expect(res.body).toEqual({ error: "unauthorized", detail: "missing bearer token" });

    const user = await signUp(t, "thandi");
    const profile = await request(t.app).get("/api/auth/profile").set(bearer(user)).expect(200);
    expect(profile.body.id).toBe(user.id);
  });

  it("rotates refresh tokens and refuses a used one", async () => {
    const reg = await request(t.app)
      .post("/api/auth/register")
      .send({ username: "thandi", email: "thandi@example.com", password: "password123", passwordConfirm: "password123" })
      .expect(201);
    const first: string = reg.body.refreshToken;

    const rotated = await request(t.app).post("/api/auth/token/refresh").send({ refreshToken: first }).expect(200);
    expect(typeof rotated.body.accessToken).toBe("string");

    const reused = await request(t.app).post("/api/auth/token/refresh").send({ refreshToken: first }).expect(401);
    expect(reused.body.error).toBe("token_revoked");
  });

  it("blacklists the refresh token on logout", async () => {
    const reg = await request(t.app)
      .post("/api/auth/register")
      .send({ username: "thandi", email: "thandi@example.com", password: "password123", passwordConfirm: "password123" })
      .expect(201);

    await request(t.app)
      .post("/api/auth/logout")
      .set({ Authorization: `Bearer ${reg.body.accessToken}` })
      .send({ refreshToken: reg.body.refreshToken })
      .expect(200, { ok: true });

    const res = await request(t.app).post("/api/auth/token/refresh").send({ refreshToken: reg.body.refreshToken }).expect(401);
    expect(res.body.error).toBe("token_revoked");
  });

  it("redeems a refresh token only once when two rotations race", async () => {
    const reg = await request(t.app)
      .post("/api/auth/register")
      .send({ username: "thandi", email: "thandi@example.com", password: "password123", passwordConfirm: "password123" })
      .expect(201);
    const token: string = reg.body.refreshToken;

    const results = await Promise.allSettled([t.services.auth.refresh(token), t.services.auth.refresh(token)]);

    expect(results.filter((r) => r.status === "fulfilled")).toHaveLength(1);
    const rejected = results.find((r) => r.status === "rejected");
    expect(rejected).toMatchObject({ status: "rejected", reason: { code: "token_revoked" } });
  });

  it("still logs out when the refresh token is not a valid token", async () => {
    const user = await signUp(t, "thandi");
    await request(t.app)
      .post("/api/auth/logout")
      .set(bearer(user))
      .send({ refreshToken: "not-a-token" })
      .expect(200, { ok: true });
  });

  it("still logs out when the blacklist cannot be written", async () => {
    const reg = await request(t.app)
      .post("/api/auth/register")
      .send({ username: "thandi", email: "thandi@example.com", password: "password123", passwordConfirm: "password123" })
      .expect(201);
    jest.spyOn(t.store.revokedTokens, "revoke").mockRejectedValue(new Error("connection lost"));

    await request(t.app)
      .post("/api/auth/logout")
      .set({ Authorization: `Bearer ${reg.body.accessToken}` })
      .send({ refreshToken: reg.body.refreshToken })
      .expect(200, { ok: true });
  });

  it("asks for the missing profile fields before verification", async () => {
    const user = await signUp(t, "thandi");
    const res = await request(t.app).post("/api/auth/verification/request").set(bearer(user)).expect(400);
    expect(res.body.fields).toEqual({
      phoneNumber: ["is required for verification"],
      dateOfBirth: ["is required for verification"],
      driversLicenseNumber: ["is required for verification"],
      licenseExpiryDate: ["is required for verification"],
    });

    await request(t.app)
      .put("/api/auth/profile")
      .set(bearer(user))
      .send({ phoneNumber: "+265999123456", dateOfBirth: "1990-04-01", driversLicenseNumber: "MW-12345", licenseExpiryDate: "2030-01-01" })
      .expect(200);
    await request(t.app).post("/api/auth/verification/request").set(bearer(user)).expect(200, { verificationLevel: "pending" });
  });
});

describe("refresh token blacklist", () => {
  it("drops entries once their token has expired", async () => {
    const { revokedTokens } = createMemoryStore();
    const past = new Date(Date.now() - 60_000);
    const future = new Date(Date.now() + 60_000);

    expect(await revokedTokens.revoke("expired-jti", past)).toBe(true);
    expect(await revokedTokens.revoke("live-jti", future)).toBe(true);

    expect(await revokedTokens.revoke("expired-jti", future)).toBe(true);
    expect(await revokedTokens.revoke("live-jti", future)).toBe(false);
  });
});
