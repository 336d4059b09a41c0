// src/routes/auth.ts
import { Router } from "express";
import type { Request } from "express";
import { actorOf, requireAuth } from "../middleware/auth";
import { toWire } from "../serializers";
import type { Services } from "../services";
import type { ClientMeta } from "../services/auth";
import {
  ChangePasswordInput, CheckEmailQuery, CheckUsernameQuery, LoginInput, LogoutInput, PreferencesInput,
  ProfileInput, RefreshInput, RegisterInput, REGISTER_FIELDS,
} from "../validators/auth";

function clientMeta(req: Request): ClientMeta {
  return { ip: req.ip, userAgent: req.header("user-agent") };
}

export function authRouter({ auth }: Services) {
  const router = Router();
  const authed = requireAuth(auth);

  // ── GET /api/auth/register ──────────────────────────────────────────────────
  router.get("/register", (_req, res) => {
    res.json({ fields: REGISTER_FIELDS });
  });

  // ── POST /api/auth/register ─────────────────────────────────────────────────
  router.post("/register", async (req, res, next) => {
    try {
      const input = RegisterInput.parse(req.body ?? {});
      const { user, tokens } = await auth.register(input, clientMeta(req));
      res.status(201).json(toWire({ user, ...tokens }));
    } catch (e) { next(e); }
  });

  // ── POST /api/auth/login ────────────────────────────────────────────────────
  router.post("/login", async (req, res, next) => {
    try {
      const { username, password } = LoginInput.parse(req.body ?? {});
      const { user, tokens } = await auth.login(username, password, clientMeta(req));
      res.json(toWire({ user, ...tokens }));
    } catch (e) { next(e); }
  });

  // ── POST /api/auth/logout ───────────────────────────────────────────────────
  router.post("/logout", authed, async (req, res, next) => {
    try {
      const { refreshToken } = LogoutInput.parse(req.body ?? {});
      await auth.logout(actorOf(req).id, refreshToken);
      res.json({ ok: true });
    } catch (e) { next(e); }
  });

  // ── POST /api/auth/token/refresh ────────────────────────────────────────────
  router.post("/token/refresh", async (req, res, next) => {
    try {
      const { refreshToken } = RefreshInput.parse(req.body ?? {});
      res.json(await auth.refresh(refreshToken));
    } catch (e) { next(e); }
  });

  // ── GET/PUT /api/auth/profile ───────────────────────────────────────────────
  router.get("/profile", authed, async (req, res, next) => {
    try {
      res.json(toWire(await auth.profile(actorOf(req).id)));
    } catch (e) { next(e); }
  });

  router.put("/profile", authed, async (req, res, next) => {
    try {
      const input = ProfileInput.parse(req.body ?? {});
      res.json(toWire(await auth.updateProfile(actorOf(req).id, input)));
    } catch (e) { next(e); }
  });

  // ── GET /api/auth/dashboard ─────────────────────────────────────────────────
  router.get("/dashboard", authed, async (req, res, next) => {
    try {
      res.json(toWire(await auth.dashboard(actorOf(req).id)));
    } catch (e) { next(e); }
  });

  // ── POST /api/auth/password/change ──────────────────────────────────────────
  router.post("/password/change", authed, async (req, res, next) => {
    try {
      const { oldPassword, newPassword } = ChangePasswordInput.parse(req.body ?? {});
      await auth.changePassword(actorOf(req).id, oldPassword, newPassword);
      res.json({ ok: true });
    } catch (e) { next(e); }
  });

  // ── GET /api/auth/sessions ──────────────────────────────────────────────────
  router.get("/sessions", authed, async (req, res, next) => {
    try {
      res.json(await auth.sessions(actorOf(req).id));
    } catch (e) { next(e); }
  });

  // ── GET/PUT /api/auth/preferences ───────────────────────────────────────────
  router.get("/preferences", authed, async (req, res, next) => {
    try {
      res.json(await auth.preferences(actorOf(req).id));
    } catch (e) { next(e); }
  });

  router.put("/preferences", authed, async (req, res, next) => {
    try {
      const input = PreferencesInput.parse(req.body ?? {});
      res.json(await auth.updatePreferences(actorOf(req).id, input));
    } catch (e) { next(e); }
  });

  // ── verification ────────────────────────────────────────────────────────────
  router.get("/verification/status", authed, async (req, res, next) => {
    try {
      res.json(await auth.verificationStatus(actorOf(req).id));
    } catch (e) { next(e); }
  });

  router.post("/verification/request", authed, async (req, res, next) => {
    try {
      const user = await auth.requestVerification(actorOf(req).id);
      res.json({ verificationLevel: user.verificationLevel });
    } catch (e) { next(e); }
  });

  // ── availability checks ─────────────────────────────────────────────────────
  router.get("/check-username", async (req, res, next) => {
    try {
      const { username } = CheckUsernameQuery.parse(req.query);
      res.json({ username, is_available: await auth.isUsernameAvailable(username) });
    } catch (e) { next(e); }
  });

  router.get("/check-email", async (req, res, next) => {
    try {
      const { email } = CheckEmailQuery.parse(req.query);
      res.json({ email, is_available: await auth.isEmailAvailable(email) });
    } catch (e) { next(e); }
  });

  return router;
}
