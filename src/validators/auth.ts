// src/validators/auth.ts
import { z } from "zod";
import { IsoDate } from "./common";

const Username = z.string().min(3).max(150).regex(/^[\w.@+-]+$/, "letters, digits and @/./+/-/_ only");
const Password = z.string().min(8).max(128);
const Phone = z.string().regex(/^\+?1?\d{9,15}$/, "phone must be like '+999999999' (up to 15 digits)");

export const RegisterInput = z.object({
  username: Username,
  email: z.string().email().max(254).transform((e) => e.toLowerCase()),
  password: Password,
  passwordConfirm: z.string(),
  firstName: z.string().max(150).optional(),
  lastName: z.string().max(150).optional(),
  phoneNumber: Phone.optional(),
  dateOfBirth: IsoDate.optional(),
  driversLicenseNumber: z.string().min(3).max(50).optional(),
  licenseExpiryDate: IsoDate.optional(),
}).refine((v) => v.password === v.passwordConfirm, { message: "passwords do not match", path: ["passwordConfirm"] });

// served by GET /api/auth/register
export const REGISTER_FIELDS = {
  username: "required; 3-150 characters: letters, digits and @/./+/-/_",
  email: "required; a valid e-mail address",
  password: "required; at least 8 characters",
  passwordConfirm: "required; must match password",
  firstName: "optional",
  lastName: "optional",
  phoneNumber: "optional; e.g. +265999123456",
  dateOfBirth: "optional; YYYY-MM-DD",
  driversLicenseNumber: "optional; unique",
  licenseExpiryDate: "optional; YYYY-MM-DD",
};

/** `username` accepts the account's username or e-mail. */
export const LoginInput = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
});

export const RefreshInput = z.object({ refreshToken: z.string().min(1) });

export const LogoutInput = z.object({ refreshToken: z.string().min(1).optional() });

export const ChangePasswordInput = z.object({
  oldPassword: z.string().min(1),
  newPassword: Password,
  newPasswordConfirm: z.string(),
}).refine((v) => v.newPassword === v.newPasswordConfirm, { message: "passwords do not match", path: ["newPasswordConfirm"] });

export const ProfileInput = z.object({
  firstName: z.string().max(150),
  lastName: z.string().max(150),
  email: z.string().email().max(254).transform((e) => e.toLowerCase()),
  phoneNumber: Phone.nullable(),
  dateOfBirth: IsoDate.nullable(),
  addressLine1: z.string().max(255).nullable(),
  addressLine2: z.string().max(255).nullable(),
  city: z.string().max(100).nullable(),
  postalCode: z.string().max(20).nullable(),
  country: z.string().max(100).nullable(),
  driversLicenseNumber: z.string().min(3).max(50).nullable(),
  licenseExpiryDate: IsoDate.nullable(),
}).partial().strict();

export const PreferencesInput = z.object({
  emailNotifications: z.boolean(),
  smsNotifications: z.boolean(),
  pushNotifications: z.boolean(),
  marketingEmails: z.boolean(),
  autoInsurance: z.boolean(),
  preferredFuelPolicy: z.enum(["full_to_full", "full_to_empty", "same_to_same"]),
  currency: z.string().length(3).transform((c) => c.toUpperCase()),
  language: z.string().min(2).max(10),
  dateFormat: z.enum(["DD/MM/YYYY", "MM/DD/YYYY", "YYYY-MM-DD"]),
  timeFormat: z.enum(["12h", "24h"]),
}).partial().strict();

export const CheckUsernameQuery = z.object({ username: z.string().min(1) });
export const CheckEmailQuery = z.object({ email: z.string().min(1).transform((e) => e.toLowerCase()) });
