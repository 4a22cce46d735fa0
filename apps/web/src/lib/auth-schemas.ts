import { z } from 'zod';
import { OTP_PURPOSES } from '@expensox/shared';

export const loginSchema = z.object({
  email: z.string().trim().email(),
  password: z.string().min(1),
});

export const verifyOtpSchema = z.object({
  userId: z.string().trim().min(1),
  purpose: z.enum(OTP_PURPOSES),
  code: z.string().trim().regex(/^\d{6}$/, 'Codes are 6 digits'),
});

export const resendOtpSchema = z.object({
  userId: z.string().trim().min(1),
  purpose: z.enum(OTP_PURPOSES),
});

export const forgotPasswordSchema = z.object({
  email: z.string().trim().email(),
});

export const resetPasswordSchema = z.object({
  email: z.string().trim().email(),
  code: z.string().trim().regex(/^\d{6}$/, 'Codes are 6 digits'),
  newPassword: z.string().min(1),
});
