export const OTP_PURPOSES = ['signup', 'login', 'password_reset', 'two_factor'] as const;

export type OtpPurpose = (typeof OTP_PURPOSES)[number];

export const OTP_EMAIL_SUBJECTS: Record<OtpPurpose, string> = {
  signup: 'Verify your email',
  login: 'Your login code',
  password_reset: 'Reset your password',
  two_factor: 'Your two-factor authentication code',
};
