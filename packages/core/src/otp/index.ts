export {
  generateOtpCode,
  hashOtpCode,
  evaluateOtp,
  secondsRemaining,
  issueOtp,
  verifyOtp,
  resendOtp,
  getOtpStatus,
  cleanupExpiredOtps,
} from './otp-service';
export type {
  OtpRecord,
  OtpFailureReason,
  OtpVerifyResult,
  OtpStatus,
  IssueOtpInput,
} from './otp-service';
