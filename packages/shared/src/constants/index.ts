export * from './currencies';
export * from './expense-statuses';
export * from './roles';
export * from './approvals';
export * from './otp';
