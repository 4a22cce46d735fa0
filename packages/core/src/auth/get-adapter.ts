import type { AuthAdapter } from './index';
import { LocalAuthAdapter } from './local-adapter';

let instance: AuthAdapter | null = null;

export function getAuthAdapter(): AuthAdapter {
  if (!instance) {
    instance = new LocalAuthAdapter();
  }
  return instance;
}

export function setAuthAdapter(adapter: AuthAdapter | null): void {
  instance = adapter;
}
