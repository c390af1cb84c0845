import { describe, it, expect } from 'vitest';
import { SessionStore } from './sessions.js';

describe('SessionStore', () => {
  it('should validate tokens it created', () => {
    const store = new SessionStore();
    const token = store.create();

    expect(store.isValid(token)).toBe(true);
    expect(store.isValid('unknown-token')).toBe(false);
  });

  it('should issue distinct tokens', () => {
    const store = new SessionStore();
    expect(store.create()).not.toBe(store.create());
    expect(store.size).toBe(2);
  });

  it('should revoke tokens', () => {
    const store = new SessionStore();
    const token = store.create();

    expect(store.revoke(token)).toBe(true);
    expect(store.isValid(token)).toBe(false);
    expect(store.revoke(token)).toBe(false);
  });

  it('should expire tokens after the ttl', () => {
    let now = 1_000;
    const store = new SessionStore({ ttlMs: 500, now: () => now });
    const token = store.create();

    now = 1_499;
    expect(store.isValid(token)).toBe(true);

    now = 1_500;
    expect(store.isValid(token)).toBe(false);
    expect(store.size).toBe(0);
  });

  it('should purge expired tokens when creating new ones', () => {
    let now = 0;
    const store = new SessionStore({ ttlMs: 10, now: () => now });
    store.create();
    store.create();

    now = 20;
    store.create();

    expect(store.size).toBe(1);
  });
});
