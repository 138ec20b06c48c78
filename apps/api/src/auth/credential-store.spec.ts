import { testConfig } from '../../test/fixtures/env';
import { CredentialStore } from './credential-store';

describe('CredentialStore', () => {
  const store = new CredentialStore(testConfig());

  it('accepts a configured pair', () => {
    expect(store.verify('estimator', 'test-password')).toBe(true);
    expect(store.verify('reviewer', 'test:pass')).toBe(true);
  });

  it('rejects a wrong password or a password of another user', () => {
    expect(store.verify('estimator', 'wrong')).toBe(false);
    expect(store.verify('estimator', 'test:pass')).toBe(false);
    expect(store.verify('nobody', 'test-password')).toBe(false);
  });
});
