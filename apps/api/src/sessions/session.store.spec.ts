import { testConfig } from '../../test/fixtures/env';
import { newWizard } from '../../test/fixtures/rfq';
import { SessionStore } from './session.store';

const MINUTE = 60_000;

describe('SessionStore', () => {
  const start = Date.parse('2024-03-09T14:00:00Z');
  let store: SessionStore;

  beforeEach(() => {
    store = new SessionStore(testConfig({ SESSION_TTL_MINUTES: '30' }));
  });

  it('gives every sign-in its own wizard', () => {
    const a = store.create('estimator', newWizard(), start);
    const b = store.create('estimator', newWizard(), start);

    a.wizard.updateField('customerName', 'Acme Fabrication');

    expect(a.id).not.toBe(b.id);
    expect(store.get(b.id, start)?.wizard.snapshot().draft.values.customerName).toBeUndefined();
  });

  it('keeps a session alive while it is used', () => {
    const session = store.create('estimator', newWizard(), start);

    expect(store.get(session.id, start + 20 * MINUTE)).toBe(session);
    expect(store.get(session.id, start + 40 * MINUTE)).toBe(session);
  });

  it('drops a session idle for longer than the TTL', () => {
    const session = store.create('estimator', newWizard(), start);

    expect(store.get(session.id, start + 31 * MINUTE)).toBeUndefined();
    expect(store.size()).toBe(0);
  });

  it('sweeps idle sessions when a new one opens', () => {
    store.create('estimator', newWizard(), start);
    store.create('reviewer', newWizard(), start + 31 * MINUTE);

    expect(store.size()).toBe(1);
  });

  it('forgets a destroyed session', () => {
    const session = store.create('estimator', newWizard(), start);

    expect(store.destroy(session.id)).toBe(true);
    expect(store.get(session.id, start)).toBeUndefined();
    expect(store.destroy(session.id)).toBe(false);
  });
});
