import { testConfig } from '../../test/fixtures/env';
import { HeldTransport, ScriptedTransport, smtpError } from '../../test/fixtures/mail';
import { CREATED_AT, STEPS, buildCatalog, readyWizard } from '../../test/fixtures/rfq';
import { DraftIncompleteError, SessionBusyError, TransportError } from '../common/errors';
import { DispatchGateway } from '../dispatch/dispatch-gateway';
import { DocumentComposer } from '../documents/document-composer';
import { RfqSession } from '../sessions/session.store';
import { WizardFactory } from './wizard.factory';
import { WizardService } from './wizard.service';

describe('WizardService', () => {
  const config = testConfig();
  const composer = new DocumentComposer(STEPS, { companyName: config.branding.companyName });
  const factory = new WizardFactory(STEPS, config, buildCatalog());

  function setup(transport = new ScriptedTransport()) {
    const service = new WizardService(composer, new DispatchGateway(transport, config), factory);
    const session = new RfqSession('session-1', 'estimator', readyWizard(), CREATED_AT.getTime());
    return { service, session, transport };
  }

  it('renders once and reuses the bundle until the draft changes', async () => {
    const { service, session } = setup();

    const first = await service.documents(session);
    expect(await service.documents(session)).toBe(first);

    service.updateFields(session, { remarks: 'Quote in INR' });
    expect(session.bundle).toBeUndefined();
  });

  it('starts a fresh draft after a successful submission', async () => {
    const { service, session, transport } = setup();
    const submitted = session.wizard;

    const outcome = await service.submit(session);

    expect(outcome.rfqReference).toBe('RFQ/2024-03091405');
    expect(outcome.recipient).toBe('buyer@acme.test');
    expect(outcome.documents).toEqual([
      'RFQ_2024-03091405_20240309-140502.pdf',
      'RFQ_2024-03091405_20240309-140502.pptx',
    ]);
    expect(submitted.status()).toBe('submitted');
    expect(session.wizard).not.toBe(submitted);
    expect(session.wizard.status()).toBe('in-progress');
    expect(session.bundle).toBeUndefined();
    expect(transport.sent).toHaveLength(1);
  });

  it('prefers an explicit recipient', async () => {
    const { service, session, transport } = setup();

    await service.submit(session, 'purchasing@acme.test');

    expect(transport.sent[0].to).toBe('purchasing@acme.test');
  });

  it('leaves the draft ready when sending fails', async () => {
    const { service, session } = setup(new ScriptedTransport([smtpError('Relay denied', { responseCode: 554 })]));
    const wizard = session.wizard;

    await expect(service.submit(session)).rejects.toThrow(TransportError);

    expect(session.wizard).toBe(wizard);
    expect(wizard.status()).toBe('ready');
    expect(session.submitting).toBe(false);
  });

  it('does not submit an unfinished draft', async () => {
    const { service, session, transport } = setup();
    session.wizard.goBack();
    session.wizard.updateField('deliveryTime', '20 weeks');

    await expect(service.submit(session)).rejects.toThrow(DraftIncompleteError);
    expect(transport.sent).toHaveLength(0);
  });

  it('drops rendered documents when the user steps back', async () => {
    const { service, session, transport } = setup();
    await service.documents(session);

    service.back(session);

    expect(session.bundle).toBeUndefined();
    await expect(service.documents(session)).rejects.toThrow(DraftIncompleteError);
    await expect(service.submit(session)).rejects.toThrow(DraftIncompleteError);
    expect(transport.sent).toHaveLength(0);
    expect(session.wizard.status()).toBe('in-progress');
  });

  describe('while a submission is being sent', () => {
    it('refuses a second submission and sends one mail', async () => {
      const transport = new HeldTransport();
      const { service, session } = setup(transport);

      const first = service.submit(session, 'purchasing@acme.test');
      await expect(service.submit(session, 'purchasing@acme.test')).rejects.toThrow(SessionBusyError);
      transport.open();

      await expect(first).resolves.toMatchObject({ recipient: 'purchasing@acme.test' });
      expect(transport.sent).toHaveLength(1);
      expect(session.submitting).toBe(false);
    });

    it('refuses edits and navigation', async () => {
      const transport = new HeldTransport();
      const { service, session } = setup(transport);
      const submitted = session.wizard;

      const pending = service.submit(session);
      expect(() => service.updateFields(session, { remarks: 'Late change' })).toThrow(SessionBusyError);
      expect(() => service.back(session)).toThrow(SessionBusyError);
      transport.open();

      await pending;
      expect(submitted.status()).toBe('submitted');
      expect(submitted.copyDraft().values.remarks).toBeUndefined();
      expect(transport.sent).toHaveLength(1);
    });
  });
});
