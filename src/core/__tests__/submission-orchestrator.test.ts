/**
 * Unit tests for submission-orchestrator.ts
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { SubmissionTransport } from '../../api/client';
import type { SubmissionResult } from '../../types/error';
import type { SubmissionPayload } from '../../types/form';
import { ProgressChannel, type ProgressSource } from '../progress-channel';
import { SubmissionOrchestrator, type FormEffects } from '../submission-orchestrator';
import { DEFAULT_RULES, type ValidationRuleSet } from '../validation-rules';

class FakeProgressSource implements ProgressSource {
  readonly channels: ProgressChannel[] = [];

  open(): ProgressChannel {
    const channel = new ProgressChannel({ sentinel: 'DONE' });
    this.channels.push(channel);
    return channel;
  }
}

/**
 * Transport whose responses are settled by the test
 */
class DeferredTransport implements SubmissionTransport {
  readonly payloads: SubmissionPayload[] = [];
  private pending: Array<(result: SubmissionResult) => void> = [];

  submit(payload: SubmissionPayload): Promise<SubmissionResult> {
    this.payloads.push(payload);
    return new Promise((resolve) => {
      this.pending.push(resolve);
    });
  }

  respond(result: SubmissionResult): void {
    this.pending.shift()?.(result);
  }
}

function createEffects() {
  return {
    scrollToField: vi.fn<Parameters<FormEffects['scrollToField']>, void>(),
    saveFile: vi.fn<Parameters<FormEffects['saveFile']>, void>(),
    reload: vi.fn<[], void>(),
  };
}

const pdf = (): SubmissionResult => ({
  kind: 'success',
  payload: new Blob(['%PDF-1.4'], { type: 'application/pdf' }),
  contentType: 'application/pdf',
});

function fillValidForm(orchestrator: SubmissionOrchestrator, nome = 'Ana Souza'): void {
  orchestrator.setFieldValue('nome', nome);
  orchestrator.setFieldValue('funcao', 'analista');
  orchestrator.setFieldValue('departamento', 'ti');
  orchestrator.setFieldValue('telefone', '(11) 3456-7890');
  orchestrator.setFieldValue('empresa', 'matriz');
  orchestrator.setFieldValue('patrimonio[0]', 'CEL001');
}

describe('SubmissionOrchestrator', () => {
  let transport: DeferredTransport;
  let progressSource: FakeProgressSource;
  let effects: ReturnType<typeof createEffects>;
  let orchestrator: SubmissionOrchestrator;

  function create(rules?: ValidationRuleSet): SubmissionOrchestrator {
    orchestrator = new SubmissionOrchestrator({
      client: transport,
      progressSource,
      effects,
      rules,
    });
    return orchestrator;
  }

  beforeEach(() => {
    vi.useFakeTimers();
    transport = new DeferredTransport();
    progressSource = new FakeProgressSource();
    effects = createEffects();
    create();
  });

  afterEach(() => {
    orchestrator.dispose();
    vi.useRealTimers();
  });

  describe('client validation', () => {
    it('annotates every failing field and makes no request', async () => {
      await expect(orchestrator.submit()).resolves.toBe('invalid');

      const snapshot = orchestrator.getSnapshot();
      expect(snapshot.annotations).toEqual({
        nome: 'Nome é obrigatório',
        funcao: 'Função é obrigatória',
        departamento: 'Departamento é obrigatório',
        telefone: 'Telefone é obrigatório',
        empresa: 'Empresa é obrigatória',
        'patrimonio[0]': 'Pelo menos um patrimônio é obrigatório',
      });
      expect(snapshot.notices.map((notice) => notice.message)).toEqual([
        'Formulário contém 6 erro(s). Corrija os campos destacados.',
      ]);
      expect(effects.scrollToField).toHaveBeenCalledWith('nome');
      expect(transport.payloads).toHaveLength(0);
      expect(progressSource.channels).toHaveLength(0);
      expect(snapshot.state).toBe('idle');
    });

    it('requires at least one asset across all groups', async () => {
      fillValidForm(orchestrator);
      orchestrator.setFieldValue('patrimonio[0]', '   ');

      await expect(orchestrator.submit()).resolves.toBe('invalid');
      expect(orchestrator.getSnapshot().annotations).toEqual({
        'patrimonio[0]': 'Pelo menos um patrimônio é obrigatório',
      });
      expect(orchestrator.getSnapshot().notices[0]?.message).toBe(
        'Formulário contém 1 erro(s). Corrija os campos destacados.'
      );
      expect(effects.scrollToField).toHaveBeenCalledWith('patrimonio[0]');
    });

    it('accepts an asset entered in a later group', () => {
      fillValidForm(orchestrator);
      orchestrator.setFieldValue('patrimonio[0]', '');
      orchestrator.addGroup();
      vi.advanceTimersByTime(500);
      orchestrator.setFieldValue('patrimonio[1]', 'PC123');

      expect(orchestrator.validateAll()).toEqual({ valid: true, errors: [] });
    });

    it('ignores groups that are being removed', () => {
      fillValidForm(orchestrator);
      orchestrator.addGroup();
      vi.advanceTimersByTime(500);
      orchestrator.setFieldValue('patrimonio[1]', 'X');
      orchestrator.removeGroup(1);

      expect(orchestrator.validateAll().valid).toBe(true);
    });

    it('requires the other-role field only for the "outros" role', () => {
      fillValidForm(orchestrator);
      orchestrator.setFieldValue('funcao', 'outros');

      expect(orchestrator.validateAll().errors).toEqual([
        { field: 'outrosFuncao', message: 'Especifique a função' },
      ]);

      orchestrator.setFieldValue('outrosFuncao', 'Auditora');
      expect(orchestrator.validateAll().valid).toBe(true);
    });

    it('clears the other-role field when another role is picked', () => {
      orchestrator.setFieldValue('funcao', 'outros');
      orchestrator.setFieldValue('outrosFuncao', 'Au');
      orchestrator.blurField('outrosFuncao');

      orchestrator.setFieldValue('funcao', 'gerente');

      const snapshot = orchestrator.getSnapshot();
      expect(snapshot.fields.outrosFuncao).toEqual({
        name: 'outrosFuncao',
        value: '',
        status: 'pristine',
      });
      expect(snapshot.annotations.outrosFuncao).toBeUndefined();
    });
  });

  describe('per-field interaction', () => {
    it('validates a field on blur', () => {
      orchestrator.setFieldValue('telefone', '1234');
      expect(orchestrator.blurField('telefone')).toBe(false);
      expect(orchestrator.getSnapshot().annotations.telefone).toBe(
        'Telefone deve ter pelo menos 10 dígitos'
      );

      orchestrator.setFieldValue('telefone', '11 3456-7890');
      expect(orchestrator.blurField('telefone')).toBe(true);
      expect(orchestrator.getSnapshot().fields.telefone.status).toBe('valid');
    });

    it('clears an invalid field as soon as the user types', () => {
      orchestrator.blurField('nome');
      expect(orchestrator.getSnapshot().fields.nome.status).toBe('invalid');

      orchestrator.setFieldValue('nome', 'A');
      expect(orchestrator.getSnapshot().fields.nome.status).toBe('pristine');
      expect(orchestrator.getSnapshot().annotations).toEqual({});
    });

    it('returns the same snapshot until something changes', () => {
      const first = orchestrator.getSnapshot();
      expect(orchestrator.getSnapshot()).toBe(first);

      orchestrator.setFieldValue('empresa', 'matriz');
      const second = orchestrator.getSnapshot();
      expect(second).not.toBe(first);
      expect(second.fields.empresa.value).toBe('matriz');
    });

    it('reflects group layout in the snapshot', () => {
      expect(orchestrator.addGroup()).toBe(1);
      expect(orchestrator.addGroup()).toBeNull();

      const snapshot = orchestrator.getSnapshot();
      expect(snapshot.layout).toEqual({ grouped: true, widthPx: 500 });
      expect(snapshot.canAddGroup).toBe(false);
      expect(snapshot.groups.map((group) => [group.id, group.removable])).toEqual([
        [0, false],
        [1, true],
      ]);
    });
  });

  describe('submission', () => {
    it('disables the submit control and ignores re-entry while submitting', async () => {
      fillValidForm(orchestrator);
      const pending = orchestrator.submit();

      expect(orchestrator.state).toBe('submitting');
      expect(orchestrator.getSnapshot().submitControl).toEqual({
        disabled: true,
        label: 'Enviando...',
      });
      await expect(orchestrator.submit()).resolves.toBe('ignored');
      expect(transport.payloads).toHaveLength(1);

      transport.respond({ kind: 'transport_failure', reason: 'network', message: 'x' });
      await pending;

      expect(orchestrator.state).toBe('idle');
      expect(orchestrator.getSnapshot().submitControl).toEqual({
        disabled: false,
        label: 'Enviar',
      });
    });

    it('sends the payload with assets in group order', async () => {
      fillValidForm(orchestrator);
      orchestrator.addGroup();
      orchestrator.setFieldValue('patrimonio[1]', 'PC123');
      orchestrator.setFieldValue('observacao[1]', 'sem carregador');

      const pending = orchestrator.submit();
      transport.respond(pdf());
      await pending;

      expect(transport.payloads[0]).toEqual({
        nome: 'Ana Souza',
        funcao: 'analista',
        outrosFuncao: '',
        departamento: 'ti',
        telefone: '(11) 3456-7890',
        empresa: 'matriz',
        patrimonio: ['CEL001', 'PC123'],
        observacao: ['', 'sem carregador'],
      });
    });

    it('shows progress lines in order and never the sentinel', async () => {
      fillValidForm(orchestrator);
      const pending = orchestrator.submit();
      const channel = progressSource.channels[0];

      channel?.push('Preenchendo modelo');
      await vi.advanceTimersByTimeAsync(0);
      expect(orchestrator.getSnapshot().progress).toEqual({
        text: 'Preenchendo modelo',
        phase: 'entering',
      });

      channel?.push('Convertendo para PDF');
      channel?.push('DONE');
      await vi.advanceTimersByTimeAsync(2500);
      expect(orchestrator.getSnapshot().progress).toEqual({
        text: 'Convertendo para PDF',
        phase: 'entering',
      });

      transport.respond(pdf());
      await pending;
      await vi.advanceTimersByTimeAsync(2500);

      expect(orchestrator.progress.history).toEqual(['Preenchendo modelo', 'Convertendo para PDF']);
    });

    it('closes the progress channel when the submission completes', async () => {
      fillValidForm(orchestrator);
      const pending = orchestrator.submit();
      transport.respond({ kind: 'transport_failure', reason: 'timeout', message: 'x' });
      await pending;

      expect(progressSource.channels[0]?.closed).toBe(true);
    });

    it('saves the document named after the person and reloads later', async () => {
      orchestrator.dispose();
      // Punctuated name: the default name pattern would reject it
      create({ ...DEFAULT_RULES, nome: { ...DEFAULT_RULES.nome, pattern: undefined } });
      fillValidForm(orchestrator, 'João Silva!!');

      const pending = orchestrator.submit();
      const payload = new Blob(['%PDF-1.4'], { type: 'application/pdf' });
      transport.respond({ kind: 'success', payload, contentType: 'application/pdf' });
      await expect(pending).resolves.toBe('success');

      expect(effects.saveFile).toHaveBeenCalledTimes(1);
      expect(effects.saveFile).toHaveBeenCalledWith(payload, 'Termo_de_entrega_Joao_Silva.pdf');
      expect(orchestrator.getSnapshot().successVisible).toBe(true);

      vi.advanceTimersByTime(2999);
      expect(effects.reload).not.toHaveBeenCalled();
      vi.advanceTimersByTime(1);
      expect(effects.reload).toHaveBeenCalledTimes(1);
    });

    it('dispose cancels the pending reload', async () => {
      fillValidForm(orchestrator);
      const pending = orchestrator.submit();
      transport.respond(pdf());
      await pending;

      orchestrator.dispose();
      vi.advanceTimersByTime(5000);
      expect(effects.reload).not.toHaveBeenCalled();
    });
  });

  describe('server validation failure', () => {
    it('annotates the named field and raises one aggregate notice', async () => {
      fillValidForm(orchestrator);
      const pending = orchestrator.submit();
      transport.respond({
        kind: 'validation_failure',
        errors: [{ field: 'telefone', message: 'Telefone não cadastrado' }],
      });
      await expect(pending).resolves.toBe('validation_failure');

      const snapshot = orchestrator.getSnapshot();
      expect(snapshot.fields.telefone.status).toBe('invalid');
      expect(snapshot.annotations).toEqual({ telefone: 'Telefone não cadastrado' });
      expect(snapshot.notices.map((notice) => notice.message)).toEqual([
        'Formulário contém 1 erro(s). Corrija os campos destacados.',
      ]);
      expect(effects.scrollToField).toHaveBeenCalledWith('telefone');
      expect(snapshot.state).toBe('idle');
    });

    it('resolves asset fields to the first group', async () => {
      fillValidForm(orchestrator);
      const pending = orchestrator.submit();
      transport.respond({
        kind: 'validation_failure',
        errors: [
          { field: 'patrimonio[]', message: 'Patrimônio não encontrado' },
          { field: 'observacao', message: 'Observação inválida' },
        ],
      });
      await pending;

      expect(orchestrator.getSnapshot().annotations).toEqual({
        'patrimonio[0]': 'Patrimônio não encontrado',
        'observacao[0]': 'Observação inválida',
      });
    });

    it('raises a notice for a field the form does not have', async () => {
      fillValidForm(orchestrator);
      const pending = orchestrator.submit();
      transport.respond({
        kind: 'validation_failure',
        errors: [{ field: 'cpf', message: 'CPF inválido' }],
      });
      await pending;

      const notices = orchestrator.getSnapshot().notices;
      expect(notices.map((notice) => [notice.label, notice.message])).toEqual([
        ['cpf', 'CPF inválido'],
        [undefined, 'Formulário contém 1 erro(s). Corrija os campos destacados.'],
      ]);
      expect(effects.scrollToField).not.toHaveBeenCalled();
    });
  });

  describe('transport failure', () => {
    it('shows exactly one notice for a network failure', async () => {
      fillValidForm(orchestrator);
      const pending = orchestrator.submit();
      transport.respond({
        kind: 'transport_failure',
        reason: 'network',
        message: 'Erro na conexão com o servidor',
      });
      await expect(pending).resolves.toBe('transport_failure');

      expect(orchestrator.getSnapshot().notices.map((notice) => notice.message)).toEqual([
        'Erro na conexão com o servidor',
      ]);
      expect(orchestrator.getSnapshot().annotations).toEqual({});
    });

    it('prefixes a server-reported error', async () => {
      fillValidForm(orchestrator);
      const pending = orchestrator.submit();
      transport.respond({
        kind: 'transport_failure',
        reason: 'server',
        message: 'Modelo não encontrado',
      });
      await pending;

      expect(orchestrator.getSnapshot().notices.map((notice) => notice.message)).toEqual([
        'Erro ao gerar documento: Modelo não encontrado',
      ]);
    });

    it('maps a throwing transport to a network failure', async () => {
      orchestrator.dispose();
      orchestrator = new SubmissionOrchestrator({
        client: { submit: () => Promise.reject(new Error('boom')) },
        progressSource,
        effects,
      });
      fillValidForm(orchestrator);

      await expect(orchestrator.submit()).resolves.toBe('transport_failure');
      expect(orchestrator.getSnapshot().notices.map((notice) => notice.message)).toEqual([
        'Erro na conexão com o servidor',
      ]);
      expect(orchestrator.state).toBe('idle');
    });

    it('returns to idle with one notice when the progress stream cannot be opened', async () => {
      orchestrator.dispose();
      orchestrator = new SubmissionOrchestrator({
        client: transport,
        progressSource: {
          open: () => {
            throw new ReferenceError('EventSource is not defined');
          },
        },
        effects,
      });
      fillValidForm(orchestrator);

      await expect(orchestrator.submit()).resolves.toBe('transport_failure');

      const snapshot = orchestrator.getSnapshot();
      expect(snapshot.state).toBe('idle');
      expect(snapshot.submitControl).toEqual({ disabled: false, label: 'Enviar' });
      expect(snapshot.notices.map((notice) => notice.message)).toEqual([
        'Erro na conexão com o servidor',
      ]);
      expect(transport.payloads).toHaveLength(0);
      await expect(orchestrator.submit()).resolves.toBe('transport_failure');
    });

    it('reports a document that cannot be saved instead of showing success', async () => {
      effects.saveFile.mockImplementation(() => {
        throw new TypeError('Blob URLs unavailable');
      });
      fillValidForm(orchestrator);
      const pending = orchestrator.submit();
      transport.respond(pdf());

      await expect(pending).resolves.toBe('transport_failure');

      const snapshot = orchestrator.getSnapshot();
      expect(snapshot.state).toBe('idle');
      expect(snapshot.successVisible).toBe(false);
      expect(snapshot.submitControl).toEqual({ disabled: false, label: 'Enviar' });
      expect(snapshot.notices.map((notice) => notice.message)).toEqual([
        'Erro ao gerar documento: Blob URLs unavailable',
      ]);
      vi.advanceTimersByTime(10_000);
      expect(effects.reload).not.toHaveBeenCalled();
    });

    it('expires the notice after five seconds', async () => {
      fillValidForm(orchestrator);
      const pending = orchestrator.submit();
      transport.respond({ kind: 'transport_failure', reason: 'timeout', message: 'x' });
      await pending;

      vi.advanceTimersByTime(5300);
      expect(orchestrator.getSnapshot().notices).toEqual([]);
    });
  });
});
