/**
 * Document Request API Client
 * Sends the form as one multipart request and classifies the response
 */

import { z } from 'zod';
import type { SubmissionPayload } from '../types/form';
import type { SubmissionResult, TransportFailureReason } from '../types/error';
import { getLogger } from '../logging';

/**
 * Anything that can deliver a submission and classify the outcome
 */
export interface SubmissionTransport {
  submit(payload: SubmissionPayload): Promise<SubmissionResult>;
}

/**
 * API client configuration options
 */
export interface ApiClientConfig {
  /** Base URL prepended to the submit path (default: same origin) */
  baseUrl?: string;
  /** Path the form is posted to (default: "/") */
  submitPath?: string;
  /** Abort the request after this many milliseconds (default: 120000) */
  timeoutMs?: number;
  /** Custom headers to include in the request */
  headers?: Record<string, string>;
  /** fetch implementation (default: global fetch) */
  fetch?: typeof fetch;
}

export const PDF_CONTENT_TYPE = 'application/pdf';

export const TRANSPORT_MESSAGES: Readonly<Record<TransportFailureReason, string>> = {
  network: 'Erro na conexão com o servidor',
  timeout: 'Tempo limite excedido ao gerar o documento',
  server: 'Erro desconhecido',
  malformed: 'Erro na comunicação com o servidor',
  unexpected: 'Erro desconhecido',
};

const validationErrorBodySchema = z.object({
  validation_errors: z.array(
    z.object({
      field: z.string(),
      message: z.string(),
    })
  ),
});

const errorBodySchema = z.object({
  error: z.string(),
});

function transportFailure(reason: TransportFailureReason, message?: string): SubmissionResult {
  return {
    kind: 'transport_failure',
    reason,
    message: message || TRANSPORT_MESSAGES[reason],
  };
}

/** Longest excerpt of a non-JSON body shown to the user */
export const MAX_BODY_EXCERPT = 200;

function excerpt(text: string): string {
  const collapsed = text.replace(/\s+/g, ' ').trim();
  return collapsed.length > MAX_BODY_EXCERPT
    ? `${collapsed.slice(0, MAX_BODY_EXCERPT)}...`
    : collapsed;
}

/**
 * Build the multipart body: scalar fields first, then one asset code and
 * one note per group, in group order.
 */
export function buildSubmissionBody(payload: SubmissionPayload): FormData {
  const body = new FormData();
  body.append('nome', payload.nome);
  body.append('funcao', payload.funcao);
  body.append('outrosFuncao', payload.outrosFuncao);
  body.append('departamento', payload.departamento);
  body.append('telefone', payload.telefone);
  body.append('empresa', payload.empresa);
  payload.patrimonio.forEach((asset, index) => {
    body.append('patrimonio[]', asset);
    body.append('observacao[]', payload.observacao[index] ?? '');
  });
  return body;
}

/**
 * Classify a server response.
 *
 * 200 with a PDF body is a success. A JSON body carrying `validation_errors`
 * is a validation failure; one carrying `error` is a server-reported
 * transport failure. A body that is not JSON is reported with an excerpt
 * of its text. Everything else is a transport failure.
 */
export async function classifyResponse(response: Response): Promise<SubmissionResult> {
  const contentType = response.headers.get('Content-Type') ?? '';
  const mediaType = (contentType.split(';')[0] ?? '').trim().toLowerCase();

  if (response.status === 200 && mediaType === PDF_CONTENT_TYPE) {
    const payload = await response.blob();
    return { kind: 'success', payload, contentType: mediaType };
  }

  const text = await response.text();
  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    getLogger().warn(
      { logger: 'api-client', status: response.status, contentType },
      'Response body is not JSON'
    );
    return transportFailure('malformed', excerpt(text));
  }

  const validation = validationErrorBodySchema.safeParse(body);
  if (validation.success) {
    return { kind: 'validation_failure', errors: validation.data.validation_errors };
  }

  const error = errorBodySchema.safeParse(body);
  if (error.success) {
    return transportFailure('server', error.data.error);
  }

  return transportFailure('unexpected', `HTTP ${response.status}`);
}

/**
 * Document request API client
 *
 * @example
 * ```typescript
 * const client = new DocumentRequestClient({ timeoutMs: 60_000 });
 * const result = await client.submit(formState.toPayload());
 * if (result.kind === 'success') {
 *   saveFile(result.payload, 'Termo_de_entrega_Ana.pdf');
 * }
 * ```
 */
export class DocumentRequestClient implements SubmissionTransport {
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly headers: Record<string, string>;
  private readonly fetchImpl: typeof fetch;

  constructor(config: ApiClientConfig = {}) {
    this.url = `${config.baseUrl ?? ''}${config.submitPath ?? '/'}`;
    this.timeoutMs = config.timeoutMs ?? 120_000;
    // No Content-Type: the multipart boundary is set by fetch
    this.headers = { ...config.headers };
    this.fetchImpl = config.fetch ?? ((input, init) => fetch(input, init));
  }

  /**
   * Post the form. Never rejects: network errors and timeouts come back as
   * transport failures.
   */
  async submit(payload: SubmissionPayload): Promise<SubmissionResult> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(this.url, {
        method: 'POST',
        headers: this.headers,
        body: buildSubmissionBody(payload),
        signal: controller.signal,
      });
      return await classifyResponse(response);
    } catch (error) {
      if (controller.signal.aborted) {
        getLogger().warn({ logger: 'api-client', timeoutMs: this.timeoutMs }, 'Submission timed out');
        return transportFailure('timeout');
      }
      getLogger().warn({ logger: 'api-client', err: error }, 'Submission request failed');
      return transportFailure('network');
    } finally {
      clearTimeout(timer);
    }
  }
}

/**
 * Create a new API client instance
 */
export function createApiClient(config?: ApiClientConfig): DocumentRequestClient {
  return new DocumentRequestClient(config);
}
