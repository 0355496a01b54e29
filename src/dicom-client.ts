import dcmjsDimse from 'dcmjs-dimse';
import { formatError } from './errors.js';
import { Logger, silentLogger } from './logger.js';
import { DicomTarget, PayloadDescriptor, ProtocolClient, SendResult } from './types.js';

const { Client, requests } = dcmjsDimse;

export const STATUS_SUCCESS = 0x0000;

const STATUS_TEXT: Record<number, string> = {
  0x0110: 'Processing failure',
  0x0122: 'SOP class not supported',
  0x0124: 'Not authorized',
  0x0211: 'Unrecognized operation',
  0xa700: 'Refused: out of resources',
  0xa900: 'Dataset does not match SOP class',
  0xb000: 'Warning: coercion of data elements',
  0xb006: 'Warning: elements discarded',
  0xb007: 'Warning: dataset does not match SOP class',
  0xc000: 'Cannot understand',
};

export function describeStatus(status: number): string {
  const hex = `0x${status.toString(16).padStart(4, '0')}`;
  const text = STATUS_TEXT[status];
  return text ? `${text} (${hex})` : `Status ${hex}`;
}

/** Only a plain success status counts as stored; warnings are reported as rejections. */
export function classifyStoreStatus(status: number): SendResult {
  if (status === STATUS_SUCCESS) {
    return { kind: 'success', status };
  }
  return { kind: 'protocol-rejected', status, detail: describeStatus(status) };
}

export interface DimseClientOptions {
  connectTimeoutMs?: number;
  associationTimeoutMs?: number;
  pduTimeoutMs?: number;
  logger?: Logger;
}

interface DimseResponse {
  getStatus(): number;
}

type ClientRequest = Parameters<InstanceType<typeof Client>['addRequest']>[0];

type ResponseHook = (onResponse: (response: DimseResponse) => void) => void;

/**
 * ProtocolClient over dcmjs-dimse. Every call opens its own association,
 * issues one request and releases it.
 */
export class DimseProtocolClient implements ProtocolClient {
  private readonly options: DimseClientOptions;
  private readonly logger: Logger;

  constructor(options: DimseClientOptions = {}) {
    this.options = options;
    this.logger = options.logger ?? silentLogger;
  }

  async echo(target: DicomTarget): Promise<boolean> {
    const request = new requests.CEchoRequest();
    const result = await this.perform(target, request, onResponse => request.on('response', onResponse));
    if (result.kind !== 'success') {
      this.logger.debug(`C-ECHO to ${target.host}:${target.port} failed: ${result.detail}`);
    }
    return result.kind === 'success';
  }

  /** A payload the library cannot load is rejected without opening an association. */
  async send(target: DicomTarget, payload: PayloadDescriptor, signal?: AbortSignal): Promise<SendResult> {
    let request: InstanceType<typeof requests.CStoreRequest>;
    try {
      request = new requests.CStoreRequest(payload.path);
    } catch (error) {
      this.logger.debug(`Cannot load ${payload.path}: ${formatError(error)}`);
      return { kind: 'protocol-rejected', detail: `Cannot load ${payload.path}: ${formatError(error)}` };
    }
    return this.perform(target, request, onResponse => request.on('response', onResponse), signal);
  }

  private perform(
    target: DicomTarget,
    request: ClientRequest,
    listen: ResponseHook,
    signal?: AbortSignal,
  ): Promise<SendResult> {
    return new Promise<SendResult>(resolve => {
      const client = new Client();
      let response: SendResult | undefined;
      let settled = false;

      // Abort resolves the call; the association itself ends under its own timeouts
      const onAbort = () => settle({ kind: 'network-error', detail: 'Aborted' });
      const settle = (result: SendResult) => {
        if (settled) return;
        settled = true;
        signal?.removeEventListener('abort', onAbort);
        resolve(result);
      };

      listen(res => {
        response = classifyStoreStatus(res.getStatus());
      });
      client.on('associationRejected', (rejection: unknown) => {
        settle({ kind: 'protocol-rejected', detail: `Association rejected: ${JSON.stringify(rejection)}` });
      });
      client.on('networkError', (error: unknown) => {
        settle({ kind: 'network-error', detail: formatError(error) });
      });
      client.on('closed', () => {
        settle(response ?? { kind: 'network-error', detail: 'Association closed without a response' });
      });

      if (signal?.aborted) {
        settle({ kind: 'network-error', detail: 'Aborted before sending' });
        return;
      }
      signal?.addEventListener('abort', onAbort, { once: true });

      client.addRequest(request);
      client.send(target.host, target.port, target.callingAeTitle, target.calledAeTitle, {
        connectTimeout: this.options.connectTimeoutMs,
        associationTimeout: this.options.associationTimeoutMs,
        pduTimeout: this.options.pduTimeoutMs,
      });
    });
  }
}
