import type { HealthResponse, ScanResult } from './types.js';

export interface ScanClientOptions {
  baseUrl: string;
  fetchImpl?: typeof fetch;
  headers?: Record<string, string>;
  timeoutMs?: number;
}

export class ScanRequestError extends Error {
  public readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = 'ScanRequestError';
    this.status = status;
  }
}

function isScanResult(value: unknown): value is ScanResult {
  if (typeof value !== 'object' || value === null || !('found' in value)) {
    return false;
  }
  if (value.found === false) {
    return true;
  }
  return value.found === true && 'data' in value && typeof value.data === 'string' && 'type' in value && typeof value.type === 'string';
}

export function toDataUri(bytes: Uint8Array, mediaType = 'image/jpeg'): string {
  let binary = '';
  const chunkSize = 0x8000;
  for (let offset = 0; offset < bytes.length; offset += chunkSize) {
    binary += String.fromCharCode(...bytes.subarray(offset, offset + chunkSize));
  }
  return `data:${mediaType};base64,${btoa(binary)}`;
}

export class ScanClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly defaultHeaders: Record<string, string>;
  private readonly timeoutMs: number;

  constructor(options: ScanClientOptions) {
    if (!options.baseUrl) {
      throw new Error('baseUrl is required');
    }
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.fetchImpl = options.fetchImpl ?? globalThis.fetch.bind(globalThis);
    this.defaultHeaders = options.headers ?? {};
    this.timeoutMs = options.timeoutMs ?? 10000;
  }

  /** Posts one frame, either a data URI or bare base64. */
  async scan(image: string): Promise<ScanResult> {
    const body = await this.request('/scan', {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        ...this.defaultHeaders,
      },
      body: JSON.stringify({ image }),
    });

    if (!isScanResult(body)) {
      throw new ScanRequestError('Scan response did not match the expected shape');
    }
    return body;
  }

  async scanBytes(bytes: Uint8Array, mediaType = 'image/jpeg'): Promise<ScanResult> {
    return this.scan(toDataUri(bytes, mediaType));
  }

  async health(): Promise<HealthResponse> {
    const body = await this.request('/health', { method: 'GET', headers: this.defaultHeaders });
    if (typeof body !== 'object' || body === null || !('status' in body) || body.status !== 'ok') {
      throw new ScanRequestError('Health check returned an unexpected body');
    }
    return { status: 'ok' };
  }

  private async request(path: string, init: RequestInit): Promise<unknown> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const response = await this.fetchImpl(`${this.baseUrl}${path}`, { ...init, signal: controller.signal });
      if (!response.ok) {
        const message = await this.readErrorMessage(response);
        throw new ScanRequestError(`Request to ${path} failed with ${response.status}: ${message}`, response.status);
      }
      return await response.json();
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new ScanRequestError('Scan request timed out');
      }
      throw error;
    } finally {
      clearTimeout(timeout);
    }
  }

  private async readErrorMessage(response: Response): Promise<string> {
    try {
      const isJson = response.headers.get('content-type')?.includes('application/json') ?? false;
      if (isJson) {
        const parsed: unknown = await response.json();
        if (typeof parsed === 'object' && parsed !== null && 'error' in parsed && typeof parsed.error === 'string') {
          return parsed.error;
        }
        return JSON.stringify(parsed);
      }
      const text = await response.text();
      return text || '<empty>';
    } catch (err) {
      return `<failed to read error body: ${String(err)}>`;
    }
  }
}

export * from './types.js';
