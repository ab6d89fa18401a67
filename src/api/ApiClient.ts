import { Logging } from 'homebridge';
import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { API_HOST, REQUEST_TIMEOUT_MS, STATIC_HEADERS } from './constants';
import { sign } from './signature';
import { ApiSchema, ResponseEnvelope, ResponseEnvelopeSchema } from './types';
import { DecodeError, MissingResultError, ServerError, TransportError } from './errors';

export type HttpMethod = 'GET' | 'POST';

export interface ApiClientOptions {
  baseURL?: string;
  timeout?: number;
  /** IANA zone sent in the `timezone` header. Defaults to the host's zone. */
  timezone?: string;
  now?: () => number;
}

export interface RequestOptions {
  /** Sent as the `token` header and folded into the signature. Omitted before authentication. */
  token?: string;
}

export function decodeEnvelope(data: unknown, path: string): ResponseEnvelope<unknown> {
  const parsed = ResponseEnvelopeSchema.safeParse(data);
  if (!parsed.success) {
    throw new DecodeError(path, parsed.error.issues);
  }
  return parsed.data;
}

/**
 * Returns the result of a successful envelope. A nonzero code wins over any
 * result that came with it.
 */
export function unwrapEnvelope<T>(envelope: ResponseEnvelope<T>, path: string): T {
  if (envelope.errorCode !== 0) {
    throw new ServerError(path, envelope.errorCode);
  }
  if (envelope.result === undefined) {
    throw new MissingResultError(path);
  }
  return envelope.result;
}

export class ApiClient {
  private readonly http: AxiosInstance;
  public readonly timeout: number;
  private readonly timezone: string;
  private readonly now: () => number;

  constructor(
    private readonly log: Logging,
    options: ApiClientOptions = {},
  ) {
    this.timezone = options.timezone ?? Intl.DateTimeFormat().resolvedOptions().timeZone;
    this.now = options.now ?? Date.now;
    this.timeout = options.timeout ?? REQUEST_TIMEOUT_MS;

    this.http = axios.create({
      baseURL: options.baseURL ?? API_HOST,
      timeout: this.timeout,
      headers: STATIC_HEADERS,
      proxy: false,
    });
  }

  private buildHeaders(path: string, token: string | undefined): Record<string, string> {
    const timestamp = this.now();
    const signature = sign(path, token ?? '', timestamp);

    this.log.debug(`Setting up headers for ${path}`);
    this.log.debug(`Timestamp: ${timestamp}`);
    this.log.debug(`Signature: ${signature}`);

    const headers: Record<string, string> = {
      timezone: this.timezone,
      timestamp: String(timestamp),
      signature,
    };
    if (token !== undefined) {
      headers['token'] = token;
    }
    return headers;
  }

  public async request<T>(
    path: string,
    method: HttpMethod,
    body: unknown,
    schema: ApiSchema<T>,
    options: RequestOptions = {},
  ): Promise<T> {
    this.log.debug(`Fetching ${path}`);

    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.request<unknown>({
        url: path,
        method,
        data: method === 'GET' ? undefined : body,
        headers: this.buildHeaders(path, options.token),
      });
    } catch (error) {
      // The axios error holds the request headers, token included, so only its status and message travel on.
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        this.log.debug(`Request to ${path} failed: ${status ?? error.message}`);
        throw new TransportError(path, status, error.message);
      }
      throw new TransportError(path, undefined, error instanceof Error ? error.message : String(error));
    }

    this.log.debug(`Status code: ${response.status}`);

    const result = unwrapEnvelope(decodeEnvelope(response.data, path), path);
    const parsed = schema.safeParse(result);
    if (!parsed.success) {
      throw new DecodeError(path, parsed.error.issues);
    }
    return parsed.data;
  }
}
