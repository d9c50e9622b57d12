import axios, { type AxiosInstance } from 'axios';
import { ParseFailure, TransportFailure } from '../gas/errors';

export type HttpHeaders = Record<string, string>;

export interface GetJsonOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

/** Fetches a URL and hands back its JSON body. Shape checks are left to the caller. */
export interface HttpTransport {
  getJson(url: string, headers?: HttpHeaders, options?: GetJsonOptions): Promise<unknown>;
}

export class AxiosHttpTransport implements HttpTransport {
  private readonly client: AxiosInstance;

  constructor(client?: AxiosInstance) {
    this.client =
      client ??
      axios.create({
        headers: { Accept: 'application/json' },
        timeout: 10_000,
      });
  }

  async getJson(
    url: string,
    headers: HttpHeaders = {},
    options: GetJsonOptions = {},
  ): Promise<unknown> {
    let data: unknown;
    try {
      const response = await this.client.get<unknown>(url, {
        headers,
        signal: options.signal,
        timeout: options.timeoutMs,
        responseType: 'text',
        // raw body, parsed below
        transformResponse: [(body: unknown) => body],
      });
      data = response.data;
    } catch (error) {
      if (axios.isCancel(error) || options.signal?.aborted) {
        throw new TransportFailure(`Request to ${url} aborted`, { aborted: true, cause: error });
      }
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        throw new TransportFailure(
          status !== undefined
            ? `GET ${url} failed with status ${status}`
            : `GET ${url} failed: ${error.message}`,
          { status, cause: error },
        );
      }
      throw new TransportFailure(`GET ${url} failed`, { cause: error });
    }

    if (typeof data !== 'string') {
      return data;
    }
    try {
      const parsed: unknown = JSON.parse(data);
      return parsed;
    } catch (error) {
      throw new ParseFailure(`GET ${url} returned a body that is not JSON`, { cause: error });
    }
  }
}
