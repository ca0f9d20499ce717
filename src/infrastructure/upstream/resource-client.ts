import { z } from 'zod';
import { RequestFailed, errorFromStatus } from '../../domain/index.js';
import type { ResourceSection } from '../config/index.js';

export const RESOURCE_TYPES = ['auction', 'lot', 'asset', 'contract'] as const;
export type ResourceType = (typeof RESOURCE_TYPES)[number];

type Fetch = typeof fetch;

/** API responses wrap the resource in `data`. */
const envelopeSchema = z.object({
  data: z.record(z.string(), z.unknown()),
});

export type ResourceData = Record<string, unknown>;

/**
 * Client for one collection of the registry API
 * (`{url}/api/{version}/{resource}s`).
 *
 * The API token is sent as the Basic auth user name.
 */
export class ResourceClient {
  readonly baseUrl: string;
  private readonly headers: Record<string, string>;

  constructor(
    readonly resource: ResourceType,
    private readonly section: ResourceSection,
    private readonly fetchImpl: Fetch = fetch,
  ) {
    const { url, version, token } = section.api;
    this.baseUrl = `${url.replace(/\/+$/, '')}/api/${version}/${resource}s`;
    this.headers = {
      Accept: 'application/json',
      'Content-Type': 'application/json',
      Authorization: `Basic ${Buffer.from(`${token}:`).toString('base64')}`,
    };
  }

  /** True when uploads can go through the document service. */
  get hasDocumentService(): boolean {
    return this.section.ds !== undefined;
  }

  async get(id: string): Promise<ResourceData> {
    return this.send('GET', `${this.baseUrl}/${encodeURIComponent(id)}`);
  }

  async create(data: ResourceData): Promise<ResourceData> {
    return this.send('POST', this.baseUrl, data);
  }

  async patch(id: string, data: ResourceData): Promise<ResourceData> {
    return this.send('PATCH', `${this.baseUrl}/${encodeURIComponent(id)}`, data);
  }

  private async send(method: string, url: string, data?: ResourceData): Promise<ResourceData> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers: this.headers,
        body: data === undefined ? undefined : JSON.stringify({ data }),
      });
    } catch (err: unknown) {
      throw new RequestFailed(`${method} ${url} could not reach the server`, 503, undefined, { cause: err });
    }

    const text = await response.text();
    let body: unknown = text;
    try {
      body = text === '' ? undefined : JSON.parse(text);
    } catch {
      body = text;
    }

    if (!response.ok) {
      throw errorFromStatus(response.status, `${method} ${this.resource} failed with ${response.status}`, body);
    }
    return envelopeSchema.parse(body).data;
  }
}
