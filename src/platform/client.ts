import { z } from 'zod';
import { PlatformSettings } from '../types';
import { PlatformApiError, errorMessage } from '../utils/errors';
import {
  CreateJobRequest,
  PlatformClient,
  PlatformJob,
  UpdateJobRequest,
  listJobsResponseSchema,
  platformJobSchema,
} from './types';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface HttpPlatformClientOptions {
  timeoutMs?: number;
  pageSize?: number;
  fetch?: FetchLike;
}

function extractServerMessage(body: unknown): string | null {
  if (typeof body === 'string') {
    return body.trim() || null;
  }
  if (typeof body === 'object' && body !== null) {
    if ('message' in body && typeof body.message === 'string' && body.message) {
      return body.message;
    }
    if ('error' in body && typeof body.error === 'string' && body.error) {
      return body.error;
    }
  }
  return null;
}

/**
 * Client for the platform's v2 REST API, scoped to the calls provisioning needs.
 */
export class HttpPlatformClient implements PlatformClient {
  private baseUrl: string;
  private apiKey: string;
  private timeoutMs: number;
  private pageSize: number;
  private fetchImpl: FetchLike;

  constructor(host: string, apiKey: string, options: HttpPlatformClientOptions = {}) {
    this.baseUrl = `${host.replace(/\/+$/, '')}/api/v2`;
    this.apiKey = apiKey;
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.pageSize = options.pageSize ?? 100;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
  }

  static fromSettings(settings: PlatformSettings, fetchImpl?: FetchLike): HttpPlatformClient {
    return new HttpPlatformClient(settings.host, settings.apiKey, {
      timeoutMs: settings.timeoutMs,
      pageSize: settings.pageSize,
      fetch: fetchImpl,
    });
  }

  private async request<T>(
    method: string,
    endpoint: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    body?: unknown
  ): Promise<T> {
    const url = `${this.baseUrl}${endpoint}`;
    const abortController = new AbortController();
    const aborted = new Promise<never>((_resolve, reject) => {
      abortController.signal.addEventListener('abort', () => reject(new Error('aborted')), {
        once: true,
      });
    });
    const timer = setTimeout(() => abortController.abort(), this.timeoutMs);

    // The timeout covers the body as well as the headers
    let response: Response;
    let text: string;
    try {
      response = await Promise.race([
        this.fetchImpl(url, {
          method,
          headers: {
            Authorization: `Bearer ${this.apiKey}`,
            Accept: 'application/json',
            ...(body !== undefined ? { 'Content-Type': 'application/json' } : {}),
          },
          body: body !== undefined ? JSON.stringify(body) : undefined,
          signal: abortController.signal,
        }),
        aborted,
      ]);
      text = await Promise.race([response.text(), aborted]);
    } catch (error) {
      const message = abortController.signal.aborted
        ? `${method} ${endpoint} timed out after ${this.timeoutMs}ms`
        : `${method} ${endpoint} failed: ${errorMessage(error)}`;
      throw new PlatformApiError(message, 0, method, endpoint);
    } finally {
      clearTimeout(timer);
    }

    let data: unknown = undefined;
    if (text) {
      try {
        data = JSON.parse(text);
      } catch {
        data = text;
      }
    }

    if (!response.ok) {
      const serverMessage = extractServerMessage(data) ?? response.statusText;
      throw new PlatformApiError(
        `${method} ${endpoint} returned HTTP ${response.status}${serverMessage ? `: ${serverMessage}` : ''}`,
        response.status,
        method,
        endpoint
      );
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      const issues = parsed.error.errors
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new PlatformApiError(
        `${method} ${endpoint} returned an unexpected response: ${issues}`,
        response.status,
        method,
        endpoint
      );
    }
    return parsed.data;
  }

  private jobsPath(projectId: string): string {
    return `/projects/${encodeURIComponent(projectId)}/jobs`;
  }

  async listJobs(projectId: string): Promise<PlatformJob[]> {
    const jobs: PlatformJob[] = [];
    const seenTokens = new Set<string>();
    let pageToken: string | undefined;

    do {
      const params = new URLSearchParams();
      params.append('page_size', this.pageSize.toString());
      if (pageToken) params.append('page_token', pageToken);
      const endpoint = `${this.jobsPath(projectId)}?${params.toString()}`;

      const page = await this.request('GET', endpoint, listJobsResponseSchema);
      jobs.push(...page.jobs);
      pageToken = page.next_page_token || undefined;

      if (pageToken) {
        if (seenTokens.has(pageToken)) {
          throw new PlatformApiError(
            `GET ${endpoint} returned page token "${pageToken}" more than once`,
            200,
            'GET',
            endpoint
          );
        }
        seenTokens.add(pageToken);
      }
    } while (pageToken);

    return jobs;
  }

  async createJob(projectId: string, request: CreateJobRequest): Promise<PlatformJob> {
    return this.request('POST', this.jobsPath(projectId), platformJobSchema, request);
  }

  async updateJob(
    projectId: string,
    jobId: string,
    request: UpdateJobRequest
  ): Promise<PlatformJob> {
    return this.request(
      'PATCH',
      `${this.jobsPath(projectId)}/${encodeURIComponent(jobId)}`,
      platformJobSchema,
      request
    );
  }
}
