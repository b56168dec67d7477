import { describe, expect, it, vi } from 'vitest';
import { HttpPlatformClient } from '../platform/client';
import { CreateJobRequest, UpdateJobRequest } from '../platform/types';
import { PlatformApiError } from '../utils/errors';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function stubFetch(responses: Response[]) {
  return vi.fn(async (_url: string, _init: RequestInit) => {
    const next = responses.shift();
    if (!next) throw new Error('unexpected request');
    return next;
  });
}

const BASE = 'https://ml.example.com/api/v2';

describe('HttpPlatformClient.listJobs', () => {
  it('follows page tokens until the last page', async () => {
    const fetchMock = stubFetch([
      jsonResponse({ jobs: [{ id: 'j1', name: 'A' }], next_page_token: 't2' }),
      jsonResponse({ jobs: [{ id: 'j2', name: 'B', environment: '{"X":"1"}' }], next_page_token: '' }),
    ]);
    const client = new HttpPlatformClient('https://ml.example.com/', 'test-key', {
      pageSize: 50,
      fetch: fetchMock,
    });

    const jobs = await client.listJobs('proj-1');

    expect(jobs.map((job) => job.id)).toEqual(['j1', 'j2']);
    expect(jobs[1].environment).toBe('{"X":"1"}');
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(fetchMock.mock.calls[0][0]).toBe(`${BASE}/projects/proj-1/jobs?page_size=50`);
    expect(fetchMock.mock.calls[1][0]).toBe(`${BASE}/projects/proj-1/jobs?page_size=50&page_token=t2`);
    expect(fetchMock.mock.calls[0][1].method).toBe('GET');
    expect(fetchMock.mock.calls[0][1].headers).toEqual({
      Authorization: 'Bearer test-key',
      Accept: 'application/json',
    });
  });

  it('treats a missing jobs array as an empty project', async () => {
    const client = new HttpPlatformClient('https://ml.example.com', 'test-key', {
      fetch: stubFetch([jsonResponse({})]),
    });
    await expect(client.listJobs('proj-1')).resolves.toEqual([]);
  });
});

describe('HttpPlatformClient writes', () => {
  it('posts a create request as JSON', async () => {
    const request: CreateJobRequest = {
      project_id: 'proj-1',
      name: 'Train',
      script: 'train.py',
      kernel: 'python3',
      cpu: 2,
      memory: 4,
      timeout: 600,
      parent_job_id: 'env-1',
    };
    const fetchMock = stubFetch([jsonResponse({ id: 'new-1', name: 'Train', parent_id: 'env-1' })]);
    const client = new HttpPlatformClient('https://ml.example.com', 'test-key', { fetch: fetchMock });

    const job = await client.createJob('proj-1', request);

    expect(job).toEqual({ id: 'new-1', name: 'Train', parent_id: 'env-1' });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe(`${BASE}/projects/proj-1/jobs`);
    expect(init.method).toBe('POST');
    expect(init.body).toBe(JSON.stringify(request));
    expect(init.headers).toEqual({
      Authorization: 'Bearer test-key',
      Accept: 'application/json',
      'Content-Type': 'application/json',
    });
  });

  it('patches an existing job by id', async () => {
    const request: UpdateJobRequest = {
      name: 'Train',
      script: 'train.py',
      kernel: 'python3',
      cpu: 2,
      memory: 4,
      nvidia_gpu: 0,
      timeout: 600,
      arguments: '',
      environment: '{}',
      attachments: [],
      schedule: '',
      parent_id: 'env-1',
    };
    const fetchMock = stubFetch([jsonResponse({ id: 'job 7', name: 'Train' })]);
    const client = new HttpPlatformClient('https://ml.example.com', 'test-key', { fetch: fetchMock });

    await client.updateJob('proj-1', 'job 7', request);

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe(`${BASE}/projects/proj-1/jobs/job%207`);
    expect(init.method).toBe('PATCH');
    expect(init.body).toBe(JSON.stringify(request));
  });
});

describe('HttpPlatformClient errors', () => {
  it('surfaces the server message with the HTTP status', async () => {
    const client = new HttpPlatformClient('https://ml.example.com', 'test-key', {
      fetch: stubFetch([jsonResponse({ message: 'project not found' }, 404)]),
    });

    const promise = client.listJobs('missing');
    await expect(promise).rejects.toBeInstanceOf(PlatformApiError);
    await expect(promise).rejects.toMatchObject({
      status: 404,
      method: 'GET',
      message: 'GET /projects/missing/jobs?page_size=100 returned HTTP 404: project not found',
    });
  });

  it('uses a plain-text error body as the message', async () => {
    const client = new HttpPlatformClient('https://ml.example.com', 'test-key', {
      fetch: stubFetch([new Response('upstream exploded', { status: 502 })]),
    });

    await expect(client.createJob('proj-1', {
      project_id: 'proj-1',
      name: 'A',
      script: 'a.py',
      kernel: 'python3',
      cpu: 1,
      memory: 1,
      timeout: 60,
    })).rejects.toMatchObject({
      status: 502,
      message: 'POST /projects/proj-1/jobs returned HTTP 502: upstream exploded',
    });
  });

  it('rejects a response that does not look like a job', async () => {
    const client = new HttpPlatformClient('https://ml.example.com', 'test-key', {
      fetch: stubFetch([jsonResponse({ name: 'A' })]),
    });

    await expect(client.createJob('proj-1', {
      project_id: 'proj-1',
      name: 'A',
      script: 'a.py',
      kernel: 'python3',
      cpu: 1,
      memory: 1,
      timeout: 60,
    })).rejects.toThrow('POST /projects/proj-1/jobs returned an unexpected response: id: Required');
  });

  it('aborts a request that exceeds the timeout', async () => {
    const fetchMock = vi.fn(
      (_url: string, init: RequestInit) =>
        new Promise<Response>((_resolve, reject) => {
          init.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        })
    );
    const client = new HttpPlatformClient('https://ml.example.com', 'test-key', {
      timeoutMs: 20,
      fetch: fetchMock,
    });

    await expect(client.listJobs('proj-1')).rejects.toMatchObject({
      status: 0,
      message: 'GET /projects/proj-1/jobs?page_size=100 timed out after 20ms',
    });
  });

  it('times out a response whose body stalls after the headers', async () => {
    const stalled = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(new TextEncoder().encode('{"jobs":['));
      },
    });
    const client = new HttpPlatformClient('https://ml.example.com', 'test-key', {
      timeoutMs: 50,
      fetch: stubFetch([new Response(stalled, { status: 200 })]),
    });

    await expect(client.listJobs('proj-1')).rejects.toMatchObject({
      status: 0,
      message: 'GET /projects/proj-1/jobs?page_size=100 timed out after 50ms',
    });
  });

  it('wraps a body that fails midway', async () => {
    const broken = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.error(new TypeError('terminated'));
      },
    });
    const client = new HttpPlatformClient('https://ml.example.com', 'test-key', {
      fetch: stubFetch([new Response(broken, { status: 200 })]),
    });

    const promise = client.listJobs('proj-1');
    await expect(promise).rejects.toBeInstanceOf(PlatformApiError);
    await expect(promise).rejects.toMatchObject({
      status: 0,
      message: 'GET /projects/proj-1/jobs?page_size=100 failed: terminated',
    });
  });

  it('stops when the server repeats a page token', async () => {
    const client = new HttpPlatformClient('https://ml.example.com', 'test-key', {
      fetch: stubFetch([
        jsonResponse({ jobs: [{ id: 'j1', name: 'A' }], next_page_token: 't1' }),
        jsonResponse({ jobs: [{ id: 'j2', name: 'B' }], next_page_token: 't1' }),
      ]),
    });

    await expect(client.listJobs('proj-1')).rejects.toThrow(
      'GET /projects/proj-1/jobs?page_size=100&page_token=t1 returned page token "t1" more than once'
    );
  });

  it('reports connection failures with status 0', async () => {
    const client = new HttpPlatformClient('https://ml.example.com', 'test-key', {
      fetch: vi.fn(async () => {
        throw new Error('connect ECONNREFUSED');
      }),
    });

    await expect(client.listJobs('proj-1')).rejects.toMatchObject({
      status: 0,
      message: 'GET /projects/proj-1/jobs?page_size=100 failed: connect ECONNREFUSED',
    });
  });
});
