import { describe, it, expect } from 'vitest';
import {
  DSSClient,
  DSSApiError,
  DSSClientClosedError,
  DSSNetworkError,
  DSSResponseError,
} from '../src/index.js';
import { fakeBackend } from './fake-fetch.js';

function clientFor(backend: ReturnType<typeof fakeBackend>): DSSClient {
  return new DSSClient({ host: 'http://dss.test:11200/', apiKey: 'test-key', fetch: backend.fetch });
}

describe('Request shape', () => {
  it('authenticates with the API key as basic-auth user', async () => {
    const backend = fakeBackend({ 'GET /projects/': { json: [] } });
    await clientFor(backend).listProjects();

    const expected = `Basic ${Buffer.from('test-key:').toString('base64')}`;
    expect(backend.calls[0]?.headers.get('authorization')).toBe(expected);
  });

  it('targets the public API under the host without doubling slashes', async () => {
    const backend = fakeBackend({ 'GET /projects/': { json: [] } });
    await clientFor(backend).listProjects();

    const url = String(backend.fetch.mock.calls[0]?.[0]);
    expect(url).toBe('http://dss.test:11200/public/api/projects/?includeLocation=false');
  });

  it('drops undefined query parameters', async () => {
    const backend = fakeBackend({ 'POST /projects/': { json: {} } });
    await clientFor(backend).createProject({ projectKey: 'P', name: 'p', owner: 'alice' });

    expect(backend.calls[0]?.params.has('projectFolderId')).toBe(false);
    expect(backend.calls[0]?.body).toEqual({ projectKey: 'P', name: 'p', owner: 'alice' });
  });

  it('returns null for an empty body', async () => {
    const backend = fakeBackend({ 'PUT /projects/P/metadata': { text: '' } });
    await expect(clientFor(backend).getProject('P').setMetadata({ label: 'x' })).resolves.toBeUndefined();
  });
});

describe('Errors', () => {
  it('builds the message from errorType and detailedMessage', async () => {
    const backend = fakeBackend({
      'GET /projects/NOPE/': {
        status: 404,
        json: {
          errorType: 'com.dataiku.dip.server.controllers.NotFoundException',
          message: 'short',
          detailedMessage: 'Project NOPE does not exist',
        },
      },
    });
    const err = await clientFor(backend).getProject('NOPE').getSummary().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(DSSApiError);
    const apiErr = err as DSSApiError;
    expect(apiErr.message).toBe(
      'com.dataiku.dip.server.controllers.NotFoundException: Project NOPE does not exist',
    );
    expect(apiErr.status).toBe(404);
    expect(apiErr.isNotFound).toBe(true);
    expect(apiErr.isForbidden).toBe(false);
  });

  it('keeps a plain-text error body as the message', async () => {
    const backend = fakeBackend({ 'GET /admin/users/': { status: 403, text: 'Forbidden' } });
    const err = await clientFor(backend).listUsers().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(DSSApiError);
    expect((err as DSSApiError).message).toBe('Unknown error: Forbidden');
    expect((err as DSSApiError).isForbidden).toBe(true);
  });

  it('wraps transport failures as network errors', async () => {
    const client = new DSSClient({
      host: 'http://dss.test',
      apiKey: 'test-key',
      fetch: async () => {
        throw new TypeError('fetch failed');
      },
    });
    const err = await client.listPlugins().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(DSSNetworkError);
    expect((err as Error).message).toBe('GET /plugins/ failed: fetch failed');
  });

  it('rejects malformed JSON', async () => {
    const backend = fakeBackend({ 'GET /plugins/': { text: '{not json' } });
    await expect(clientFor(backend).listPlugins()).rejects.toBeInstanceOf(DSSResponseError);
  });

  it('rejects a list endpoint that answers with an object', async () => {
    const backend = fakeBackend({ 'GET /projects/': { json: { projects: [] } } });
    await expect(clientFor(backend).listProjects()).rejects.toThrow(
      'Expected a list for project list, got object',
    );
  });
});

describe('close()', () => {
  it('rejects calls made after close without reaching the backend', async () => {
    const backend = fakeBackend({ 'GET /plugins/': { json: [] } });
    const client = clientFor(backend);
    client.close();

    await expect(client.listPlugins()).rejects.toBeInstanceOf(DSSClientClosedError);
    expect(backend.calls).toHaveLength(0);
    expect(client.closed).toBe(true);
  });

  it('aborts a request still in flight', async () => {
    const client = new DSSClient({
      host: 'http://dss.test',
      apiKey: 'test-key',
      fetch: (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        }),
    });
    const pending = client.listPlugins();
    client.close();

    await expect(pending).rejects.toBeInstanceOf(DSSClientClosedError);
  });
});
