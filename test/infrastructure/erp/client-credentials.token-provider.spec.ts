// test/infrastructure/erp/client-credentials.token-provider.spec.ts
import { SubmissionError } from '../../../src/core/common/errors';
import { ClientCredentialsTokenProvider } from '../../../src/infrastructure/erp';
import { createTestLogger } from '../../fakes/logger';
import { buildSettings } from '../../fakes/settings';

describe('ClientCredentialsTokenProvider', () => {
    let fetchMock: jest.SpiedFunction<typeof fetch>;
    const provider = new ClientCredentialsTokenProvider(createTestLogger(), buildSettings());

    beforeEach(() => {
        fetchMock = jest.spyOn(global, 'fetch');
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('requests a client-credentials token from the tenant endpoint', async () => {
        fetchMock.mockResolvedValueOnce(new Response(JSON.stringify({ access_token: 'abc', expires_in: 3600, token_type: 'Bearer' })));

        const token = await provider.acquireToken();

        const [url, init] = fetchMock.mock.calls[0];
        expect(url).toBe('https://login.example.test/tenant-1/oauth2/token');
        expect(init?.method).toBe('POST');
        const body = init?.body;
        expect(body).toBeInstanceOf(URLSearchParams);
        const params = new URLSearchParams(String(body));
        expect(params.get('grant_type')).toBe('client_credentials');
        expect(params.get('client_id')).toBe('client-1');
        expect(params.get('client_secret')).toBe('test-secret');
        expect(params.get('resource')).toBe('https://erp.example.test');

        expect(token.accessToken).toBe('abc');
        expect(token.expiresAt.getTime() - token.issuedAt.getTime()).toBe(3600 * 1000);
    });

    it('accepts expires_in as a string', async () => {
        fetchMock.mockResolvedValueOnce(new Response('{"access_token":"abc","expires_in":"1800"}'));

        const token = await provider.acquireToken();

        expect(token.expiresAt.getTime() - token.issuedAt.getTime()).toBe(1800 * 1000);
    });

    it('reports a refused grant as an auth failure', async () => {
        fetchMock.mockResolvedValueOnce(new Response('{"error":"invalid_client"}', { status: 400 }));

        await expect(provider.acquireToken()).rejects.toMatchObject({
            kind: 'auth',
            remoteStatus: 400,
            message: 'ERP token request returned HTTP 400',
        });
    });

    it('reports an authority outage as transient', async () => {
        fetchMock.mockResolvedValueOnce(new Response('down', { status: 503 }));

        await expect(provider.acquireToken()).rejects.toMatchObject({ kind: 'transient', remoteStatus: 503 });
    });

    it('reports a network failure as transient', async () => {
        fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));

        const error = await provider.acquireToken().catch((e: unknown) => e);

        expect(error).toBeInstanceOf(SubmissionError);
        expect(error).toMatchObject({ kind: 'transient', message: 'ERP token request failed: fetch failed' });
    });

    it('rejects a response without an access token', async () => {
        fetchMock.mockResolvedValueOnce(new Response('{"expires_in":3600}'));

        await expect(provider.acquireToken()).rejects.toMatchObject({
            kind: 'auth',
            message: 'ERP token response did not contain an access token',
        });
    });
});
