// src/infrastructure/erp/client-credentials.token-provider.ts
import 'reflect-metadata';
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';
import { errorMessage, SubmissionError } from '../../core/common/errors';
import { AuthToken } from '../../core/common/interfaces/models';
import { IntegrationSettings, SETTINGS_TOKEN } from '../../core/common/interfaces/settings';
import { ITokenProvider } from '../../core/erp';
import { LOGGER_TOKEN } from '../logger';

/**
 * OAuth2 token endpoint response. expires_in arrives as a string from some authorities.
 */
interface TokenResponse {
    access_token: string;
    expires_in: number | string;
    token_type?: string;
}

const isTokenResponse = (value: unknown): value is TokenResponse =>
    typeof value === 'object' && value !== null
    && typeof Reflect.get(value, 'access_token') === 'string'
    && ['number', 'string'].includes(typeof Reflect.get(value, 'expires_in'));

/**
 * Acquires ERP bearer tokens with the OAuth2 client-credentials grant.
 */
@singleton()
@injectable()
export class ClientCredentialsTokenProvider implements ITokenProvider {

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger,
        @inject(SETTINGS_TOKEN) private settings: IntegrationSettings
    ) {
        this.logger.info('ClientCredentialsTokenProvider initialized.');
    }

    get tokenUrl(): string {
        const { authorityUrl, tenantId } = this.settings.erp;
        return `${authorityUrl}/${encodeURIComponent(tenantId)}/oauth2/token`;
    }

    async acquireToken(signal?: AbortSignal): Promise<AuthToken> {
        const { clientId, clientSecret, resource } = this.settings.erp;
        const issuedAt = new Date();

        let response: Response;
        let body: string;
        try {
            response = await fetch(this.tokenUrl, {
                method: 'POST',
                headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
                body: new URLSearchParams({
                    grant_type: 'client_credentials',
                    client_id: clientId,
                    client_secret: clientSecret,
                    resource,
                }),
                signal,
            });
            body = await response.text();
        } catch (error) {
            throw new SubmissionError(`ERP token request failed: ${errorMessage(error)}`, 'transient');
        }

        if (!response.ok) {
            this.logger.error(`ERP token request returned HTTP ${response.status}`);
            throw new SubmissionError(
                `ERP token request returned HTTP ${response.status}`,
                response.status >= 500 ? 'transient' : 'auth',
                { remoteStatus: response.status, responseBody: body }
            );
        }

        let data: unknown;
        try {
            data = JSON.parse(body);
        } catch {
            data = null;
        }
        const expiresIn = isTokenResponse(data) ? Number(data.expires_in) : NaN;
        if (!isTokenResponse(data) || !Number.isFinite(expiresIn)) {
            throw new SubmissionError('ERP token response did not contain an access token', 'auth', {
                remoteStatus: response.status,
            });
        }

        this.logger.info(`ERP access token acquired, expires in ${expiresIn} seconds`);
        return {
            accessToken: data.access_token,
            issuedAt,
            expiresAt: new Date(issuedAt.getTime() + expiresIn * 1000),
        };
    }
}
