import { ITTSClient, TTSRequest, TTSResult } from '../../domain/ports/ITTSClient';
import { TTSProviderError } from './ElevenLabsTTSClient';

export class CredentialsExhaustedError extends Error {
    constructor(public readonly attempts: number, public readonly lastError: Error) {
        super(`All ${attempts} TTS credentials exhausted; last error: ${lastError.message}`);
        this.name = 'CredentialsExhaustedError';
    }
}

/**
 * Failures that another key may not hit: rate limits, quota or auth
 * problems on this key, provider outages and network errors.
 */
export function isRotatableError(error: unknown): error is TTSProviderError {
    if (!(error instanceof TTSProviderError)) {
        return false;
    }
    if (error.status === undefined) {
        return true;
    }
    return error.status === 429
        || error.status === 401
        || error.status === 402
        || error.status >= 500;
}

/**
 * Spreads synthesis calls over several API keys, round-robin.
 *
 * Each attempt takes the next key in the cycle, so consecutive calls use
 * different keys. A rotatable failure moves on to the next key; once every
 * key has failed for the same request the call gives up.
 */
export class KeyRotatingTTSClient implements ITTSClient {
    private readonly clients: ITTSClient[];
    private cursor = 0;

    constructor(apiKeys: string[], createClient: (apiKey: string) => ITTSClient) {
        const keys = apiKeys.filter((key) => key.trim().length > 0);
        if (keys.length === 0) {
            throw new Error('At least one TTS API key is required');
        }
        this.clients = keys.map((key) => createClient(key));
    }

    get keyCount(): number {
        return this.clients.length;
    }

    async synthesize(request: TTSRequest): Promise<TTSResult> {
        let lastError: Error = new Error('no attempt made');

        for (let attempt = 1; attempt <= this.clients.length; attempt++) {
            const slot = this.cursor;
            this.cursor = (this.cursor + 1) % this.clients.length;

            try {
                return await this.clients[slot].synthesize(request);
            } catch (error) {
                if (!isRotatableError(error)) {
                    throw error;
                }
                lastError = error;
                console.warn(`[TTS] Key #${slot + 1} failed (${lastError.message}), rotating`);
            }
        }

        throw new CredentialsExhaustedError(this.clients.length, lastError);
    }
}
