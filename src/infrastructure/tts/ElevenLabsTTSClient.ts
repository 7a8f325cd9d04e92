import axios from 'axios';
import { ITTSClient, TTSRequest, TTSResult } from '../../domain/ports/ITTSClient';
import { CharacterAlignment } from '../../domain/entities/TimedClip';

/**
 * Raised for any failed provider call. `status` is the HTTP status when
 * the provider answered, undefined for network failures.
 */
export class TTSProviderError extends Error {
    constructor(message: string, public readonly status?: number) {
        super(message);
        this.name = 'TTSProviderError';
    }
}

interface WireAlignment {
    characters: string[];
    character_start_times_seconds: number[];
    character_end_times_seconds: number[];
}

interface WireResponse {
    audio_base64: string;
    alignment?: WireAlignment | null;
}

function isNumberArray(value: unknown): value is number[] {
    return Array.isArray(value) && value.every((n) => typeof n === 'number');
}

function isWireAlignment(value: unknown): value is WireAlignment {
    if (typeof value !== 'object' || value === null) return false;
    const candidate: { [key: string]: unknown } = { ...value };
    return Array.isArray(candidate.characters)
        && candidate.characters.every((c: unknown) => typeof c === 'string')
        && isNumberArray(candidate.character_start_times_seconds)
        && isNumberArray(candidate.character_end_times_seconds);
}

function isWireResponse(value: unknown): value is WireResponse {
    if (typeof value !== 'object' || value === null) return false;
    const candidate: { [key: string]: unknown } = { ...value };
    if (typeof candidate.audio_base64 !== 'string') return false;
    return candidate.alignment === undefined
        || candidate.alignment === null
        || isWireAlignment(candidate.alignment);
}

function toAlignment(wire: WireAlignment | null | undefined): CharacterAlignment | undefined {
    if (!wire) return undefined;
    return {
        characters: wire.characters,
        characterStartTimesSeconds: wire.character_start_times_seconds,
        characterEndTimesSeconds: wire.character_end_times_seconds,
    };
}

function describeAxiosFailure(error: unknown): string {
    if (!axios.isAxiosError(error)) {
        return error instanceof Error ? error.message : String(error);
    }
    const data: unknown = error.response?.data;
    if (typeof data === 'object' && data !== null && 'detail' in data) {
        const detail = data.detail;
        if (typeof detail === 'string') return detail;
        if (typeof detail === 'object' && detail !== null && 'message' in detail && typeof detail.message === 'string') {
            return detail.message;
        }
    }
    return error.message;
}

/**
 * ElevenLabs client using the with-timestamps endpoint, which returns
 * base64 audio plus per-character alignment in one response.
 * Bound to a single API key; see KeyRotatingTTSClient for several.
 */
export class ElevenLabsTTSClient implements ITTSClient {
    private readonly apiKey: string;
    private readonly baseUrl: string;
    private readonly timeoutMs: number;

    constructor(apiKey: string, baseUrl: string = 'https://api.elevenlabs.io', timeoutMs: number = 120000) {
        if (!apiKey) {
            throw new Error('ElevenLabs API key is required');
        }
        this.apiKey = apiKey;
        this.baseUrl = baseUrl.replace(/\/+$/, '');
        this.timeoutMs = timeoutMs;
    }

    async synthesize(request: TTSRequest): Promise<TTSResult> {
        const text = request.text.trim();
        if (!text) {
            throw new Error('Text is required for TTS');
        }
        if (!request.voiceId) {
            throw new Error('Voice ID is required for TTS');
        }

        const settings = request.voiceSettings;
        const body = {
            text,
            model_id: request.modelId,
            voice_settings: {
                stability: settings.stability,
                similarity_boost: settings.similarityBoost,
                style: settings.style,
                speed: settings.speed,
                use_speaker_boost: settings.useSpeakerBoost,
            },
            seed: settings.seed,
            previous_text: request.previousText,
            next_text: request.nextText,
        };

        let data: unknown;
        try {
            const response = await axios.post<unknown>(
                `${this.baseUrl}/v1/text-to-speech/${encodeURIComponent(request.voiceId)}/with-timestamps`,
                body,
                {
                    headers: {
                        'xi-api-key': this.apiKey,
                        'Content-Type': 'application/json',
                        Accept: 'application/json',
                    },
                    params: { output_format: 'mp3_44100_128' },
                    timeout: this.timeoutMs,
                }
            );
            data = response.data;
        } catch (error) {
            const status = axios.isAxiosError(error) ? error.response?.status : undefined;
            throw new TTSProviderError(`ElevenLabs synthesis failed: ${describeAxiosFailure(error)}`, status);
        }

        if (!isWireResponse(data)) {
            throw new TTSProviderError('ElevenLabs returned an unexpected response shape');
        }
        const audio = Buffer.from(data.audio_base64, 'base64');
        if (audio.length === 0) {
            throw new TTSProviderError('ElevenLabs returned empty audio');
        }

        return {
            audio,
            format: 'mp3',
            alignment: toAlignment(data.alignment),
        };
    }
}
