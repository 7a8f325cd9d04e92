import nock from 'nock';
import { ElevenLabsTTSClient, TTSProviderError } from '../../../../src/infrastructure/tts/ElevenLabsTTSClient';
import { DEFAULT_VOICE_SETTINGS } from '../../../../src/domain/entities/Blueprint';
import { TTSRequest } from '../../../../src/domain/ports/ITTSClient';

describe('ElevenLabsTTSClient', () => {
    const apiKey = 'test-api-key';
    const baseUrl = 'https://tts.test';
    const endpoint = '/v1/text-to-speech/voice-1/with-timestamps';

    const request: TTSRequest = {
        text: ' Hi. ',
        voiceId: 'voice-1',
        modelId: 'model-1',
        voiceSettings: { ...DEFAULT_VOICE_SETTINGS, seed: 7 },
        previousText: 'Before.',
    };

    beforeEach(() => {
        nock.cleanAll();
    });

    afterEach(() => {
        nock.cleanAll();
    });

    describe('Constructor validation', () => {
        it('should throw error when API key is missing', () => {
            expect(() => new ElevenLabsTTSClient('', baseUrl)).toThrow('ElevenLabs API key is required');
        });
    });

    describe('synthesize() - Input validation', () => {
        it('should throw error for whitespace-only text', async () => {
            const client = new ElevenLabsTTSClient(apiKey, baseUrl);
            await expect(client.synthesize({ ...request, text: '   ' })).rejects.toThrow('Text is required for TTS');
        });

        it('should throw error for a missing voice', async () => {
            const client = new ElevenLabsTTSClient(apiKey, baseUrl);
            await expect(client.synthesize({ ...request, voiceId: '' })).rejects.toThrow('Voice ID is required for TTS');
        });
    });

    describe('synthesize() - success', () => {
        it('should send settings and neighbours and decode audio with alignment', async () => {
            let sentBody: unknown;
            nock(baseUrl)
                .matchHeader('xi-api-key', apiKey)
                .post(endpoint, (body) => {
                    sentBody = body;
                    return true;
                })
                .query({ output_format: 'mp3_44100_128' })
                .reply(200, {
                    audio_base64: Buffer.from('fake-mp3').toString('base64'),
                    alignment: {
                        characters: ['H', 'i', '.'],
                        character_start_times_seconds: [0, 0.1, 0.2],
                        character_end_times_seconds: [0.1, 0.2, 0.3],
                    },
                });

            const client = new ElevenLabsTTSClient(apiKey, `${baseUrl}/`);
            const result = await client.synthesize(request);

            expect(result.audio.toString()).toBe('fake-mp3');
            expect(result.format).toBe('mp3');
            expect(result.alignment).toEqual({
                characters: ['H', 'i', '.'],
                characterStartTimesSeconds: [0, 0.1, 0.2],
                characterEndTimesSeconds: [0.1, 0.2, 0.3],
            });
            expect(sentBody).toEqual({
                text: 'Hi.',
                model_id: 'model-1',
                voice_settings: {
                    stability: 0.75,
                    similarity_boost: 0.75,
                    style: 0,
                    speed: 1,
                    use_speaker_boost: true,
                },
                seed: 7,
                previous_text: 'Before.',
            });
        });

        it('should accept a response without alignment', async () => {
            nock(baseUrl)
                .post(endpoint)
                .query(true)
                .reply(200, { audio_base64: Buffer.from('x').toString('base64'), alignment: null });

            const result = await new ElevenLabsTTSClient(apiKey, baseUrl).synthesize(request);

            expect(result.alignment).toBeUndefined();
        });
    });

    describe('synthesize() - failures', () => {
        it('should surface the provider detail and status', async () => {
            nock(baseUrl)
                .post(endpoint)
                .query(true)
                .reply(429, { detail: { message: 'quota exceeded' } });

            const error = await new ElevenLabsTTSClient(apiKey, baseUrl).synthesize(request).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(TTSProviderError);
            expect(error).toMatchObject({ message: 'ElevenLabs synthesis failed: quota exceeded', status: 429 });
        });

        it('should report network failures without a status', async () => {
            nock(baseUrl)
                .post(endpoint)
                .query(true)
                .replyWithError('socket hang up');

            const error = await new ElevenLabsTTSClient(apiKey, baseUrl).synthesize(request).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(TTSProviderError);
            expect(error).toMatchObject({ message: 'ElevenLabs synthesis failed: socket hang up', status: undefined });
        });

        it('should reject an unexpected response shape', async () => {
            nock(baseUrl)
                .post(endpoint)
                .query(true)
                .reply(200, { audio_url: 'https://tts.test/a.mp3' });

            await expect(new ElevenLabsTTSClient(apiKey, baseUrl).synthesize(request))
                .rejects.toThrow('ElevenLabs returned an unexpected response shape');
        });

        it('should reject empty audio', async () => {
            nock(baseUrl)
                .post(endpoint)
                .query(true)
                .reply(200, { audio_base64: '' });

            await expect(new ElevenLabsTTSClient(apiKey, baseUrl).synthesize(request))
                .rejects.toThrow('ElevenLabs returned empty audio');
        });
    });
});
