import { VoiceSettings } from '../entities/Blueprint';
import { CharacterAlignment } from '../entities/TimedClip';

/**
 * TTSResult represents the output from a TTS synthesis call.
 */
export interface TTSResult {
    /** Raw encoded audio */
    audio: Buffer;
    /** Container/codec of `audio` (e.g. 'mp3') */
    format: string;
    /** Per-character timing, when the provider returns it */
    alignment?: CharacterAlignment;
}

/**
 * TTSRequest describes one synthesis call.
 */
export interface TTSRequest {
    text: string;
    voiceId: string;
    modelId: string;
    voiceSettings: VoiceSettings;
    /** Neighbouring narration, used by providers for continuous prosody */
    previousText?: string;
    nextText?: string;
}

/**
 * ITTSClient - Port for Text-to-Speech services.
 * Implementations: ElevenLabsTTSClient, KeyRotatingTTSClient
 */
export interface ITTSClient {
    /**
     * Synthesizes text to speech audio.
     * Duration is not part of the result: callers measure the written file.
     */
    synthesize(request: TTSRequest): Promise<TTSResult>;
}
