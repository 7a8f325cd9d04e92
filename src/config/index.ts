import dotenv from 'dotenv';
import { VideoExtendPolicy } from '../domain/entities/TimedClip';

// Load environment variables
dotenv.config();

export { VideoExtendPolicy };

/**
 * Application configuration loaded from environment variables.
 */
export interface Config {
    // Server
    port: number;
    environment: string;

    // Project layout
    projectsRootDir: string;
    assetsRootDir: string;

    // ElevenLabs TTS
    elevenLabsApiKeys: string[];
    elevenLabsBaseUrl: string;
    elevenLabsVoiceId: string;
    elevenLabsModelId: string;

    // Pipeline
    workerConcurrency: number;

    // Output canvas
    outputWidth: number;
    outputHeight: number;
    outputFps: number;

    // Timeline
    crossfadeSeconds: number;
    videoExtendPolicy: VideoExtendPolicy;

    // Captions
    captionFont: string;
    captionFontSize: number;
}

function getEnvVar(key: string, defaultValue?: string): string {
    let value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }

    // Trim whitespace and wrapping quotes
    value = value.trim();
    if (value.startsWith('"') && value.endsWith('"')) {
        value = value.substring(1, value.length - 1);
    } else if (value.startsWith("'") && value.endsWith("'")) {
        value = value.substring(1, value.length - 1);
    }

    return value;
}

function getEnvVarNumber(key: string, defaultValue?: number): number {
    const value = getEnvVar(key, defaultValue?.toString());
    const parsed = parseFloat(value);
    if (isNaN(parsed)) {
        throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
    }
    return parsed;
}

/**
 * Parses a comma-separated list, dropping blank entries.
 */
function getEnvVarList(key: string, defaultValue: string = ''): string[] {
    return getEnvVar(key, defaultValue)
        .split(',')
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0);
}

function getExtendPolicy(): VideoExtendPolicy {
    const value = getEnvVar('VIDEO_EXTEND_POLICY', 'freeze').toLowerCase();
    if (value !== 'freeze' && value !== 'loop') {
        throw new Error(`VIDEO_EXTEND_POLICY must be "freeze" or "loop", got: ${value}`);
    }
    return value;
}

/**
 * Loads configuration from environment variables.
 */
export function loadConfig(): Config {
    return {
        // Server
        port: getEnvVarNumber('PORT', 3000),
        environment: getEnvVar('NODE_ENV', 'development'),

        // Project layout
        projectsRootDir: getEnvVar('PROJECTS_ROOT_DIR', './projects'),
        assetsRootDir: getEnvVar('ASSETS_ROOT_DIR', './assets'),

        // ElevenLabs TTS
        elevenLabsApiKeys: getEnvVarList('ELEVENLABS_API_KEYS'),
        elevenLabsBaseUrl: getEnvVar('ELEVENLABS_BASE_URL', 'https://api.elevenlabs.io'),
        elevenLabsVoiceId: getEnvVar('ELEVENLABS_VOICE_ID', ''),
        elevenLabsModelId: getEnvVar('ELEVENLABS_MODEL_ID', 'eleven_multilingual_v2'),

        // Pipeline
        workerConcurrency: getEnvVarNumber('WORKER_CONCURRENCY', 2),

        // Output canvas (9:16)
        outputWidth: getEnvVarNumber('OUTPUT_WIDTH', 1080),
        outputHeight: getEnvVarNumber('OUTPUT_HEIGHT', 1920),
        outputFps: getEnvVarNumber('OUTPUT_FPS', 30),

        // Timeline (0 = hard cut)
        crossfadeSeconds: getEnvVarNumber('CROSSFADE_SECONDS', 0),
        videoExtendPolicy: getExtendPolicy(),

        // Captions
        captionFont: getEnvVar('CAPTION_FONT', 'Roboto'),
        captionFontSize: getEnvVarNumber('CAPTION_FONT_SIZE', 24),
    };
}

/**
 * Validates that the configuration can drive a full pipeline run.
 */
export function validateConfig(config: Config): string[] {
    const errors: string[] = [];

    if (config.elevenLabsApiKeys.length === 0) {
        errors.push('ELEVENLABS_API_KEYS is required for audio synthesis (comma-separated list)');
    }
    if (!config.elevenLabsVoiceId) {
        errors.push('ELEVENLABS_VOICE_ID is required unless every blueprint sets voiceId');
    }
    if (!Number.isInteger(config.workerConcurrency) || config.workerConcurrency < 1) {
        errors.push('WORKER_CONCURRENCY must be a positive integer');
    }
    if (config.outputWidth * 16 !== config.outputHeight * 9) {
        errors.push(`OUTPUT_WIDTH x OUTPUT_HEIGHT must be 9:16, got ${config.outputWidth}x${config.outputHeight}`);
    }
    if (config.outputFps <= 0) {
        errors.push('OUTPUT_FPS must be positive');
    }
    if (config.crossfadeSeconds < 0) {
        errors.push('CROSSFADE_SECONDS cannot be negative');
    }

    return errors;
}

// Singleton config instance (lazy loaded)
let cachedConfig: Config | null = null;

export function getConfig(): Config {
    if (!cachedConfig) {
        cachedConfig = loadConfig();
    }
    return cachedConfig;
}

export function resetConfig(): void {
    cachedConfig = null;
}
