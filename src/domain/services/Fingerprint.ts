import crypto from 'crypto';
import fs from 'fs';
import { Shot, getCaptionText } from '../entities/Blueprint';

type Canonical = null | boolean | number | string | Canonical[] | { [key: string]: Canonical };

/**
 * Serializes a value with object keys sorted, so equal inputs hash equally
 * regardless of property order. `undefined` members are dropped.
 */
export function canonicalJson(value: unknown): string {
    return JSON.stringify(toCanonical(value));
}

function toCanonical(value: unknown): Canonical {
    if (value === null || value === undefined) {
        return null;
    }
    if (typeof value === 'boolean' || typeof value === 'string') {
        return value;
    }
    if (typeof value === 'number') {
        return Number.isFinite(value) ? value : String(value);
    }
    if (Array.isArray(value)) {
        return value.map((item) => toCanonical(item));
    }
    if (typeof value === 'object') {
        const result: { [key: string]: Canonical } = {};
        for (const key of Object.keys(value).sort()) {
            const member: unknown = Reflect.get(value, key);
            if (member !== undefined) {
                result[key] = toCanonical(member);
            }
        }
        return result;
    }
    return String(value);
}

export function sha256(input: string | Buffer): string {
    return crypto.createHash('sha256').update(input).digest('hex');
}

export function fingerprintOf(value: unknown): string {
    return sha256(canonicalJson(value));
}

/**
 * Streams a file through SHA-256.
 */
export function hashFile(filePath: string): Promise<string> {
    return new Promise((resolve, reject) => {
        const hash = crypto.createHash('sha256');
        const stream = fs.createReadStream(filePath);
        stream.on('data', (chunk) => hash.update(chunk));
        stream.on('error', reject);
        stream.on('end', () => resolve(hash.digest('hex')));
    });
}

export interface AudioFingerprintInput {
    shot: Shot;
    voiceId: string;
    modelId: string;
}

/**
 * Inputs that determine a shot's synthesized narration.
 */
export function audioFingerprint({ shot, voiceId, modelId }: AudioFingerprintInput): string {
    return fingerprintOf({
        narration: shot.narration.trim(),
        voiceSettings: shot.voiceSettings,
        voiceId,
        modelId,
    });
}

export interface VisualFingerprintInput {
    shot: Shot;
    audioFingerprint: string;
    audioDurationSeconds: number;
    assetHash: string;
    canvas: { width: number; height: number; fps: number };
    extendPolicy: string;
    captionStyle: { font: string; fontSize: number };
}

/**
 * Inputs that determine a shot's rendered visual. Includes the audio
 * fingerprint so a narration change invalidates the visual as well.
 */
export function visualFingerprint(input: VisualFingerprintInput): string {
    return fingerprintOf({
        audioFingerprint: input.audioFingerprint,
        audioDurationSeconds: input.audioDurationSeconds,
        assetHash: input.assetHash,
        kenBurns: input.shot.kenBurns,
        visualKind: input.shot.visual.kind,
        caption: getCaptionText(input.shot),
        canvas: input.canvas,
        extendPolicy: input.extendPolicy,
        captionStyle: input.captionStyle,
    });
}

/**
 * Inputs that determine the final mux: every visual in order plus the transition.
 */
export function assemblyFingerprint(visualFingerprints: string[], crossfadeSeconds: number): string {
    return fingerprintOf({ visuals: visualFingerprints, crossfadeSeconds });
}
