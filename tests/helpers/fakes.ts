import fs from 'fs';
import os from 'os';
import path from 'path';
import { Config } from '../../src/config';
import { IEffectRenderer, EffectRenderRequest } from '../../src/domain/ports/IEffectRenderer';
import { IMediaProbe, MediaInfo } from '../../src/domain/ports/IMediaProbe';
import { ITTSClient, TTSRequest, TTSResult } from '../../src/domain/ports/ITTSClient';
import { ITimelineRenderer, TimelineRenderRequest } from '../../src/domain/ports/ITimelineRenderer';

/**
 * Test media files are small text files the fake probe understands:
 *   AUDIO:<seconds>            synthesized narration
 *   IMAGE:<w>x<h>              a still
 *   VIDEO:<w>x<h>:<seconds>    a clip
 */
export function audioBytes(durationSeconds: number): Buffer {
    return Buffer.from(`AUDIO:${durationSeconds}`);
}

export function writeImage(filePath: string, width = 1920, height = 1080): string {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, `IMAGE:${width}x${height}`);
    return filePath;
}

export function writeVideo(filePath: string, durationSeconds: number, width = 1080, height = 1920): string {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, `VIDEO:${width}x${height}:${durationSeconds}`);
    return filePath;
}

export class FakeMediaProbe implements IMediaProbe {
    calls: string[] = [];

    async probe(filePath: string): Promise<MediaInfo> {
        this.calls.push(filePath);
        const content = await fs.promises.readFile(filePath, 'utf-8');
        const [kind, a, b] = content.split(':');
        if (kind === 'AUDIO') {
            return { durationSeconds: Number(a), hasVideo: false, hasAudio: true };
        }
        const [width, height] = (a ?? '').split('x').map(Number);
        if (kind === 'IMAGE') {
            return { durationSeconds: 0, width, height, hasVideo: true, hasAudio: false };
        }
        if (kind === 'VIDEO') {
            return { durationSeconds: Number(b), width, height, hasVideo: true, hasAudio: false };
        }
        throw new Error(`unreadable media: ${filePath}`);
    }
}

/**
 * Narration lasts half a second per word unless a duration is set for the text.
 */
export class FakeTTSClient implements ITTSClient {
    requests: TTSRequest[] = [];
    durations = new Map<string, number>();
    failFor = new Set<string>();

    get callCount(): number {
        return this.requests.length;
    }

    async synthesize(request: TTSRequest): Promise<TTSResult> {
        this.requests.push(request);
        if (this.failFor.has(request.text)) {
            throw new Error(`provider rejected "${request.text}"`);
        }
        const duration = this.durations.get(request.text) ?? request.text.split(/\s+/).length * 0.5;
        return { audio: audioBytes(duration), format: 'mp3' };
    }
}

/**
 * Writes a clip the fake probe reads back as lasting exactly the requested duration.
 */
export class FakeEffectRenderer implements IEffectRenderer {
    requests: EffectRenderRequest[] = [];
    durationOverride?: number;

    async render(request: EffectRenderRequest): Promise<void> {
        this.requests.push(request);
        const duration = this.durationOverride ?? request.durationSeconds;
        await fs.promises.writeFile(request.outputPath, `VIDEO:${request.canvas.width}x${request.canvas.height}:${duration}`);
    }
}

export class FakeTimelineRenderer implements ITimelineRenderer {
    requests: TimelineRenderRequest[] = [];
    failWith?: Error;

    async render(request: TimelineRenderRequest): Promise<void> {
        this.requests.push(request);
        if (this.failWith) {
            throw this.failWith;
        }
        await fs.promises.writeFile(request.outputPath, `VIDEO:${request.canvas.width}x${request.canvas.height}:${request.plan.totalDurationSeconds}`);
    }
}

export function makeTempDir(prefix: string): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), `${prefix}-`));
}

export function testConfig(root: string, overrides: Partial<Config> = {}): Config {
    return {
        port: 0,
        environment: 'test',
        projectsRootDir: path.join(root, 'projects'),
        assetsRootDir: path.join(root, 'assets'),
        elevenLabsApiKeys: ['test-key-1'],
        elevenLabsBaseUrl: 'https://tts.test',
        elevenLabsVoiceId: 'test-voice',
        elevenLabsModelId: 'test-model',
        workerConcurrency: 2,
        outputWidth: 1080,
        outputHeight: 1920,
        outputFps: 30,
        crossfadeSeconds: 0,
        videoExtendPolicy: 'freeze',
        captionFont: 'Roboto',
        captionFontSize: 24,
        ...overrides,
    };
}

export interface ShotInput {
    narration: string;
    assetPath?: string;
    caption?: string;
}

/**
 * A minimal draft as an author would submit it; the store fills the rest.
 */
export function draftInput(shots: ShotInput[]): Record<string, unknown> {
    return {
        title: 'Morning routine',
        scriptFormula: 'hook-problem-solution',
        shots: shots.map((shot, index) => ({
            index,
            narration: shot.narration,
            ...(shot.caption !== undefined ? { caption: shot.caption } : {}),
            visual: shot.assetPath
                ? { kind: 'stock_asset', assetPath: shot.assetPath }
                : { kind: 'ai_image', prompt: `shot ${index}` },
        })),
    };
}
