import fs from 'fs';
import path from 'path';

const mockState: { error?: Error; srtAtSave?: string } = {};

const mockCommand = {
    input: jest.fn().mockReturnThis(),
    inputOptions: jest.fn().mockReturnThis(),
    complexFilter: jest.fn().mockReturnThis(),
    outputOptions: jest.fn().mockReturnThis(),
    save: jest.fn((outputPath: string): unknown => {
        const srtPath = `${outputPath}.srt`;
        mockState.srtAtSave = fs.existsSync(srtPath) ? fs.readFileSync(srtPath, 'utf-8') : undefined;
        return mockCommand;
    }),
    on: jest.fn((event: string, handler: (err?: Error) => void): unknown => {
        if (event === 'end' && !mockState.error) handler();
        if (event === 'error' && mockState.error) handler(mockState.error);
        return mockCommand;
    }),
};

// Mock fluent-ffmpeg BEFORE importing the renderer
jest.mock('fluent-ffmpeg', () => jest.fn(() => mockCommand));

import {
    FFmpegEffectRenderer,
    buildEffectFilterGraph,
    buildSubtitlesFilter,
    escapeFilterPath,
    needsExtension,
} from '../../../../src/infrastructure/video/FFmpegEffectRenderer';
import { EffectRenderRequest } from '../../../../src/domain/ports/IEffectRenderer';
import { DEFAULT_KEN_BURNS } from '../../../../src/domain/entities/Blueprint';
import { buildZoompanFilter } from '../../../../src/infrastructure/video/KenBurnsFilter';
import { makeTempDir } from '../../../helpers/fakes';

const FORCE_STYLE = "force_style='Fontname=Roboto,FontSize=24,PrimaryColour=&H00FFFFFF,OutlineColour=&H00000000,BorderStyle=1,Outline=1,Shadow=0,MarginV=60'";

function imageRequest(overrides: Partial<EffectRenderRequest> = {}): EffectRenderRequest {
    return {
        assetPath: '/assets/sunrise.jpg',
        mediaType: 'image',
        sourceWidth: 1920,
        sourceHeight: 1080,
        durationSeconds: 2,
        kenBurns: DEFAULT_KEN_BURNS,
        captions: [],
        captionStyle: { font: 'Roboto', fontSize: 24 },
        canvas: { width: 1080, height: 1920, fps: 30 },
        extendPolicy: 'freeze',
        outputPath: '/out/shot_0.mp4',
        ...overrides,
    };
}

function videoRequest(sourceDurationSeconds: number, overrides: Partial<EffectRenderRequest> = {}): EffectRenderRequest {
    return imageRequest({
        assetPath: '/assets/walk.mp4',
        mediaType: 'video',
        sourceWidth: 1080,
        sourceHeight: 1920,
        sourceDurationSeconds,
        ...overrides,
    });
}

describe('FFmpegEffectRenderer', () => {
    beforeEach(() => {
        mockState.error = undefined;
        mockState.srtAtSave = undefined;
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.mocked(console.log).mockRestore();
    });

    describe('filter graph', () => {
        it('escapes paths for filter options', () => {
            expect(escapeFilterPath("C:\\clips\\it's.srt")).toBe("C\\:/clips/it\\'s.srt");
        });

        it('builds the subtitles filter with the fonts directory', () => {
            expect(buildSubtitlesFilter('/tmp/a.srt', { font: 'Roboto', fontSize: 24, fontsDir: '/fonts' }))
                .toBe(`subtitles=/tmp/a.srt:fontsdir=/fonts:${FORCE_STYLE}`);
        });

        it('crops a landscape still to 9:16 and applies Ken Burns motion', () => {
            const request = imageRequest();
            const zoompan = buildZoompanFilter(DEFAULT_KEN_BURNS, 2, request.canvas).join(',');

            expect(buildEffectFilterGraph(request)).toBe(`[0:v]crop=608:1080:656:0,${zoompan},format=yuv420p[vout]`);
        });

        it('freezes the last frame of a short video', () => {
            expect(buildEffectFilterGraph(videoRequest(1.5)))
                .toBe('[0:v]crop=1080:1920:0:0,scale=1080:1920,setsar=1,fps=30,tpad=stop_mode=clone:stop_duration=0.533333,format=yuv420p[vout]');
        });

        it('leaves looping and long videos untouched', () => {
            const plain = '[0:v]crop=1080:1920:0:0,scale=1080:1920,setsar=1,fps=30,format=yuv420p[vout]';
            expect(buildEffectFilterGraph(videoRequest(1.5, { extendPolicy: 'loop' }))).toBe(plain);
            expect(buildEffectFilterGraph(videoRequest(5))).toBe(plain);
            expect(needsExtension(videoRequest(5))).toBe(false);
        });

        it('burns captions after the pixel format conversion', () => {
            const graph = buildEffectFilterGraph(videoRequest(5), '/out/shot_0.mp4.srt');

            expect(graph.endsWith(`format=yuv420p,subtitles=/out/shot_0.mp4.srt:${FORCE_STYLE}[vout]`)).toBe(true);
        });
    });

    describe('render()', () => {
        it('rejects a non-positive duration', async () => {
            await expect(new FFmpegEffectRenderer().render(imageRequest({ durationSeconds: 0 })))
                .rejects.toThrow('Cannot render a clip of 0s');
        });

        it('encodes a silent clip trimmed to the duration', async () => {
            await new FFmpegEffectRenderer().render(imageRequest({ durationSeconds: 2.5 }));

            expect(mockCommand.input).toHaveBeenCalledWith('/assets/sunrise.jpg');
            expect(mockCommand.inputOptions).not.toHaveBeenCalled();
            expect(mockCommand.complexFilter).toHaveBeenCalledWith([buildEffectFilterGraph(imageRequest({ durationSeconds: 2.5 }))], ['vout']);
            expect(mockCommand.outputOptions).toHaveBeenCalledWith([
                '-c:v libx264',
                '-pix_fmt yuv420p',
                '-r 30',
                '-t 2.5',
                '-an',
                '-movflags +faststart',
            ]);
            expect(mockCommand.save).toHaveBeenCalledWith('/out/shot_0.mp4');
        });

        it('loops a short video at the input', async () => {
            await new FFmpegEffectRenderer().render(videoRequest(1, { extendPolicy: 'loop' }));

            expect(mockCommand.inputOptions).toHaveBeenCalledWith('-stream_loop -1');
        });

        it('writes captions to a sidecar SRT for the encode and removes it afterwards', async () => {
            const dir = makeTempDir('effect-renderer');
            const outputPath = path.join(dir, 'shot_0.mp4');

            await new FFmpegEffectRenderer().render(imageRequest({
                outputPath,
                captions: [{ startSeconds: 0, endSeconds: 2, text: 'Rise early.' }],
            }));

            expect(mockState.srtAtSave).toBe('1\n00:00:00,000 --> 00:00:02,000\nRise early.\n');
            expect(fs.existsSync(`${outputPath}.srt`)).toBe(false);
        });

        it('reports encoder failures and still cleans up', async () => {
            const dir = makeTempDir('effect-renderer');
            const outputPath = path.join(dir, 'shot_1.mp4');
            mockState.error = new Error('Invalid data found');

            await expect(new FFmpegEffectRenderer().render(imageRequest({
                outputPath,
                captions: [{ startSeconds: 0, endSeconds: 2, text: 'Rise early.' }],
            }))).rejects.toThrow('FFmpeg error: Invalid data found');
            expect(fs.existsSync(`${outputPath}.srt`)).toBe(false);
        });
    });
});
