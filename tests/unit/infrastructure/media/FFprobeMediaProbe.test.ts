import { FfprobeData } from 'fluent-ffmpeg';
import { toMediaInfo } from '../../../../src/infrastructure/media/FFprobeMediaProbe';

function probeData(overrides: Partial<FfprobeData>): FfprobeData {
    return { streams: [], format: {}, chapters: [], ...overrides };
}

describe('FFprobeMediaProbe.toMediaInfo', () => {
    it('reads duration and picture size from a video with sound', () => {
        const info = toMediaInfo(probeData({
            streams: [
                { index: 0, codec_type: 'video', width: 1080, height: 1920 },
                { index: 1, codec_type: 'audio' },
            ],
            format: { duration: 12.48 },
        }));

        expect(info).toEqual({ durationSeconds: 12.48, width: 1080, height: 1920, hasVideo: true, hasAudio: true });
    });

    it('reports narration audio without a picture', () => {
        const info = toMediaInfo(probeData({
            streams: [{ index: 0, codec_type: 'audio' }],
            format: { duration: 3.2 },
        }));

        expect(info).toEqual({ durationSeconds: 3.2, width: undefined, height: undefined, hasVideo: false, hasAudio: true });
    });

    it('falls back to the stream duration when the container has none', () => {
        const info = toMediaInfo(probeData({
            streams: [{ index: 0, codec_type: 'video', width: 640, height: 480, duration: '4.5' }],
            format: {},
        }));

        expect(info.durationSeconds).toBe(4.5);
    });

    it('treats stills as zero-length', () => {
        const info = toMediaInfo(probeData({
            streams: [{ index: 0, codec_type: 'video', width: 1920, height: 1080, duration: 'N/A' }],
            format: { duration: undefined },
        }));

        expect(info.durationSeconds).toBe(0);
        expect(info.hasVideo).toBe(true);
    });
});
