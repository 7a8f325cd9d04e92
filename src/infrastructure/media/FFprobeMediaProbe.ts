import ffmpeg, { FfprobeData } from 'fluent-ffmpeg';
import { IMediaProbe, MediaInfo } from '../../domain/ports/IMediaProbe';

/**
 * Reads container facts with ffprobe.
 * Stills report a duration of 0.
 */
export class FFprobeMediaProbe implements IMediaProbe {
    probe(filePath: string): Promise<MediaInfo> {
        return new Promise((resolve, reject) => {
            ffmpeg.ffprobe(filePath, (err: Error | null, data: FfprobeData) => {
                if (err) {
                    return reject(new Error(`ffprobe failed for ${filePath}: ${err.message}`));
                }
                resolve(toMediaInfo(data));
            });
        });
    }
}

export function toMediaInfo(data: FfprobeData): MediaInfo {
    const video = data.streams.find((stream) => stream.codec_type === 'video');
    const hasAudio = data.streams.some((stream) => stream.codec_type === 'audio');

    let duration = Number(data.format.duration);
    if (!Number.isFinite(duration) || duration < 0) {
        // Some containers only carry the duration on the stream
        const streamDuration = Number(video?.duration ?? data.streams[0]?.duration);
        duration = Number.isFinite(streamDuration) && streamDuration > 0 ? streamDuration : 0;
    }

    return {
        durationSeconds: duration,
        width: video?.width,
        height: video?.height,
        hasVideo: video !== undefined,
        hasAudio,
    };
}
