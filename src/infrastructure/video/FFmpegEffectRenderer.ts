import ffmpeg from 'fluent-ffmpeg';
import fs from 'fs';
import { EffectRenderRequest, IEffectRenderer, CaptionStyle } from '../../domain/ports/IEffectRenderer';
import { centerCrop } from '../../domain/services/KenBurns';
import { toSrt } from '../../domain/services/CaptionTimeline';
import { buildZoompanFilter, formatNumber } from './KenBurnsFilter';

/**
 * Escapes a path for use as an unquoted filtergraph option value.
 */
export function escapeFilterPath(filePath: string): string {
    return filePath
        .replace(/\\/g, '/')
        .replace(/:/g, '\\:')
        .replace(/'/g, "\\'");
}

export function buildSubtitlesFilter(srtPath: string, style: CaptionStyle): string {
    const forceStyle = [
        `Fontname=${style.font}`,
        `FontSize=${style.fontSize}`,
        'PrimaryColour=&H00FFFFFF',
        'OutlineColour=&H00000000',
        'BorderStyle=1',
        'Outline=1',
        'Shadow=0',
        'MarginV=60',
    ].join(',');
    const fontsDir = style.fontsDir ? `:fontsdir=${escapeFilterPath(style.fontsDir)}` : '';
    return `subtitles=${escapeFilterPath(srtPath)}${fontsDir}:force_style='${forceStyle}'`;
}

/**
 * Whether a video source has to be extended to cover the shot.
 */
export function needsExtension(request: EffectRenderRequest): boolean {
    return request.mediaType === 'video'
        && request.sourceDurationSeconds !== undefined
        && request.sourceDurationSeconds < request.durationSeconds;
}

/**
 * The single video chain for one shot, from input 0 to [vout].
 */
export function buildEffectFilterGraph(request: EffectRenderRequest, srtPath?: string): string {
    const { canvas } = request;
    const crop = centerCrop(request.sourceWidth, request.sourceHeight, canvas.width, canvas.height);
    const chain: string[] = [`crop=${crop.width}:${crop.height}:${crop.x}:${crop.y}`];

    if (request.mediaType === 'image') {
        chain.push(...buildZoompanFilter(request.kenBurns, request.durationSeconds, canvas));
    } else {
        chain.push(`scale=${canvas.width}:${canvas.height}`, 'setsar=1', `fps=${canvas.fps}`);
        if (needsExtension(request) && request.extendPolicy === 'freeze') {
            const missing = request.durationSeconds - (request.sourceDurationSeconds ?? 0);
            // One extra frame so rounding never leaves the tail short
            chain.push(`tpad=stop_mode=clone:stop_duration=${formatNumber(missing + 1 / canvas.fps)}`);
        }
    }

    chain.push('format=yuv420p');
    if (srtPath) {
        chain.push(buildSubtitlesFilter(srtPath, request.captionStyle));
    }
    return `[0:v]${chain.join(',')}[vout]`;
}

/**
 * Renders one shot's visual with FFmpeg: centered 9:16 crop, Ken Burns motion
 * for stills, freeze or loop extension for short videos, burned-in captions.
 * Output has no audio track and lasts exactly the requested duration.
 */
export class FFmpegEffectRenderer implements IEffectRenderer {
    async render(request: EffectRenderRequest): Promise<void> {
        if (!(request.durationSeconds > 0)) {
            throw new Error(`Cannot render a clip of ${request.durationSeconds}s`);
        }

        const srtPath = request.captions.length > 0 ? `${request.outputPath}.srt` : undefined;
        if (srtPath) {
            await fs.promises.writeFile(srtPath, toSrt(request.captions), 'utf-8');
        }

        try {
            console.log(`[FFmpeg] Rendering ${request.mediaType} ${request.assetPath} -> ${request.outputPath} (${request.durationSeconds}s)`);
            await this.runFFmpeg(request, srtPath);
        } finally {
            if (srtPath) {
                await fs.promises.rm(srtPath, { force: true });
            }
        }
    }

    private runFFmpeg(request: EffectRenderRequest, srtPath?: string): Promise<void> {
        return new Promise((resolve, reject) => {
            const cmd = ffmpeg();

            cmd.input(request.assetPath);
            if (needsExtension(request) && request.extendPolicy === 'loop') {
                cmd.inputOptions('-stream_loop -1');
            }

            cmd.complexFilter([buildEffectFilterGraph(request, srtPath)], ['vout']);

            cmd.outputOptions([
                '-c:v libx264',
                '-pix_fmt yuv420p',
                `-r ${request.canvas.fps}`,
                `-t ${formatNumber(request.durationSeconds)}`,
                '-an',
                '-movflags +faststart',
            ]);

            cmd.save(request.outputPath)
                .on('end', () => resolve())
                .on('error', (err: Error) => reject(new Error(`FFmpeg error: ${err.message}`)));
        });
    }
}
