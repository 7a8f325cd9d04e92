import ffmpeg from 'fluent-ffmpeg';
import { ITimelineRenderer, TimelineRenderRequest } from '../../domain/ports/ITimelineRenderer';
import { formatNumber } from './KenBurnsFilter';

/**
 * Filtergraph for the final mux. Inputs are interleaved per shot:
 * visual at 2i, narration at 2i+1.
 */
export function buildTimelineFilterGraph(request: TimelineRenderRequest): string[] {
    const { clips, plan, canvas } = request;
    if (clips.length !== plan.entries.length) {
        throw new Error(`Timeline has ${plan.entries.length} entries but ${clips.length} clips`);
    }

    // Each segment is cut to its recorded duration so frame rounding in the
    // shot encode cannot shift later shots. Two cloned frames cover a clip
    // that came out slightly short.
    const holdFrames = formatNumber(2 / canvas.fps);
    const filters: string[] = [];
    clips.forEach((clip, i) => {
        const entry = plan.entries[i];
        if (entry.shotIndex !== clip.shotIndex) {
            throw new Error(`Timeline entry ${i} is shot ${entry.shotIndex} but clip ${i} is shot ${clip.shotIndex}`);
        }
        const duration = formatNumber(entry.durationSeconds);
        filters.push(
            `[${2 * i}:v]fps=${canvas.fps},setsar=1,format=yuv420p,`
            + `tpad=stop_mode=clone:stop_duration=${holdFrames},trim=duration=${duration},setpts=PTS-STARTPTS,settb=AVTB[v${i}]`
        );
        filters.push(
            `[${2 * i + 1}:a]aformat=sample_rates=44100:channel_layouts=stereo,`
            + `apad,atrim=duration=${duration},asetpts=PTS-STARTPTS[a${i}]`
        );
    });

    if (clips.length === 1) {
        filters.push('[v0]null[vout]', '[a0]anull[aout]');
        return filters;
    }

    if (plan.crossfadeSeconds === 0) {
        const pairs = clips.map((_, i) => `[v${i}][a${i}]`).join('');
        filters.push(`${pairs}concat=n=${clips.length}:v=1:a=1[vout][aout]`);
        return filters;
    }

    const fade = formatNumber(plan.crossfadeSeconds);
    let videoTag = 'v0';
    let audioTag = 'a0';
    for (let i = 1; i < clips.length; i++) {
        const last = i === clips.length - 1;
        const nextVideo = last ? 'vout' : `vx${i}`;
        const nextAudio = last ? 'aout' : `ax${i}`;
        // xfade offsets are on the accumulated output, i.e. the entry's start
        filters.push(`[${videoTag}][v${i}]xfade=transition=fade:duration=${fade}:offset=${formatNumber(plan.entries[i].startSeconds)}[${nextVideo}]`);
        filters.push(`[${audioTag}][a${i}]acrossfade=d=${fade}:c1=tri:c2=tri[${nextAudio}]`);
        videoTag = nextVideo;
        audioTag = nextAudio;
    }
    return filters;
}

/**
 * Concatenates finished shots into the final video, with hard cuts or crossfades.
 */
export class FFmpegTimelineRenderer implements ITimelineRenderer {
    render(request: TimelineRenderRequest): Promise<void> {
        return new Promise((resolve, reject) => {
            let filters: string[];
            try {
                filters = buildTimelineFilterGraph(request);
            } catch (error) {
                return reject(error);
            }

            console.log(`[FFmpeg] Assembling ${request.clips.length} shots -> ${request.outputPath} (${request.plan.totalDurationSeconds}s)`);
            const cmd = ffmpeg();
            for (const clip of request.clips) {
                cmd.input(clip.visual.path);
                cmd.input(clip.audio.path);
            }

            cmd.complexFilter(filters, ['vout', 'aout']);
            cmd.outputOptions([
                '-c:v libx264',
                '-c:a aac',
                '-pix_fmt yuv420p',
                `-r ${request.canvas.fps}`,
                `-t ${formatNumber(request.plan.totalDurationSeconds)}`,
                '-movflags +faststart',
            ]);

            cmd.save(request.outputPath)
                .on('end', () => resolve())
                .on('error', (err: Error) => reject(new Error(`FFmpeg error: ${err.message}`)));
        });
    }
}
