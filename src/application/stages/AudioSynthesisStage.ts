import fs from 'fs';
import { Blueprint, Shot, orderedShots } from '../../domain/entities/Blueprint';
import { PipelineContext } from '../../domain/entities/StageRecord';
import { AudioClip, AudioSidecar, CharacterAlignment } from '../../domain/entities/TimedClip';
import { SynthesisError } from '../../domain/errors/PipelineErrors';
import { IMediaProbe } from '../../domain/ports/IMediaProbe';
import { ITTSClient, TTSResult } from '../../domain/ports/ITTSClient';
import { audioFingerprint } from '../../domain/services/Fingerprint';
import { produceAtomically, readJsonIfExists, writeJsonAtomic } from '../../infrastructure/storage/AtomicFile';
import { ProjectLayout } from '../ProjectLayout';

export interface AudioStageOptions {
    /** Used when the blueprint names no voice */
    defaultVoiceId: string;
    defaultModelId: string;
}

function isNumberArray(value: unknown): value is number[] {
    return Array.isArray(value) && value.every((n) => typeof n === 'number');
}

function isAlignment(value: unknown): value is CharacterAlignment {
    return typeof value === 'object' && value !== null
        && 'characters' in value && Array.isArray(value.characters)
        && value.characters.every((c: unknown) => typeof c === 'string')
        && 'characterStartTimesSeconds' in value && isNumberArray(value.characterStartTimesSeconds)
        && 'characterEndTimesSeconds' in value && isNumberArray(value.characterEndTimesSeconds);
}

function isSidecar(value: unknown): value is AudioSidecar {
    return typeof value === 'object' && value !== null
        && 'durationSeconds' in value && typeof value.durationSeconds === 'number'
        && 'fingerprint' in value && typeof value.fingerprint === 'string'
        && (!('alignment' in value) || value.alignment === undefined || isAlignment(value.alignment));
}

/**
 * Turns one shot's narration into an audio file with a measured duration.
 *
 * Writes <p>_<v>_shot_<i>.mp3 and a JSON sidecar holding the duration,
 * fingerprint and character alignment. The duration always comes from
 * probing the written file.
 */
export class AudioSynthesisStage {
    constructor(
        private readonly tts: ITTSClient,
        private readonly probe: IMediaProbe,
        private readonly layout: ProjectLayout,
        private readonly options: AudioStageOptions
    ) { }

    voiceFor(blueprint: Blueprint): { voiceId: string; modelId: string } {
        return {
            voiceId: blueprint.voiceId ?? this.options.defaultVoiceId,
            modelId: blueprint.ttsModelId ?? this.options.defaultModelId,
        };
    }

    fingerprint(shot: Shot, blueprint: Blueprint): string {
        return audioFingerprint({ shot, ...this.voiceFor(blueprint) });
    }

    async run(ctx: PipelineContext, shot: Shot, blueprint: Blueprint): Promise<AudioClip> {
        const scope = { ...ctx, shotIndex: shot.index };
        const text = shot.narration.trim();
        if (!text) {
            throw new SynthesisError(scope, 'Narration is empty');
        }
        const { voiceId, modelId } = this.voiceFor(blueprint);
        if (!voiceId) {
            throw new SynthesisError(scope, 'No voice configured for the blueprint');
        }

        const shots = orderedShots(blueprint);
        const position = shots.findIndex((s) => s.index === shot.index);

        let result: TTSResult;
        try {
            result = await this.tts.synthesize({
                text,
                voiceId,
                modelId,
                voiceSettings: shot.voiceSettings,
                previousText: position > 0 ? shots[position - 1].narration.trim() : undefined,
                nextText: position >= 0 && position < shots.length - 1 ? shots[position + 1].narration.trim() : undefined,
            });
        } catch (error) {
            throw new SynthesisError(scope, 'Speech synthesis failed', error);
        }

        const audioPath = this.layout.audioPath(ctx, shot.index);
        const durationSeconds = await produceAtomically(audioPath, async (tempPath) => {
            await fs.promises.writeFile(tempPath, result.audio);
            return this.measure(scope, tempPath);
        });

        const sidecar: AudioSidecar = {
            durationSeconds,
            fingerprint: this.fingerprint(shot, blueprint),
            alignment: result.alignment,
        };
        await writeJsonAtomic(this.layout.audioSidecarPath(ctx, shot.index), sidecar);

        console.log(`[Audio] ${ctx.project}/${ctx.version} shot ${shot.index}: ${durationSeconds.toFixed(3)}s`);
        return { path: audioPath, durationSeconds, alignment: result.alignment };
    }

    /**
     * The clip recorded for a shot, read back from its sidecar.
     */
    async loadClip(ctx: PipelineContext, shotIndex: number): Promise<AudioClip | undefined> {
        const sidecar = await readJsonIfExists(this.layout.audioSidecarPath(ctx, shotIndex));
        if (!isSidecar(sidecar)) {
            return undefined;
        }
        return {
            path: this.layout.audioPath(ctx, shotIndex),
            durationSeconds: sidecar.durationSeconds,
            alignment: sidecar.alignment,
        };
    }

    private async measure(scope: { project: string; version: string; shotIndex: number }, filePath: string): Promise<number> {
        let duration: number;
        try {
            duration = (await this.probe.probe(filePath)).durationSeconds;
        } catch (error) {
            throw new SynthesisError(scope, 'Could not read the synthesized audio', error);
        }
        if (!(duration > 0)) {
            throw new SynthesisError(scope, `Synthesized audio has no measurable duration (${duration})`);
        }
        return duration;
    }
}
