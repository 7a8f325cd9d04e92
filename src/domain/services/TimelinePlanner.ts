/**
 * Timeline planning for the final mux.
 *
 * Shot durations come from the stage records and are never changed here.
 * A crossfade of c seconds overlaps the last c seconds of shot i with the
 * first c seconds of shot i+1, so the combined length is sum(d) - (n-1)c.
 */

export interface TimelineInput {
    shotIndex: number;
    durationSeconds: number;
}

export interface TimelineEntry {
    shotIndex: number;
    /** Advertised (recorded) duration of the shot */
    durationSeconds: number;
    /** Start on the final timeline */
    startSeconds: number;
    /** End on the final timeline (start + duration) */
    endSeconds: number;
    /** Overlap shared with the previous shot */
    overlapInSeconds: number;
    /** Overlap shared with the next shot */
    overlapOutSeconds: number;
}

export interface TimelinePlan {
    entries: TimelineEntry[];
    crossfadeSeconds: number;
    totalDurationSeconds: number;
}

export class TimelinePlanError extends Error {
    constructor(message: string, public readonly shotIndex?: number) {
        super(message);
        this.name = 'TimelinePlanError';
    }
}

/**
 * Rounds away floating-point noise (microsecond precision).
 */
export function roundTime(seconds: number): number {
    return Math.round(seconds * 1e6) / 1e6;
}

/**
 * Lays shots end to end in index order, overlapping neighbours by the crossfade.
 */
export function planTimeline(inputs: TimelineInput[], crossfadeSeconds: number = 0): TimelinePlan {
    if (inputs.length === 0) {
        throw new TimelinePlanError('Cannot plan an empty timeline');
    }
    if (!Number.isFinite(crossfadeSeconds) || crossfadeSeconds < 0) {
        throw new TimelinePlanError(`Crossfade must be a non-negative number, got ${crossfadeSeconds}`);
    }

    const ordered = [...inputs].sort((a, b) => a.shotIndex - b.shotIndex);
    ordered.forEach((input, position) => {
        if (input.shotIndex !== position) {
            throw new TimelinePlanError(`Shot order has a gap: expected shot ${position}, found ${input.shotIndex}`, input.shotIndex);
        }
        if (!(input.durationSeconds > 0)) {
            throw new TimelinePlanError(`Shot ${input.shotIndex} has no positive duration`, input.shotIndex);
        }
    });

    const c = ordered.length > 1 ? crossfadeSeconds : 0;
    const last = ordered.length - 1;

    const entries: TimelineEntry[] = [];
    let cursor = 0;
    ordered.forEach((input, position) => {
        const overlapIn = position > 0 ? c : 0;
        const overlapOut = position < last ? c : 0;
        if (overlapIn + overlapOut > input.durationSeconds + 1e-9) {
            throw new TimelinePlanError(
                `Crossfade of ${c}s needs ${overlapIn + overlapOut}s from shot ${input.shotIndex}, which lasts ${input.durationSeconds}s`,
                input.shotIndex
            );
        }

        const startSeconds = roundTime(cursor - overlapIn);
        const endSeconds = roundTime(startSeconds + input.durationSeconds);
        entries.push({
            shotIndex: input.shotIndex,
            durationSeconds: input.durationSeconds,
            startSeconds,
            endSeconds,
            overlapInSeconds: overlapIn,
            overlapOutSeconds: overlapOut,
        });
        cursor = endSeconds;
    });

    return {
        entries,
        crossfadeSeconds: c,
        totalDurationSeconds: cursor,
    };
}
