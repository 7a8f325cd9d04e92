import { EasingName, KenBurnsParams } from '../../domain/entities/Blueprint';
import { CanvasSpec } from '../../domain/ports/IEffectRenderer';
import { frameCount } from '../../domain/services/KenBurns';

/**
 * FFmpeg expression builders mirroring domain/services/KenBurns.
 * zoompan evaluates these per output frame, with `on` as the frame number.
 */

const EASING_EXPRESSIONS: Record<EasingName, (t: string) => string> = {
    linear: (t) => t,
    ease_in_quad: (t) => `${t}*${t}`,
    ease_out_quad: (t) => `${t}*(2-${t})`,
    ease_in_out_quad: (t) => `if(lt(${t},0.5),2*${t}*${t},1-pow(-2*${t}+2,2)/2)`,
    ease_in_cubic: (t) => `${t}*${t}*${t}`,
    ease_out_cubic: (t) => `1-pow(1-${t},3)`,
    ease_in_out_cubic: (t) => `if(lt(${t},0.5),4*${t}*${t}*${t},1-pow(-2*${t}+2,3)/2)`,
};

/** Upscale factor applied before zoompan to limit sub-pixel jitter */
export const ZOOMPAN_OVERSAMPLE = 2;

export function formatNumber(value: number): string {
    return Number(value.toFixed(6)).toString();
}

export function easingExpression(easing: EasingName, progress: string): string {
    return EASING_EXPRESSIONS[easing](`(${progress})`);
}

function lerp(from: number, to: number, p: string): string {
    const delta = to - from;
    if (delta === 0) {
        return formatNumber(from);
    }
    return `(${formatNumber(from)}+${formatNumber(delta)}*${p})`;
}

/**
 * Builds the zoom, x and y expressions for zoompan.
 * Time into the shot is on/fps, progress is that over the duration.
 */
export function zoompanExpressions(
    params: KenBurnsParams,
    durationSeconds: number,
    fps: number
): { zoom: string; x: string; y: string } {
    const progress = `min(on/${formatNumber(durationSeconds * fps)},1)`;
    const p = `(${easingExpression(params.easing, progress)})`;
    const { start, end } = params;

    const width = lerp(start.width, end.width, p);
    const height = lerp(start.height, end.height, p);
    const size = `clip(max(${width},${height}),0.000001,1)`;
    const centerX = lerp(start.x + start.width / 2, end.x + end.width / 2, p);
    const centerY = lerp(start.y + start.height / 2, end.y + end.height / 2, p);

    return {
        zoom: `1/${size}`,
        x: `iw*clip(${centerX}-${size}/2,0,1-${size})`,
        y: `ih*clip(${centerY}-${size}/2,0,1-${size})`,
    };
}

/**
 * The chain that turns one still into a moving clip:
 * upscale to the oversampled canvas, then zoompan down to the canvas.
 * The source must already be cropped to the canvas aspect.
 */
export function buildZoompanFilter(params: KenBurnsParams, durationSeconds: number, canvas: CanvasSpec): string[] {
    const { zoom, x, y } = zoompanExpressions(params, durationSeconds, canvas.fps);
    const frames = frameCount(durationSeconds, canvas.fps);
    return [
        `scale=${canvas.width * ZOOMPAN_OVERSAMPLE}:${canvas.height * ZOOMPAN_OVERSAMPLE}`,
        `zoompan=z='${zoom}':x='${x}':y='${y}':d=${frames}:s=${canvas.width}x${canvas.height}:fps=${canvas.fps}`,
    ];
}
