import { CropRect, EASING_NAMES, EasingName, KenBurnsParams } from '../entities/Blueprint';

/**
 * Easing curves mapping progress t in [0,1] to eased progress in [0,1].
 * Standard quad/cubic equations (easings.net).
 */
export const EASINGS: Record<EasingName, (t: number) => number> = {
    linear: (t) => t,
    ease_in_quad: (t) => t * t,
    ease_out_quad: (t) => t * (2 - t),
    ease_in_out_quad: (t) => (t < 0.5 ? 2 * t * t : 1 - Math.pow(-2 * t + 2, 2) / 2),
    ease_in_cubic: (t) => t * t * t,
    ease_out_cubic: (t) => 1 - Math.pow(1 - t, 3),
    ease_in_out_cubic: (t) => (t < 0.5 ? 4 * t * t * t : 1 - Math.pow(-2 * t + 2, 3) / 2),
};

export function isEasingName(value: string): value is EasingName {
    return EASING_NAMES.some((name) => name === value);
}

function clamp(value: number, min: number, max: number): number {
    return Math.min(Math.max(value, min), max);
}

export function ease(easing: EasingName, t: number): number {
    return EASINGS[easing](clamp(t, 0, 1));
}

/**
 * Linear interpolation between two rectangles at eased progress p.
 */
export function interpolateRect(start: CropRect, end: CropRect, p: number): CropRect {
    return {
        x: start.x + (end.x - start.x) * p,
        y: start.y + (end.y - start.y) * p,
        width: start.width + (end.width - start.width) * p,
        height: start.height + (end.height - start.height) * p,
    };
}

/**
 * The window actually shown for a rectangle. The output canvas aspect is kept:
 * the window is square in normalized space (the source is center-cropped to the
 * canvas aspect first), sized max(width, height), centered on the rectangle and
 * clamped inside the image.
 */
export interface Viewport {
    size: number;
    left: number;
    top: number;
}

export function toViewport(rect: CropRect): Viewport {
    const size = clamp(Math.max(rect.width, rect.height), Number.EPSILON, 1);
    const centerX = rect.x + rect.width / 2;
    const centerY = rect.y + rect.height / 2;
    return {
        size,
        left: clamp(centerX - size / 2, 0, 1 - size),
        top: clamp(centerY - size / 2, 0, 1 - size),
    };
}

/**
 * Viewport at a given time into a shot of `durationSeconds`.
 */
export function viewportAt(params: KenBurnsParams, timeSeconds: number, durationSeconds: number): Viewport {
    const t = durationSeconds > 0 ? timeSeconds / durationSeconds : 1;
    return toViewport(interpolateRect(params.start, params.end, ease(params.easing, t)));
}

/**
 * Problems with a crop rectangle, empty when well-formed.
 */
export function validateCropRect(rect: CropRect): string[] {
    const issues: string[] = [];
    const values = [rect.x, rect.y, rect.width, rect.height];
    if (values.some((v) => typeof v !== 'number' || !Number.isFinite(v))) {
        return ['must contain finite numbers'];
    }
    if (rect.width <= 0 || rect.height <= 0) {
        issues.push('must have positive width and height');
    }
    if (rect.x < 0 || rect.y < 0) {
        issues.push('must start inside the image (x, y >= 0)');
    }
    if (rect.x + rect.width > 1 + 1e-9 || rect.y + rect.height > 1 + 1e-9) {
        issues.push('must end inside the image (x + width <= 1, y + height <= 1)');
    }
    return issues;
}

/**
 * Number of frames needed to cover `durationSeconds` at `fps`.
 */
export function frameCount(durationSeconds: number, fps: number): number {
    return Math.max(1, Math.ceil(durationSeconds * fps - 1e-9));
}

export interface PixelRect {
    x: number;
    y: number;
    width: number;
    height: number;
}

/**
 * Deterministic centered crop of a source to the target aspect ratio.
 * Never stretches: the largest target-aspect region centred in the source.
 */
export function centerCrop(
    sourceWidth: number,
    sourceHeight: number,
    targetWidth: number,
    targetHeight: number
): PixelRect {
    const targetAspect = targetWidth / targetHeight;
    const sourceAspect = sourceWidth / sourceHeight;

    if (sourceAspect > targetAspect) {
        // Too wide: keep full height
        const width = Math.round(sourceHeight * targetAspect);
        return { x: Math.floor((sourceWidth - width) / 2), y: 0, width, height: sourceHeight };
    }
    // Too tall (or exact): keep full width
    const height = Math.round(sourceWidth / targetAspect);
    return { x: 0, y: Math.floor((sourceHeight - height) / 2), width: sourceWidth, height };
}
