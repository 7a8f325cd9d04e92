import {
    centerCrop,
    ease,
    EASINGS,
    frameCount,
    interpolateRect,
    toViewport,
    validateCropRect,
    viewportAt,
} from '../../../../src/domain/services/KenBurns';
import { EASING_NAMES, KenBurnsParams } from '../../../../src/domain/entities/Blueprint';

describe('KenBurns', () => {
    describe('easings', () => {
        it.each(EASING_NAMES.map((name) => [name]))('%s starts at 0 and ends at 1', (name) => {
            expect(ease(name, 0)).toBeCloseTo(0, 10);
            expect(ease(name, 1)).toBeCloseTo(1, 10);
        });

        it('shapes the midpoint as expected', () => {
            expect(EASINGS.linear(0.5)).toBe(0.5);
            expect(EASINGS.ease_in_quad(0.5)).toBe(0.25);
            expect(EASINGS.ease_out_quad(0.5)).toBe(0.75);
            expect(EASINGS.ease_in_cubic(0.5)).toBe(0.125);
            expect(EASINGS.ease_out_cubic(0.5)).toBe(0.875);
            expect(EASINGS.ease_in_out_quad(0.25)).toBe(0.125);
            expect(EASINGS.ease_in_out_cubic(0.75)).toBe(0.9375);
        });

        it('clamps progress outside [0, 1]', () => {
            expect(ease('ease_in_quad', -1)).toBe(0);
            expect(ease('ease_in_quad', 2)).toBe(1);
        });
    });

    it('interpolates rectangles linearly in eased progress', () => {
        const rect = interpolateRect({ x: 0, y: 0, width: 1, height: 1 }, { x: 0.2, y: 0.4, width: 0.5, height: 0.5 }, 0.5);
        expect(rect).toEqual({ x: 0.1, y: 0.2, width: 0.75, height: 0.75 });
    });

    describe('viewport', () => {
        it('is sized by the larger side and centred on the rectangle', () => {
            expect(toViewport({ x: 0.2, y: 0.2, width: 0.4, height: 0.2 })).toEqual({
                size: 0.4,
                left: expect.closeTo(0.2, 10),
                top: expect.closeTo(0.1, 10),
            });
        });

        it('is clamped inside the image', () => {
            expect(toViewport({ x: 0.8, y: 0, width: 0.2, height: 0.5 })).toEqual({ size: 0.5, left: 0.5, top: 0 });
        });

        it('follows the easing over the shot duration', () => {
            const params: KenBurnsParams = {
                start: { x: 0, y: 0, width: 1, height: 1 },
                end: { x: 0.5, y: 0.5, width: 0.5, height: 0.5 },
                easing: 'ease_in_quad',
            };

            expect(viewportAt(params, 0, 4)).toEqual({ size: 1, left: 0, top: 0 });
            // t = 0.5 -> p = 0.25 -> width 0.875, centre 0.5625
            const mid = viewportAt(params, 2, 4);
            expect(mid.size).toBeCloseTo(0.875, 10);
            expect(mid.left).toBeCloseTo(0.125, 10);
            expect(viewportAt(params, 4, 4)).toEqual({ size: 0.5, left: 0.5, top: 0.5 });
        });
    });

    describe('validateCropRect', () => {
        it('accepts the full frame', () => {
            expect(validateCropRect({ x: 0, y: 0, width: 1, height: 1 })).toEqual([]);
        });

        it('lists every problem with a rectangle', () => {
            expect(validateCropRect({ x: -0.1, y: 0, width: 0, height: 1.2 })).toEqual([
                'must have positive width and height',
                'must start inside the image (x, y >= 0)',
                'must end inside the image (x + width <= 1, y + height <= 1)',
            ]);
        });

        it('rejects non-finite values', () => {
            expect(validateCropRect({ x: NaN, y: 0, width: 1, height: 1 })).toEqual(['must contain finite numbers']);
        });
    });

    it('counts whole frames covering a duration', () => {
        expect(frameCount(2, 30)).toBe(60);
        expect(frameCount(2.01, 30)).toBe(61);
        expect(frameCount(0, 30)).toBe(1);
    });

    describe('centerCrop', () => {
        it('keeps full height for a landscape source', () => {
            expect(centerCrop(1920, 1080, 1080, 1920)).toEqual({ x: 656, y: 0, width: 608, height: 1080 });
        });

        it('keeps full width for a source taller than 9:16', () => {
            expect(centerCrop(1080, 2400, 1080, 1920)).toEqual({ x: 0, y: 240, width: 1080, height: 1920 });
        });

        it('is the identity for a 9:16 source', () => {
            expect(centerCrop(720, 1280, 1080, 1920)).toEqual({ x: 0, y: 0, width: 720, height: 1280 });
        });
    });
});
