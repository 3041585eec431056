/**
 * Data generation utilities for benchmarks
 */

import { FixedArray, uint8, type Uint8 } from '@fixed-vec/core';

/**
 * Random values in [0, 255], suitable for any integer or float dtype
 */
export function generateByteData(length: number): number[] {
  return Array.from({ length }, () => Math.floor(Math.random() * 256));
}

/**
 * A palette of `distinct` different RGB colours
 *
 * Colours are spread over the 24-bit space so that any `distinct` up to 2^24 stays unique.
 */
export function generatePalette(distinct: number): FixedArray<Uint8, 3>[] {
  const stride = Math.max(1, Math.floor(0xffffff / Math.max(distinct, 1)));
  return Array.from({ length: distinct }, (_, i) => {
    const rgb = (i * stride) & 0xffffff;
    return FixedArray.fromArray(uint8, [(rgb >> 16) & 0xff, (rgb >> 8) & 0xff, rgb & 0xff]);
  });
}

/**
 * A sequence of `count` colours drawn from a palette of `distinct` colours
 *
 * Every palette entry appears at least once when `count >= distinct`.
 */
export function generatePixelSequence(count: number, distinct: number): FixedArray<Uint8, 3>[] {
  const palette = generatePalette(distinct);
  const pixels: FixedArray<Uint8, 3>[] = [];

  for (let i = 0; i < count; i++) {
    const index = i < palette.length ? i : Math.floor(Math.random() * palette.length);
    const colour = palette[index];
    if (colour === undefined) {
      throw new Error(`Palette index ${index.toString()} out of range`);
    }
    pixels.push(colour);
  }

  return pixels;
}
