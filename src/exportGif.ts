import { writeFileSync } from 'node:fs';
import * as _gifencNs from 'gifenc';
import type { Frame } from './types';

// gifenc ships CJS. Bundlers resolve named exports on the namespace directly;
// Node.js ESM may only expose the CJS module.exports as .default.
const gifenc: typeof _gifencNs.default | undefined =
  typeof _gifencNs.GIFEncoder === 'function' ? _gifencNs : _gifencNs.default;

/**
 * Encode an array of raw RGBA frames into a looping GIF.
 */
export function encodeGifFromFrames(frames: readonly Frame[], delay: number): Uint8Array {
  if (frames.length === 0) throw new Error('No frames to encode');
  if (!gifenc) throw new Error('gifenc exports could not be resolved');
  const { GIFEncoder, quantize, applyPalette } = gifenc;

  const gif = GIFEncoder();

  for (let i = 0; i < frames.length; i++) {
    const { data, width, height } = frames[i];
    const palette = quantize(data, 256);
    const index = applyPalette(data, palette);
    gif.writeFrame(index, width, height, {
      palette,
      delay,
      ...(i === 0 ? { repeat: 0 } : {}),
    });
  }

  gif.finish();
  return gif.bytes();
}

/** Turns an ordered frame sequence into a video file. */
export interface VideoEncoder {
  /** Checked once, when a generator is constructed. */
  isAvailable(): boolean;
  /** The written path, or null if encoding failed. */
  createVideoFromFrames(frames: readonly Frame[], outputPath: string): string | null;
}

export interface GifVideoEncoderOptions {
  fps: number;
}

export class GifVideoEncoder implements VideoEncoder {
  readonly fps: number;

  constructor({ fps }: GifVideoEncoderOptions) {
    this.fps = fps;
  }

  get frameDelayMs(): number {
    return Math.round(1000 / this.fps);
  }

  isAvailable(): boolean {
    return typeof gifenc?.GIFEncoder === 'function';
  }

  createVideoFromFrames(frames: readonly Frame[], outputPath: string): string | null {
    try {
      const bytes = encodeGifFromFrames(frames, this.frameDelayMs);
      writeFileSync(outputPath, bytes);
      return outputPath;
    } catch (err) {
      console.warn(`GIF encoding failed for ${outputPath}: ${err instanceof Error ? err.message : String(err)}`);
      return null;
    }
  }
}
