import { mkdirSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { Canvas } from '@napi-rs/canvas';
import type { TaskData } from './types';
import { shapeLabel } from './types';
import type { TaskConfig } from './config';
import type { Rng } from './random';
import type { VideoEncoder } from './exportGif';
import { GifVideoEncoder } from './exportGif';
import { TaskAssembler } from './assemble';
import { ShapeSorterRenderer } from './renderer';
import { createAnimationFrames, transitionFramesFor } from './animate';
import { getPrompt } from './prompts';
import { HOLD_FRAMES } from './constants';

export interface TaskPair {
  taskId: string;
  domain: string;
  prompt: string;
  firstImage: Canvas;
  finalImage: Canvas;
  groundTruthVideoPath?: string;
}

export interface TaskGeneratorOptions {
  /** Defaults to Math.random. Pass createRng(seed) for reproducible output. */
  rng?: Rng;
  /** Defaults to a GIF encoder at the configured fps. */
  videoEncoder?: VideoEncoder;
  /** Where videos are staged; defaults to `<tmpdir>/<domain>_videos`. */
  videoDir?: string;
}

/**
 * Shape sorter puzzles: colored cards on the left, matching outlines on the
 * right. Each instance keeps its own dedup history.
 */
export class TaskGenerator {
  readonly config: TaskConfig;
  readonly renderer: ShapeSorterRenderer;
  private readonly rng: Rng;
  private readonly assembler: TaskAssembler;
  private readonly videoEncoder: VideoEncoder | null;
  private readonly videoDir: string;

  constructor(config: TaskConfig, options: TaskGeneratorOptions = {}) {
    this.config = config;
    this.rng = options.rng ?? Math.random;
    this.renderer = new ShapeSorterRenderer(config.width, config.height);
    this.assembler = new TaskAssembler({ width: config.width, height: config.height }, this.rng);
    this.videoDir = options.videoDir ?? join(tmpdir(), `${config.domain}_videos`);

    const encoder = options.videoEncoder ?? new GifVideoEncoder({ fps: config.videoFps });
    const available = config.generateVideos && encoder.isAvailable();
    if (config.generateVideos && !available) {
      console.warn(`[${config.domain}] video backend unavailable; ground-truth videos disabled`);
    }
    this.videoEncoder = available ? encoder : null;
  }

  get videosEnabled(): boolean {
    return this.videoEncoder !== null;
  }

  generateTaskData(): TaskData {
    return this.assembler.generateTaskData(this.config.difficulty);
  }

  generateTaskPair(taskId: string): TaskPair {
    const taskData = this.generateTaskData();
    const firstImage = this.renderer.renderStart(taskData.specs);
    const finalImage = this.renderer.renderEnd(taskData.specs);
    const groundTruthVideoPath = this.generateVideo(taskId, taskData) ?? undefined;
    const prompt = getPrompt(taskData.specs.map(shapeLabel), this.rng);

    return {
      taskId,
      domain: this.config.domain,
      prompt,
      firstImage,
      finalImage,
      ...(groundTruthVideoPath ? { groundTruthVideoPath } : {}),
    };
  }

  private generateVideo(taskId: string, taskData: TaskData): string | null {
    if (!this.videoEncoder) return null;

    try {
      mkdirSync(this.videoDir, { recursive: true });
    } catch (err) {
      console.warn(`[${this.config.domain}] cannot stage video in ${this.videoDir}: ${err instanceof Error ? err.message : String(err)}`);
      return null;
    }
    const videoPath = join(this.videoDir, `${taskId}_ground_truth.gif`);
    const transitionFrames = transitionFramesFor(
      taskData.specs.length,
      this.config.videoFps,
      this.config.maxVideoDuration,
      HOLD_FRAMES,
    );
    const frames = createAnimationFrames(this.renderer, taskData.specs, {
      holdFrames: HOLD_FRAMES,
      transitionFrames,
    });
    return this.videoEncoder.createVideoFromFrames(frames, videoPath) || null;
  }
}
