import type { Vector } from 'vecti';
import type { Frame, ShapeSpec } from './types';
import type { SceneOptions, ShapeSorterRenderer } from './renderer';
import { captureFrame } from './renderer';
import { MIN_TRANSITION_FRAMES } from './constants';

export interface AnimationTiming {
  holdFrames: number;
  transitionFrames: number;
}

/** Written as a weighted sum so t=0 and t=1 land exactly on the endpoints. */
export function lerpPoint(start: Vector, target: Vector, t: number): Vector {
  return start.multiply(1 - t).add(target.multiply(t));
}

/** Progress of frame `i` of `transitionFrames`; a single frame is already done. */
export function transitionProgress(i: number, transitionFrames: number): number {
  return transitionFrames > 1 ? i / (transitionFrames - 1) : 1;
}

/** Cards before `movingIdx` are seated, later ones still wait at their start. */
export function cardPositionsAt(specs: readonly ShapeSpec[], movingIdx: number, current: Vector): Vector[] {
  return specs.map((spec, idx) => {
    if (idx < movingIdx) return spec.target;
    if (idx === movingIdx) return current;
    return spec.start;
  });
}

export type PlannedFrame =
  | { kind: 'start' }
  | { kind: 'transition'; card: number; scene: SceneOptions }
  | { kind: 'end' };

/**
 * Frame-by-frame schedule: `holdFrames` of the start state, then each card
 * in order slides to its slot over `transitionFrames`, then `holdFrames` of
 * the end state.
 */
export function planAnimation(specs: readonly ShapeSpec[], { holdFrames, transitionFrames }: AnimationTiming): PlannedFrame[] {
  const plan: PlannedFrame[] = [];
  for (let i = 0; i < holdFrames; i++) plan.push({ kind: 'start' });

  specs.forEach((spec, card) => {
    for (let i = 0; i < transitionFrames; i++) {
      const current = lerpPoint(spec.start, spec.target, transitionProgress(i, transitionFrames));
      plan.push({
        kind: 'transition',
        card,
        scene: { cardPositions: cardPositionsAt(specs, card, current), drawOutlines: true },
      });
    }
  });

  for (let i = 0; i < holdFrames; i++) plan.push({ kind: 'end' });
  return plan;
}

export function createAnimationFrames(
  renderer: ShapeSorterRenderer,
  specs: readonly ShapeSpec[],
  timing: AnimationTiming,
): Frame[] {
  const first = captureFrame(renderer.renderStart(specs));
  const last = captureFrame(renderer.renderEnd(specs));
  const copy = (f: Frame): Frame => ({ data: f.data.slice(), width: f.width, height: f.height });

  return planAnimation(specs, timing).map(step => {
    switch (step.kind) {
      case 'start': return copy(first);
      case 'end': return copy(last);
      case 'transition': return captureFrame(renderer.renderScene(specs, step.scene));
    }
  });
}

/**
 * Spread the frame budget (`maxDurationSeconds * fps`, less the holds)
 * across the cards, never dropping below MIN_TRANSITION_FRAMES per card.
 * With many cards the video may run past the budget.
 */
export function transitionFramesFor(
  numCards: number,
  fps: number,
  maxDurationSeconds: number,
  holdFrames: number,
): number {
  const maxFrames = Math.trunc(maxDurationSeconds * fps);
  const available = maxFrames - 2 * holdFrames;
  if (numCards <= 0) return MIN_TRANSITION_FRAMES;
  return Math.max(MIN_TRANSITION_FRAMES, Math.trunc(available / numCards));
}
