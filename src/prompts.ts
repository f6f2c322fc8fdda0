import type { Rng } from './random';
import { choice } from './random';

const SUMMARY_PLACEHOLDER = '{shape_summary}';

export const PROMPT_TEMPLATES: readonly string[] = [
  'Move each colored shape card from the left staging area into its matching outline on the right. ' +
    'Keep the camera fixed in the top-down view, move only one card at a time, and slide the cards smoothly without teleportation. ' +
    `${SUMMARY_PLACEHOLDER} ` +
    'Stop the video when every outline is filled exactly.',
  'Solve the flat shape sorter puzzle exactly as shown. ' +
    'Starting from the unsolved first frame, drag the colored cards across the board and place them into the matching outlines on the right. ' +
    `${SUMMARY_PLACEHOLDER} ` +
    'Keep the board orientation unchanged and end once all outlines are packed tightly.',
];

/** One sentence naming the cards in the order they should be placed. */
export function formatShapeSummary(shapeLabels: Iterable<string>): string {
  const labels = [...shapeLabels].filter(label => label.length > 0);
  if (labels.length === 0) return '';
  if (labels.length === 1) return `Match the ${labels[0]} card to its outline.`;
  if (labels.length === 2) return `Match the ${labels[0]} card first, followed by the ${labels[1]} card.`;
  const body = labels.slice(0, -1).join(', ');
  return `Match the ${body}, and finally the ${labels[labels.length - 1]} card.`;
}

/** Inserts `summary` verbatim; `$` sequences in labels are not patterns. */
export function fillTemplate(template: string, summary: string): string {
  return template.replace(SUMMARY_PLACEHOLDER, () => summary);
}

export function getPrompt(shapeLabels: Iterable<string>, rng: Rng = Math.random): string {
  return fillTemplate(choice(rng, PROMPT_TEMPLATES), formatShapeSummary(shapeLabels));
}

export function getAllPrompts(): readonly string[] {
  return PROMPT_TEMPLATES;
}
