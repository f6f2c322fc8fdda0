import { describe, it, expect } from 'vitest';
import { PROMPT_TEMPLATES, fillTemplate, formatShapeSummary, getAllPrompts, getPrompt } from './prompts';

describe('formatShapeSummary', () => {
  it('is empty for no labels', () => {
    expect(formatShapeSummary([])).toBe('');
  });

  it('handles a single card', () => {
    expect(formatShapeSummary(['red circle'])).toBe('Match the red circle card to its outline.');
  });

  it('handles two cards', () => {
    expect(formatShapeSummary(['red circle', 'blue square']))
      .toBe('Match the red circle card first, followed by the blue square card.');
  });

  it('lists three or more cards in order', () => {
    expect(formatShapeSummary(['red circle', 'blue square', 'green star']))
      .toBe('Match the red circle, blue square, and finally the green star card.');
    expect(formatShapeSummary(['a', 'b', 'c', 'd'])).toBe('Match the a, b, c, and finally the d card.');
  });

  it('skips empty labels', () => {
    expect(formatShapeSummary(['', 'red circle', ''])).toBe('Match the red circle card to its outline.');
  });
});

describe('getPrompt', () => {
  it('has exactly two templates, each with one placeholder', () => {
    expect(getAllPrompts()).toHaveLength(2);
    for (const t of getAllPrompts()) {
      expect(t.split('{shape_summary}')).toHaveLength(2);
    }
  });

  it('fills the chosen template with the summary', () => {
    const prompt = getPrompt(['red circle'], () => 0);
    expect(prompt).toBe(fillTemplate(PROMPT_TEMPLATES[0], 'Match the red circle card to its outline.'));
    expect(prompt).toContain(' Match the red circle card to its outline. Stop the video');
  });

  it('can pick the second template', () => {
    expect(getPrompt(['red circle', 'blue square'], () => 0.99)).toBe(
      'Solve the flat shape sorter puzzle exactly as shown. '
      + 'Starting from the unsolved first frame, drag the colored cards across the board and place them into the matching outlines on the right. '
      + 'Match the red circle card first, followed by the blue square card. '
      + 'Keep the board orientation unchanged and end once all outlines are packed tightly.',
    );
  });

  it('inserts labels verbatim, even with $ sequences', () => {
    const labels = ["$' circle", '$& square'];
    const summary = "Match the $' circle card first, followed by the $& square card.";
    expect(formatShapeSummary(labels)).toBe(summary);
    const prompt = getPrompt(labels, () => 0);
    expect(prompt).toBe(PROMPT_TEMPLATES[0].split('{shape_summary}').join(summary));
    expect(prompt).toContain(` ${summary} Stop the video`);
    expect(fillTemplate('<{shape_summary}>', '$$ and $`')).toBe('<$$ and $`>');
  });

  it('leaves an empty summary when there are no labels', () => {
    expect(getPrompt([], () => 0)).not.toContain('{shape_summary}');
    expect(getPrompt([], () => 0)).toContain('without teleportation.  Stop the video');
  });
});
