/**
 * ===================================================================
 * EASY DIFFICULTY CALIBRATION PROMPT
 * ===================================================================
 *
 * PURPOSE:
 * Defines what "Easy" means for a GMAT quant item: a single arithmetic or
 * algebraic step a prepared test taker completes in under a minute.
 *
 * WHEN IT'S USED:
 * Embedded by buildGenerationSystemPrompt() in generation/system.prompt.ts,
 * next to the Medium and Hard calibrations. The model applies the one that
 * matches the <difficulty>Easy</difficulty> tag of the user message.
 *
 * OPTIMIZATION NOTES:
 * - Failure mode: an "easy" item that quietly needs two steps (e.g. solve
 *   for x, then compute 2x + 1). That is Medium.
 * - Distractors still matter at this level: they should come from a slip
 *   such as a sign error, not from random numbers.
 *
 * ===================================================================
 */

export const getEasyDifficultyPrompt = (): string =>
  `EASY difficulty calibration:
- Exactly one computational step: a single arithmetic operation, one linear equation, one percent or ratio lookup.
- Numbers are small and clean; no calculator-style arithmetic.
- The stem is two sentences at most.
- Distractors come from one common slip each: a sign error, adding instead of multiplying, using the wrong base for a percent.
- Target: a prepared test taker answers correctly in under 60 seconds.`.trim();
