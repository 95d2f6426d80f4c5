/**
 * ===================================================================
 * MEDIUM DIFFICULTY CALIBRATION PROMPT
 * ===================================================================
 *
 * PURPOSE:
 * Defines what "Medium" means: two or three chained steps with one plausible
 * trap built into the answer choices.
 *
 * WHEN IT'S USED:
 * Embedded by buildGenerationSystemPrompt(); applied when the user message
 * carries <difficulty>Medium</difficulty>. Medium is also the default when the
 * caller omits a difficulty.
 *
 * OPTIMIZATION NOTES:
 * - The trap must be a real one: the value a careful-but-hurried solver gets
 *   by stopping one step early or misreading what the question asks for.
 * - The explanation must name the trap. Feedback generation relies on it to
 *   tell a student why their choice was attractive.
 *
 * ===================================================================
 */

export const getMediumDifficultyPrompt = (): string =>
  `MEDIUM difficulty calibration:
- Two or three chained steps, for example translating a word problem into an equation and then solving it.
- Include exactly one plausible trap: one answer choice equals the value obtained by stopping a step early, answering a different quantity than the one asked, or applying a common misconception.
- The explanation names the trap and says why it is wrong.
- Target: a prepared test taker answers correctly in about two minutes.`.trim();
