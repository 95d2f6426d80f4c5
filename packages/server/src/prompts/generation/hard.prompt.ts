/**
 * ===================================================================
 * HARD DIFFICULTY CALIBRATION PROMPT
 * ===================================================================
 *
 * PURPOSE:
 * Defines what "Hard" means: several steps plus a solution technique that a
 * direct brute-force approach misses or makes impractical.
 *
 * WHEN IT'S USED:
 * Embedded by buildGenerationSystemPrompt(); applied when the user message
 * carries <difficulty>Hard</difficulty>.
 *
 * OPTIMIZATION NOTES:
 * - Hard means conceptually deeper, not longer. A short stem that needs
 *   remainder patterns or a smart substitution beats a long stem with
 *   routine arithmetic.
 * - Check that the intended technique is actually required: if plugging in
 *   the choices solves it in seconds, the item is Medium.
 *
 * ===================================================================
 */

export const getHardDifficultyPrompt = (): string =>
  `HARD difficulty calibration:
- Multiple steps, and the efficient route uses a less common technique: units-digit or remainder cycles, symmetry, smart number substitution, complementary counting, or factoring an expression before evaluating it.
- Direct computation should be slow or error-prone, so that recognising the technique is the skill being tested.
- At least two distractors are traps: each is the result of a specific, nameable reasoning error.
- Keep the stem short. Difficulty comes from the reasoning, not from length.
- Target: challenges a test taker scoring in the top quartile.`.trim();
