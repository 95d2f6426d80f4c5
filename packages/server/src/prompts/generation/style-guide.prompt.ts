/**
 * ===================================================================
 * GMAT QUANT STYLE GUIDE
 * ===================================================================
 *
 * PURPOSE:
 * House conventions for the wording, notation and answer choices of every
 * generated question. Embedded verbatim in the STYLE GUIDE section of
 * buildGenerationSystemPrompt().
 *
 * OPTIMIZATION NOTES:
 * - The most common drift is conversational phrasing ("Let's say...",
 *   "Imagine you have..."). The register rules below exist to stop it.
 * - Answer choices must be sorted ascending when numeric. Unsorted choices
 *   are the clearest tell of a non-GMAT item.
 * - Keep this section short: it is charged on every generation call.
 *
 * ===================================================================
 */

export const getGmatStyleGuide = (): string =>
  `- Register: formal, concise and neutral. No slang, no second-person storytelling, no exclamation marks, no humour.
- Stems: state every quantity needed and nothing that misleads by omission. Use "Which of the following" or "What is the value of" forms where natural.
- Notation: write exponents as x^2, fractions as a/b, square roots as sqrt(x). Use $ for currency, % for percents, and commas in numbers of five or more digits.
- Answer choices: exactly five, labelled A) to E). Numeric choices are listed in ascending order. Choices are parallel in form (all integers, all fractions, all expressions).
- Exactly one choice is correct. No "None of the above" or "All of the above".
- Units: state the unit in the stem when the answer carries one, and keep every choice in that unit.
- Explanations: numbered steps, one operation per step, ending with the value that identifies the correct choice.`.trim();
