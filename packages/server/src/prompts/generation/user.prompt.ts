import type { DifficultyLevel } from '@gmat-tutor/shared';

interface GenerationUserPromptParams {
  topic: string;
  difficulty: DifficultyLevel;
}

/** Topic must already be sanitized; it is wrapped in XML tags as data. */
export const buildGenerationUserMessage = (params: GenerationUserPromptParams): string => {
  const { topic, difficulty } = params;

  return `<topic>${topic}</topic>
<difficulty>${difficulty}</difficulty>

Generate one ${difficulty} difficulty GMAT quantitative Problem Solving question on the topic above, with 5 answer choices labelled A to E.`.trim();
};
