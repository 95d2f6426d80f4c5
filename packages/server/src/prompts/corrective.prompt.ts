/**
 * Builds the user-role message sent after a response failed parsing or schema
 * validation. The failed response itself precedes it as the assistant turn, so
 * the model sees exactly what was rejected and why.
 */
export const buildCorrectiveMessage = (blockName: string, error: string): string =>
  `Your previous response could not be accepted: ${error}

Respond again using the required output format. The <${blockName}> block must contain a single JSON object that matches the schema exactly, with every required field present. Output nothing else.`.trim();
