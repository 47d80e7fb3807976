import { SYSTEM_PROMPT } from './transitions.constants';
import { Example, TrainingRecord } from './transitions.types';

export function toTrainingRecord(ex: Example): TrainingRecord {
  return {
    messages: [
      { role: 'system', content: SYSTEM_PROMPT },
      {
        role: 'user',
        content: `Paragraph A: ${ex.paragraph_a}\nParagraph B: ${ex.paragraph_b}`,
      },
      { role: 'assistant', content: ex.transition },
    ],
  };
}
