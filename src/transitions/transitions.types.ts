export type Article = {
  narrative: string;
  transitions: string[];
};

export type Example = {
  paragraph_a: string;
  transition: string;
  paragraph_b: string;
};

// transition -> nombre d'occurrences (ordre de première apparition)
export type TransitionFrequency = Map<string, number>;

export type FrequencyEntry = { transition: string; count: number };

export type AggregateResult = {
  examples: Example[];
  transition_counts: TransitionFrequency;
  unique_transitions: string[];
  duplicate_transitions: TransitionFrequency;
  overflow_transitions: TransitionFrequency;
};

export type ChatRole = 'system' | 'user' | 'assistant';

export type ChatMessage = { role: ChatRole; content: string };

export type TrainingRecord = { messages: ChatMessage[] };
