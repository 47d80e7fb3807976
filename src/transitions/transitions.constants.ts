export const MARKER = 'À savoir également dans votre département';

export const TRANSITIONS_LABEL = 'Transitions';

// ex: "62 du 07/05" (numéro d'article + date)
export const HEADER_PATTERN = /^\s*\d+\s+du\s+\d{2}\/\d{2}/;

export const DEFAULT_EXAMPLE_CAP = 3;

export const SYSTEM_PROMPT =
  'Insert a short, natural transition phrase between two news paragraphs.';
