export type TransitionSplit = { before: string; after: string };

// Première occurrence littérale uniquement ; null si absente du narratif.
export function splitOnTransition(
  narrative: string,
  transition: string,
): TransitionSplit | null {
  const idx = narrative.indexOf(transition);
  if (idx === -1) return null;
  return {
    before: narrative.slice(0, idx).trim(),
    after: narrative.slice(idx + transition.length).trim(),
  };
}
