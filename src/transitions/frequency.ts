import { FrequencyEntry, TransitionFrequency } from './transitions.types';

// Un objet JS remonterait les clés numériques ("2") en tête : on garde des entrées.
export function frequencyEntries(freq: TransitionFrequency): FrequencyEntry[] {
  return [...freq].map(([transition, count]) => ({ transition, count }));
}

/** Objet JSON indenté (2 espaces), clés dans l'ordre de la Map. */
export function frequencyToJson(freq: TransitionFrequency): string {
  if (!freq.size) return '{}';
  const lines = [...freq].map(
    ([transition, count]) => `  ${JSON.stringify(transition)}: ${count}`,
  );
  return `{\n${lines.join(',\n')}\n}`;
}
