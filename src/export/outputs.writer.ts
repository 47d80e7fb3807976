import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { frequencyToJson } from '../transitions/frequency';
import { toTrainingRecord } from '../transitions/training-record';
import { AggregateResult } from '../transitions/transitions.types';

export const OUTPUT_KINDS = [
  'json',
  'jsonl',
  'rejected',
  'transitions',
  'duplicates',
  'fineTuningRejected',
] as const;

export type OutputKind = (typeof OUTPUT_KINDS)[number];

export const OUTPUT_FILES: Record<OutputKind, string> = {
  json: 'fewshot_examples.json',
  jsonl: 'fewshot_examples.jsonl',
  rejected: 'fewshots_rejected.txt',
  transitions: 'transitions_only.txt',
  duplicates: 'transitions_only_rejected.txt',
  fineTuningRejected: 'fewshots-fineTuning_rejected.txt',
};

export type OutputFile = { name: string; content: string };

export function isOutputKind(v: string): v is OutputKind {
  return OUTPUT_KINDS.some((k) => k === v);
}

function pretty(v: unknown): string {
  return JSON.stringify(v, null, 2);
}

function render(kind: OutputKind, result: AggregateResult): string {
  switch (kind) {
    case 'json':
      return pretty(result.examples);
    case 'jsonl':
      return result.examples
        .map((ex) => JSON.stringify(toTrainingRecord(ex)) + '\n')
        .join('');
    case 'rejected':
    case 'fineTuningRejected':
      return frequencyToJson(result.overflow_transitions);
    case 'transitions':
      return result.unique_transitions.join('\n');
    case 'duplicates':
      return frequencyToJson(result.duplicate_transitions);
  }
}

/** Contenu des fichiers demandés, toujours dans l'ordre de OUTPUT_KINDS. */
export function renderOutputs(
  result: AggregateResult,
  kinds: readonly OutputKind[] = OUTPUT_KINDS,
): OutputFile[] {
  return OUTPUT_KINDS.filter((k) => kinds.includes(k)).map((k) => ({
    name: OUTPUT_FILES[k],
    content: render(k, result),
  }));
}

export async function writeOutputs(
  dir: string,
  files: readonly OutputFile[],
): Promise<string[]> {
  await mkdir(dir, { recursive: true });
  const written: string[] = [];
  for (const f of files) {
    await writeFile(join(dir, f.name), f.content, 'utf8');
    written.push(f.name);
  }
  return written;
}
