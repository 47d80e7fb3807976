import 'reflect-metadata';
import 'dotenv/config';
import { readFileSync } from 'fs';
import { basename } from 'path';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { AppModule } from '../app.module';
import { TransitionsService } from '../transitions/transitions.service';
import {
  OUTPUT_KINDS,
  OutputKind,
  isOutputKind,
  renderOutputs,
  writeOutputs,
} from '../export/outputs.writer';
import { toParagraphs } from '../utils/paragraphs';

const PREVIEW_ROWS = 10;

export function parseArgs(args: string[] = process.argv.slice(2)) {
  const out: Record<string, string> = {};
  for (let i = 0; i < args.length; i++) {
    const curr = args[i];
    if (!curr.startsWith('--')) continue;

    const eq = curr.indexOf('=');
    if (eq !== -1) {
      // --k=a=b -> k = "a=b"
      out[curr.slice(2, eq)] = curr.slice(eq + 1);
      continue;
    }
    const next = args[i + 1];
    out[curr.slice(2)] =
      next !== undefined && !next.startsWith('--') ? args[++i] : '';
  }
  return out;
}

// --only "json,jsonl" ; vide = tous les fichiers
export function parseKinds(v?: string): OutputKind[] {
  const wanted = (v || '')
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
  if (!wanted.length) return [...OUTPUT_KINDS];

  const unknown = wanted.filter((k) => !isOutputKind(k));
  if (unknown.length) {
    throw new Error(
      `Unknown output kind(s): ${unknown.join(', ')} (expected ${OUTPUT_KINDS.join(', ')})`,
    );
  }
  return wanted.filter(isOutputKind);
}

export interface CliContext {
  transitions: Pick<TransitionsService, 'extractAndRecord'>;
  outputDir?: string;
  close(): Promise<void>;
}

export interface CliDeps {
  openContext(): Promise<CliContext>;
  readText(file: string): string;
  console: Pick<Console, 'log' | 'warn' | 'error' | 'table'>;
}

const USAGE =
  'Usage: npm run extract -- --file ./docs/bulletin.txt [--doc_id "bulletin-07-05"] [--out "output1"] [--only "json,jsonl,rejected,transitions,duplicates,fineTuningRejected"]';

async function openAppContext(): Promise<CliContext> {
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: false,
  });
  return {
    transitions: app.get(TransitionsService),
    outputDir: app.get(ConfigService).get<string>('OUTPUT_DIR'),
    close: () => app.close(),
  };
}

const defaultDeps: CliDeps = {
  openContext: openAppContext,
  readText: (file) => readFileSync(file, 'utf8'),
  console,
};

/** Retourne le code de sortie du processus. */
export async function run(
  argv: string[],
  deps: CliDeps = defaultDeps,
): Promise<number> {
  const out = deps.console;
  const args = parseArgs(argv);
  const file = args['file'];
  if (!file) {
    out.error(USAGE);
    return 1;
  }
  const docId = args['doc_id'] || basename(file);
  const kinds = parseKinds(args['only']);

  const paragraphs = toParagraphs(deps.readText(file));
  out.log('[extract] paragraphs read:', paragraphs.length);

  const ctx = await deps.openContext();
  try {
    const outDir = args['out'] || ctx.outputDir || 'output1';

    const result = await ctx.transitions.extractAndRecord(paragraphs, {
      doc_id: docId,
    });
    if (!result.articles.length) {
      out.warn(
        'No structured articles or transitions detected in this document.',
      );
      return 0;
    }

    out.table(result.examples.slice(0, PREVIEW_ROWS));
    out.log(`Total fewshot examples extracted: ${result.examples.length}`);

    const written = await writeOutputs(outDir, renderOutputs(result, kinds));
    out.log(`Generated ${written.join(', ')} in ${outDir}/`);
    return 0;
  } finally {
    await ctx.close();
  }
}

if (require.main === module) {
  run(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((e) => {
      const msg = e instanceof Error ? e.message : String(e);
      console.error('Extraction failed:', msg);
      process.exit(1);
    });
}
