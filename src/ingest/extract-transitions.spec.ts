import { mkdtemp, readFile, readdir, rm } from 'fs/promises';
import { readFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { Test } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { getRepositoryToken } from '@nestjs/typeorm';
import { CliDeps, parseArgs, parseKinds, run } from './extract-transitions';
import { ExtractionRun } from '../transitions/extraction-run.entity';
import { TransitionsService } from '../transitions/transitions.service';
import {
  BULLETIN_PATH,
  fakeRunsRepository,
} from '../transitions/__fixtures__/bulletin.fixture';

describe('extract-transitions CLI', () => {
  it('parses --key value and --key=value forms', () => {
    expect(
      parseArgs(['--file', 'doc.txt', '--out=sortie', '--only', '--doc_id', 'x']),
    ).toEqual({ file: 'doc.txt', out: 'sortie', only: '', doc_id: 'x' });
  });

  it('keeps everything after the first "=" as the value', () => {
    expect(parseArgs(['--doc_id=a=b', 'libre'])).toEqual({ doc_id: 'a=b' });
  });

  it('selects every output kind when --only is empty', () => {
    expect(parseKinds('')).toEqual([
      'json',
      'jsonl',
      'rejected',
      'transitions',
      'duplicates',
      'fineTuningRejected',
    ]);
    expect(parseKinds(undefined)).toHaveLength(6);
  });

  it('keeps the requested kinds', () => {
    expect(parseKinds(' jsonl, transitions ')).toEqual(['jsonl', 'transitions']);
  });

  it('rejects unknown kinds', () => {
    expect(() => parseKinds('json,zip')).toThrow(
      'Unknown output kind(s): zip (expected json, jsonl, rejected, transitions, duplicates, fineTuningRejected)',
    );
  });
});

describe('run', () => {
  let dir: string;
  let close: jest.Mock;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'extract-'));
    close = jest.fn().mockResolvedValue(undefined);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function makeDeps(text: string) {
    const moduleRef = await Test.createTestingModule({
      providers: [
        TransitionsService,
        { provide: ConfigService, useValue: { get: () => undefined } },
        {
          provide: getRepositoryToken(ExtractionRun),
          useValue: fakeRunsRepository(),
        },
      ],
    }).compile();
    const openContext = jest.fn(async () => ({
      transitions: moduleRef.get(TransitionsService),
      outputDir: join(dir, 'defaut'),
      close,
    }));
    const deps: CliDeps = {
      openContext,
      readText: () => text,
      console: {
        log: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
        table: jest.fn(),
      },
    };
    return { deps, openContext };
  }

  it('prints usage and exits 1 without --file', async () => {
    const { deps, openContext } = await makeDeps('');

    expect(await run(['--out', dir], deps)).toBe(1);
    expect(deps.console.error).toHaveBeenCalledWith(
      expect.stringMatching(/^Usage: npm run extract -- --file /),
    );
    expect(openContext).not.toHaveBeenCalled();
  });

  it('warns, writes nothing and exits 0 when no article is found', async () => {
    const { deps } = await makeDeps('62 du 07/05\nRien à signaler.');
    const out = join(dir, 'sortie');

    expect(await run(['--file', 'vide.txt', '--out', out], deps)).toBe(0);
    expect(deps.console.warn).toHaveBeenCalledWith(
      'No structured articles or transitions detected in this document.',
    );
    expect(await readdir(dir)).toEqual([]);
    expect(close).toHaveBeenCalledTimes(1);
  });

  it('writes the selected files into the output directory', async () => {
    const { deps } = await makeDeps(readFileSync(BULLETIN_PATH, 'utf8'));
    const out = join(dir, 'sortie');

    const code = await run(
      ['--file', 'bulletin.txt', '--out', out, '--only', 'transitions,json'],
      deps,
    );

    expect(code).toBe(0);
    expect((await readdir(out)).sort()).toEqual([
      'fewshot_examples.json',
      'transitions_only.txt',
    ]);
    expect(await readFile(join(out, 'transitions_only.txt'), 'utf8')).toBe(
      'Du côté de\nEnfin,\nPar ailleurs,',
    );
    expect(deps.console.log).toHaveBeenCalledWith(
      `Generated fewshot_examples.json, transitions_only.txt in ${out}/`,
    );
    expect(close).toHaveBeenCalledTimes(1);
  });

  it('falls back to the configured output directory', async () => {
    const { deps } = await makeDeps(readFileSync(BULLETIN_PATH, 'utf8'));

    await run(['--file', 'bulletin.txt', '--only', 'jsonl'], deps);

    expect(await readdir(join(dir, 'defaut'))).toEqual([
      'fewshot_examples.jsonl',
    ]);
  });
});
