import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { BatchExecutionEngine, exitCodeFor } from '../BatchExecutionEngine.js';
import { discoverInputs } from '../inputDiscovery.js';
import { createSurveyRuntime } from '../../pipeline/surveyRuntime.js';
import { FileSystemCacheStore } from '../../cache/FileSystemCacheStore.js';
import { FakeRemoteModelService, SURVEY_RESPONSE } from '../../__tests__/fakes.js';
import { JobErrorKind, RemoteServiceError } from '../../../types/errors.js';

describe('batch run over a directory', () => {
  let workDir: string;
  let inputDir: string;
  let outputDir: string;
  let service: FakeRemoteModelService;

  async function runBatch(concurrency: number) {
    const runtime = await createSurveyRuntime({
      model: 'gemini-test',
      outputDir,
      examples: [],
      defaultPages: 'introduction,consent',
      defaultPagesDir: 'default_pages',
      service,
      store: new FileSystemCacheStore({ baseDir: join(workDir, 'cache') }),
    });
    const engine = new BatchExecutionEngine({
      concurrency,
      runJob: (input, context) => runtime.pipeline.run({ path: input }, { signal: context.signal }),
    });
    return engine.run(await discoverInputs(inputDir, ['pdf']));
  }

  beforeEach(async () => {
    workDir = await fs.mkdtemp(join(tmpdir(), 'batch-'));
    inputDir = join(workDir, 'input');
    outputDir = join(workDir, 'output');
    await fs.mkdir(inputDir);
    await fs.writeFile(join(inputDir, 'a.pdf'), '%PDF form a');
    await fs.writeFile(join(inputDir, 'b.pdf'), '%PDF form b');
    await fs.writeFile(join(inputDir, 'c.pdf'), '%PDF form c');
    service = new FakeRemoteModelService();
    service.delayMs = 2;
    // One question naming the uploaded file, so every document renders a distinct survey prompt
    service.respond = spec => {
      if (spec.responseMimeType === 'text/plain') {
        return SURVEY_RESPONSE;
      }
      const uris = spec.contents[0].parts.flatMap(part => ('fileData' in part ? [part.fileData.fileUri] : []));
      return JSON.stringify([{ id: '1', text: `Question from ${uris.join(',')}` }]);
    };
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  it('finishes the other jobs when one upload fails', async () => {
    service.failUpload = name =>
      name === 'b.pdf' ? new RemoteServiceError('Gemini', 'unsupported document', 'permanent', 400) : undefined;

    const report = await runBatch(2);

    expect(report).toMatchObject({ total: 3, succeeded: 2, failed: 1 });
    expect(report.perJob.map(job => job.outcome.status)).toEqual(['success', 'failure', 'success']);
    expect(report.perJob[1].outcome).toMatchObject({ errorKind: JobErrorKind.UPLOAD_ERROR });
    expect(exitCodeFor(report)).toBe(1);
    const surveys = await fs.readdir(join(outputDir, 'surveys'));
    expect(surveys.sort()).toEqual(['a.json', 'c.json']);
  });

  it('serves an identical rerun from the cache without billed tokens', async () => {
    const first = await runBatch(2);
    const artifact = await fs.readFile(join(outputDir, 'surveys', 'b.json'), 'utf8');
    const remoteCalls = service.generations.length;

    const second = await runBatch(2);

    expect(first.usage.total.inputTokens).toBe(600);
    expect(second).toMatchObject({ total: 3, succeeded: 3, failed: 0 });
    expect(second.usage.total).toEqual({ inputTokens: 0, outputTokens: 0, cachedTokens: 0, totalTokens: 0 });
    expect(second.usage.billedInputTokens).toBe(0);
    expect(second.usage).toMatchObject({ calls: 6, cacheHits: 6 });
    expect(service.generations).toHaveLength(remoteCalls);
    expect(service.uploads).toHaveLength(3);
    await expect(fs.readFile(join(outputDir, 'surveys', 'b.json'), 'utf8')).resolves.toBe(artifact);
  });

  it('counts the billed calls of a job whose survey response is malformed', async () => {
    await fs.rm(join(inputDir, 'b.pdf'));
    await fs.rm(join(inputDir, 'c.pdf'));
    const respond = service.respond;
    service.respond = spec => (spec.responseMimeType === 'text/plain' ? 'no fence here' : respond(spec));

    const report = await runBatch(1);

    expect(report.perJob[0].outcome).toMatchObject({ status: 'failure', errorKind: JobErrorKind.SURVEY_PARSE_ERROR });
    expect(service.generations).toHaveLength(2);
    expect(report.usage).toMatchObject({ calls: 2, cacheHits: 0 });
    expect(report.usage.total).toEqual({ inputTokens: 200, outputTokens: 80, cachedTokens: 0, totalTokens: 280 });
  });

  it('reports an empty directory as a successful batch', async () => {
    await fs.rm(inputDir, { recursive: true });
    await fs.mkdir(inputDir);

    const report = await runBatch(2);

    expect(report).toMatchObject({ total: 0, succeeded: 0, failed: 0 });
    expect(exitCodeFor(report)).toBe(0);
  });
});
