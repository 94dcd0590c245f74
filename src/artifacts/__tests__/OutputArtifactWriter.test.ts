import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { nodeFileOps, OutputArtifactWriter, type ArtifactFileOps, type SurveyArtifacts } from '../OutputArtifactWriter.js';
import { ArtifactWriteError, JobErrorKind } from '../../types/errors.js';

const artifacts: SurveyArtifacts = {
  questions: '[{"id":"1"}]',
  survey: '{"pages":[]}',
  html: '<html>{"pages":[]}</html>',
  response: '```json\n{"pages":[]}\n```',
};

const ARTIFACT_DIRS = ['questions', 'surveys', 'html', 'responses'];

describe('OutputArtifactWriter', () => {
  let outputDir: string;

  beforeEach(async () => {
    outputDir = await fs.mkdtemp(join(tmpdir(), 'artifacts-'));
  });

  afterEach(async () => {
    await fs.rm(outputDir, { recursive: true, force: true });
  });

  async function listAll(): Promise<string[]> {
    const entries: string[] = [];
    for (const dir of ARTIFACT_DIRS) {
      const names = await fs.readdir(join(outputDir, dir)).catch((): string[] => []);
      entries.push(...names.map(name => `${dir}/${name}`));
    }
    return entries.sort();
  }

  it('derives one path per artifact from the base name', () => {
    const writer = new OutputArtifactWriter('out');

    expect(writer.pathsFor('intake')).toEqual({
      questions: join('out', 'questions', 'intake.json'),
      survey: join('out', 'surveys', 'intake.json'),
      html: join('out', 'html', 'intake.html'),
      response: join('out', 'responses', 'intake.txt'),
    });
  });

  it('writes all four artifacts and leaves no temp files', async () => {
    const writer = new OutputArtifactWriter(outputDir);

    const paths = await writer.write('intake', artifacts);

    await expect(fs.readFile(paths.questions, 'utf8')).resolves.toBe(artifacts.questions);
    await expect(fs.readFile(paths.survey, 'utf8')).resolves.toBe(artifacts.survey);
    await expect(fs.readFile(paths.html, 'utf8')).resolves.toBe(artifacts.html);
    await expect(fs.readFile(paths.response, 'utf8')).resolves.toBe(artifacts.response);
    await expect(listAll()).resolves.toEqual([
      'html/intake.html',
      'questions/intake.json',
      'responses/intake.txt',
      'surveys/intake.json',
    ]);
  });

  it('replaces artifacts of an earlier run', async () => {
    const writer = new OutputArtifactWriter(outputDir);
    await writer.write('intake', artifacts);

    const paths = await writer.write('intake', { ...artifacts, survey: '{"pages":[{"name":"page0"}]}' });

    await expect(fs.readFile(paths.survey, 'utf8')).resolves.toBe('{"pages":[{"name":"page0"}]}');
  });

  it('leaves nothing visible when a rename fails midway', async () => {
    const failingOps: ArtifactFileOps = {
      ...nodeFileOps,
      rename: async (from, to) => {
        if (to.endsWith(join('surveys', 'intake.json'))) {
          throw new Error('disk full');
        }
        await nodeFileOps.rename(from, to);
      },
    };
    const writer = new OutputArtifactWriter(outputDir, failingOps);

    const error = await writer.write('intake', artifacts).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ArtifactWriteError);
    expect(error).toMatchObject({
      kind: JobErrorKind.ARTIFACT_WRITE_ERROR,
      message: 'Failed to write artifacts for intake',
      diagnostic: { cause: 'disk full' },
    });
    await expect(listAll()).resolves.toEqual([]);
  });

  it('leaves nothing visible when staging fails', async () => {
    const failingOps: ArtifactFileOps = {
      ...nodeFileOps,
      writeFile: async (path, data) => {
        if (path.includes(join('html', 'intake.html'))) {
          throw new Error('permission denied');
        }
        await nodeFileOps.writeFile(path, data);
      },
    };
    const writer = new OutputArtifactWriter(outputDir, failingOps);

    await expect(writer.write('intake', artifacts)).rejects.toBeInstanceOf(ArtifactWriteError);
    await expect(listAll()).resolves.toEqual([]);
  });
});
