/**
 * OutputArtifactWriter
 *
 * Writes the four artifacts of one input under OUTPUT_DIR:
 *   questions/{base}.json, surveys/{base}.json, html/{base}.html, responses/{base}.txt
 *
 * All four are staged as temp files first and only then renamed into place. If staging
 * fails nothing new is visible; if a rename fails the already renamed files are removed
 * again, so a run never leaves a mixed set under the final names.
 */

import { promises as fs } from 'fs';
import { join } from 'path';
import { randomUUID } from 'crypto';
import { ArtifactWriteError } from '../types/errors.js';
import { logger } from '../utils/logger.js';

export type ArtifactType = 'questions' | 'survey' | 'html' | 'response';

export type SurveyArtifacts = Record<ArtifactType, string>;

export type ArtifactPaths = Record<ArtifactType, string>;

const ARTIFACT_LAYOUT: Record<ArtifactType, { dir: string; extension: string }> = {
  questions: { dir: 'questions', extension: 'json' },
  survey: { dir: 'surveys', extension: 'json' },
  html: { dir: 'html', extension: 'html' },
  response: { dir: 'responses', extension: 'txt' },
};

const ARTIFACT_TYPES: readonly ArtifactType[] = ['questions', 'survey', 'html', 'response'];

/**
 * Filesystem operations the writer needs. Replaceable so tests can inject failures.
 */
export interface ArtifactFileOps {
  mkdir(path: string): Promise<void>;
  writeFile(path: string, data: string): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  remove(path: string): Promise<void>;
}

export const nodeFileOps: ArtifactFileOps = {
  mkdir: async path => {
    await fs.mkdir(path, { recursive: true });
  },
  writeFile: (path, data) => fs.writeFile(path, data, 'utf8'),
  rename: (from, to) => fs.rename(from, to),
  remove: path => fs.rm(path, { force: true }),
};

export class OutputArtifactWriter {
  private readonly outputDir: string;
  private readonly fileOps: ArtifactFileOps;

  constructor(outputDir: string, fileOps: ArtifactFileOps = nodeFileOps) {
    this.outputDir = outputDir;
    this.fileOps = fileOps;
  }

  pathsFor(baseName: string): ArtifactPaths {
    const pathOf = (type: ArtifactType): string => {
      const { dir, extension } = ARTIFACT_LAYOUT[type];
      return join(this.outputDir, dir, `${baseName}.${extension}`);
    };
    return {
      questions: pathOf('questions'),
      survey: pathOf('survey'),
      html: pathOf('html'),
      response: pathOf('response'),
    };
  }

  /**
   * @throws {ArtifactWriteError} after cleaning up temp files and partially renamed files
   */
  async write(baseName: string, artifacts: SurveyArtifacts): Promise<ArtifactPaths> {
    const paths = this.pathsFor(baseName);
    const staged: Array<{ tempPath: string; finalPath: string }> = [];
    const renamed: string[] = [];

    try {
      for (const type of ARTIFACT_TYPES) {
        await this.fileOps.mkdir(join(this.outputDir, ARTIFACT_LAYOUT[type].dir));
        const finalPath = paths[type];
        const tempPath = `${finalPath}.${randomUUID()}.tmp`;
        staged.push({ tempPath, finalPath });
        await this.fileOps.writeFile(tempPath, artifacts[type]);
      }

      for (const { tempPath, finalPath } of staged) {
        await this.fileOps.rename(tempPath, finalPath);
        renamed.push(finalPath);
      }
    } catch (error) {
      await this.rollback(staged, renamed);
      throw new ArtifactWriteError(`Failed to write artifacts for ${baseName}`, error);
    }

    logger.debug({ baseName, paths }, 'Artifacts written');
    return paths;
  }

  private async rollback(staged: Array<{ tempPath: string }>, renamed: string[]): Promise<void> {
    for (const path of [...staged.map(entry => entry.tempPath), ...renamed]) {
      try {
        await this.fileOps.remove(path);
      } catch (cleanupError) {
        logger.warn(
          { path, error: cleanupError instanceof Error ? cleanupError.message : String(cleanupError) },
          'Failed to clean up artifact file'
        );
      }
    }
  }
}
