/**
 * Artifact Store - Content-keyed stage outputs on top of StorageTool
 *
 * An artifact is written once, after its stage succeeded, under a path
 * derived from its key. A changed input means a different key and therefore
 * a different object; nothing is rewritten in place.
 */

import type { PipelineArtifact, PipelineStage } from '../types';
import { Logger } from '../utils';
import type { StorageTool } from './storage';

export const ARTIFACT_SCHEMA_VERSION = 1;

export function artifactPath(stage: PipelineStage, key: string): string {
  return `artifacts/${stage}/${key}.json`;
}

export class ArtifactStore {
  constructor(private readonly storage: StorageTool) {}

  /**
   * Loads a committed artifact. Misses, schema changes and envelopes whose
   * key does not match are all treated as absent.
   */
  async load<T>(
    stage: PipelineStage,
    key: string,
    decode: (data: unknown) => T
  ): Promise<PipelineArtifact<T> | null> {
    const raw = await this.storage.get(artifactPath(stage, key));
    if (!raw) return null;

    let envelope: unknown;
    try {
      envelope = JSON.parse(raw.toString('utf-8'));
    } catch {
      Logger.warn('Ignoring unreadable artifact', { stage, key });
      return null;
    }

    if (
      typeof envelope !== 'object' ||
      envelope === null ||
      !('key' in envelope) ||
      !('schema_version' in envelope) ||
      !('data' in envelope) ||
      envelope.key !== key ||
      envelope.schema_version !== ARTIFACT_SCHEMA_VERSION
    ) {
      Logger.warn('Ignoring stale artifact', { stage, key });
      return null;
    }

    const createdAt = 'created_at' in envelope && typeof envelope.created_at === 'string'
      ? envelope.created_at
      : '';

    let data: T;
    try {
      data = decode(envelope.data);
    } catch (error) {
      Logger.warn('Ignoring artifact that no longer decodes', {
        stage,
        key,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }

    return {
      key,
      stage,
      schema_version: ARTIFACT_SCHEMA_VERSION,
      created_at: createdAt,
      data,
    };
  }

  async commit<T>(stage: PipelineStage, key: string, data: T): Promise<PipelineArtifact<T>> {
    const artifact: PipelineArtifact<T> = {
      key,
      stage,
      schema_version: ARTIFACT_SCHEMA_VERSION,
      created_at: new Date().toISOString(),
      data,
    };

    await this.storage.put(artifactPath(stage, key), JSON.stringify(artifact, null, 2), 'application/json');
    Logger.debug('Artifact committed', { stage, key });
    return artifact;
  }
}
