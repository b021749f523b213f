/**
 * File-backed transform store: one JSON document per transform.
 *
 * Documents are validated on every read, so hand-edited files go through
 * the same checks as API input. Unreadable files are skipped when listing.
 */

import { mkdir, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { v4 as uuidv4 } from 'uuid';

import type { Transform, TransformInput } from '@/types/transform.js';
import { parseStoredTransform, transformToDocument, validateTransformInput } from './schema.js';
import { NotFoundError, ValidationError, errorMessage } from '@/utils/errors.js';
import { createLogger } from '@/utils/logger.js';

const log = createLogger('transform-repository');

const ID_PATTERN = /^[A-Za-z0-9_-]+$/;

export function generateTransformId(): string {
  return `transform-${uuidv4().replace(/-/g, '').substring(0, 8)}`;
}

function readStoredTransform(raw: string, file: string): Transform {
  let doc: unknown;
  try {
    doc = JSON.parse(raw);
  } catch (err) {
    throw new ValidationError(`Could not parse transform file ${file}: ${errorMessage(err)}`);
  }
  return parseStoredTransform(doc);
}

export class TransformRepository {
  constructor(
    private readonly storageDir: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  private filePath(id: string): string {
    if (!ID_PATTERN.test(id)) {
      throw new ValidationError(`Invalid transform id "${id}"`);
    }
    return join(this.storageDir, `${id}.json`);
  }

  private async write(transform: Transform): Promise<void> {
    await mkdir(this.storageDir, { recursive: true });
    await writeFile(
      this.filePath(transform.id),
      `${JSON.stringify(transformToDocument(transform), null, 2)}\n`,
      'utf-8',
    );
  }

  /**
   * Validate and store a new transform with a generated id.
   *
   * @throws ValidationError
   */
  async create(input: unknown): Promise<Transform> {
    const validated: TransformInput = validateTransformInput(input);
    const timestamp = this.now().toISOString();
    const transform: Transform = {
      ...validated,
      id: generateTransformId(),
      createdAt: timestamp,
      updatedAt: timestamp,
    };

    await this.write(transform);
    log.info(`Created transform ${transform.id} ("${transform.name}")`);
    return transform;
  }

  /**
   * @throws NotFoundError if no transform has this id.
   */
  async get(id: string): Promise<Transform> {
    let raw: string;
    try {
      raw = await readFile(this.filePath(id), 'utf-8');
    } catch (err) {
      if (err instanceof ValidationError) throw err;
      throw new NotFoundError('transform', id);
    }
    return readStoredTransform(raw, `${id}.json`);
  }

  async list(): Promise<Transform[]> {
    let entries: string[];
    try {
      entries = await readdir(this.storageDir);
    } catch {
      // Nothing stored yet.
      return [];
    }

    const transforms: Transform[] = [];
    for (const entry of entries.filter(e => e.endsWith('.json')).sort()) {
      try {
        const raw = await readFile(join(this.storageDir, entry), 'utf-8');
        transforms.push(readStoredTransform(raw, entry));
      } catch (err) {
        log.warn(`Skipping unreadable transform file ${entry}: ${errorMessage(err)}`);
      }
    }
    return transforms;
  }

  async listEnabled(): Promise<Transform[]> {
    return (await this.list()).filter(t => t.enabled);
  }

  /**
   * Replace a transform's definition, keeping its id and creation time.
   *
   * @throws NotFoundError | ValidationError
   */
  async update(id: string, input: unknown): Promise<Transform> {
    const existing = await this.get(id);
    const validated = validateTransformInput(input);
    const transform: Transform = {
      ...validated,
      id: existing.id,
      createdAt: existing.createdAt,
      updatedAt: this.now().toISOString(),
    };

    await this.write(transform);
    return transform;
  }

  /**
   * @throws NotFoundError
   */
  async setEnabled(id: string, enabled: boolean): Promise<Transform> {
    const existing = await this.get(id);
    const transform: Transform = { ...existing, enabled, updatedAt: this.now().toISOString() };
    await this.write(transform);
    log.info(`${enabled ? 'Enabled' : 'Disabled'} transform ${id}`);
    return transform;
  }

  /**
   * @throws NotFoundError
   */
  async delete(id: string): Promise<void> {
    await this.get(id);
    await rm(this.filePath(id));
    log.info(`Deleted transform ${id}`);
  }
}
