/**
 * Stable release list.
 *
 * An ordered, hand-curated list of releases, newest first. The first entry is
 * what "stable" points at. Kept in YAML so changing it needs no code change.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from '../publish/errors.js';

export const RELEASE_PATTERN = /^\d+(\.\d+)+-\d+$/;

const StableEntrySchema = z.object({
  release: z.string().regex(RELEASE_PATTERN, 'expected <version>-<release>, e.g. 0.1.185-2'),
  note: z.string().optional(),
});

const StableListSchema = z.object({
  stable: z.array(StableEntrySchema).min(1, 'at least one stable release is required'),
});

export type StableEntry = z.infer<typeof StableEntrySchema>;

export interface StableList {
  readonly entries: readonly StableEntry[];
  /** Release the stable alias points at */
  readonly current: string;
}

export const DEFAULT_STABLE_LIST_PATH = path.resolve(__dirname, '..', '..', 'config', 'stable-releases.yaml');

export function parseStableList(content: string, source = 'stable list'): StableList {
  let data: unknown;
  try {
    data = yaml.load(content);
  } catch (err) {
    throw new ConfigurationError(`${source}: invalid YAML: ${errorMessage(err)}`);
  }

  const result = StableListSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`);
    throw new ConfigurationError(`${source}: ${issues.join('; ')}`);
  }

  const entries = result.data.stable;
  const [first] = entries;
  if (!first) {
    throw new ConfigurationError(`${source}: at least one stable release is required`);
  }
  return Object.freeze({ entries: Object.freeze([...entries]), current: first.release });
}

export async function loadStableList(file: string = DEFAULT_STABLE_LIST_PATH): Promise<StableList> {
  let content: string;
  try {
    content = await fs.readFile(file, 'utf-8');
  } catch (err) {
    throw new ConfigurationError(`Cannot read stable list ${file}: ${errorMessage(err)}`);
  }
  return parseStableList(content, file);
}
