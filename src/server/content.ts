import { readFileSync } from 'node:fs';
import type { z } from 'zod';
import { bootFileSchema } from '../utils/boot';
import { ContentError, describeIssue } from '../utils/errors';
import { storySchema, type Story } from '../utils/story';

export const CONTENT_DIR = new URL('../../content/', import.meta.url);

export const readContent = <S extends z.ZodTypeAny>(
  name: string,
  schema: S,
  dir: URL = CONTENT_DIR,
): z.output<S> => {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(new URL(name, dir), 'utf8'));
  } catch (error) {
    throw new ContentError(name, error instanceof Error ? error.message : String(error));
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new ContentError(name, describeIssue(parsed.error));
  }
  return parsed.data;
};

export const loadStory = (dir?: URL): Story => readContent('story.json', storySchema, dir);

/** Boot log lines as written, before host facts are filled in. */
export const loadBootTemplate = (dir?: URL): string[] =>
  readContent('boot.json', bootFileSchema, dir).lines;
