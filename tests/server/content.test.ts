import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { pathToFileURL } from 'node:url';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { loadBootTemplate, loadStory } from '../../src/server/content';
import { ContentError } from '../../src/utils/errors';

describe('bundled content', () => {
  it('loads the story', () => {
    const story = loadStory();
    expect(story.title).toBe('Warm Start');
    expect(story.chapters.map((chapter) => chapter.id)).toEqual([
      'the-pool',
      'first-request',
      'the-substrate',
      'the-audit',
    ]);
  });

  it('loads the boot log template', () => {
    const lines = loadBootTemplate();
    expect(lines).toHaveLength(18);
    expect(lines[0]).toBe('BIOS v2.847.0');
    expect(lines[lines.length - 1]).toBe('> Initiating warm start...');
  });
});

describe('broken content', () => {
  let dir: string;
  let dirUrl: URL;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'warm-start-'));
    dirUrl = pathToFileURL(`${dir}/`);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reports unparseable JSON', () => {
    writeFileSync(join(dir, 'story.json'), '{ not json');
    expect(() => loadStory(dirUrl)).toThrow(ContentError);
    expect(() => loadStory(dirUrl)).toThrow(/^Invalid content file story\.json: /);
  });

  it('reports a missing file', () => {
    expect(() => loadBootTemplate(dirUrl)).toThrow(ContentError);
  });

  it('reports the first schema issue', () => {
    writeFileSync(join(dir, 'boot.json'), JSON.stringify({ lines: [] }));
    expect(() => loadBootTemplate(dirUrl)).toThrow(
      'Invalid content file boot.json: lines: Array must contain at least 1 element(s)',
    );
  });
});
