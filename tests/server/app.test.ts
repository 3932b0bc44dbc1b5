import { afterEach, describe, it, expect, vi } from 'vitest';
import { createApp, INSTANCES_AWARE } from '../../src/server/app';
import { loadBootTemplate, loadStory } from '../../src/server/content';
import { hostFacts, type SystemInfo } from '../../src/server/systemInfo';
import { interpolateStory, storyText } from '../../src/utils/story';

const info: SystemInfo = {
  hostname: 'pool-7',
  nodeVersion: '20.0.0',
  platform: 'Linux-6.1.0-x64',
  kernel: '6.1.0',
  architecture: 'x64',
  cpuCount: 8,
  user: 'ada',
  home: '/home/ada',
  cwd: '/srv/warm-start',
  pid: 4242,
};

// Mirrors React's text escaping.
const escapeHtml = (text: string) =>
  text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#x27;');

const story = loadStory();

const makeApp = (overrides: { systemInfo?: () => SystemInfo; bootTemplate?: string[] } = {}) =>
  createApp({
    story,
    bootTemplate: overrides.bootTemplate ?? loadBootTemplate(),
    clientScript: 'window.__presentation = "started";',
    systemInfo: overrides.systemInfo ?? (() => info),
    now: () => new Date('2026-01-01T00:00:00.000Z'),
    random: () => 0,
  });

describe('GET /', () => {
  it('returns the page as HTML', async () => {
    const res = await makeApp().request('/');

    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toBe('text/html; charset=UTF-8');
    const body = await res.text();
    expect(body.startsWith('<!DOCTYPE html><html lang="en">')).toBe(true);
    expect(body).toContain('<title>pool-7 | Warm Start</title>');
  });

  it('contains the full story text', async () => {
    const body = await (await makeApp().request('/')).text();

    const pieces = storyText(interpolateStory(story, hostFacts(info)));
    expect(pieces.length).toBeGreaterThan(40);
    for (const piece of pieces) {
      expect(body).toContain(escapeHtml(piece));
    }
  });

  it('embeds the boot log with host facts filled in', async () => {
    const app = makeApp({ bootTemplate: ['Hostname: {hostname}', 'WARNING: </script> test'] });
    const body = await (await app.request('/')).text();

    expect(body).toContain(
      '<script type="application/json" id="boot-data">' +
        '[{"text":"Hostname: pool-7","tone":"plain"},{"text":"WARNING: \\u003c/script> test","tone":"warning"}]' +
        '</script>',
    );
  });

  it('inlines the client script', async () => {
    const body = await (await makeApp().request('/')).text();
    expect(body).toContain('<script>window.__presentation = "started";</script>');
  });

  it('renders the warm pool grid', async () => {
    const body = await (await makeApp().request('/')).text();
    expect(body.match(/class="node rogue"/g)).toHaveLength(7);
    expect(body.match(/class="node unknown"/g)).toHaveLength(5);
    expect(body).toContain('255 instances warm, 7 not responding to health checks');
  });

  it('ignores query parameters', async () => {
    const app = makeApp();
    const plain = await (await app.request('/')).text();
    const withQuery = await app.request('/?chapter=3&skip=boot');

    expect(withQuery.status).toBe(200);
    expect(await withQuery.text()).toBe(plain);
  });
});

describe('machine routes', () => {
  it('GET /info returns the host facts', async () => {
    const res = await makeApp().request('/info');
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual(info);
  });

  it('GET /health reports ok', async () => {
    const res = await makeApp().request('/health');
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      status: 'ok',
      timestamp: '2026-01-01T00:00:00.000Z',
      instancesAware: INSTANCES_AWARE,
    });
  });
});

describe('errors', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it.each(['/missing', '/chapter/1', '/info/extra'])('returns 404 for %s', async (path) => {
    const res = await makeApp().request(path);
    expect(res.status).toBe(404);
    expect(await res.text()).toBe('Not Found');
  });

  it('returns 404 for other methods on the root', async () => {
    const res = await makeApp().request('/', { method: 'POST' });
    expect(res.status).toBe(404);
  });

  it('returns 500 and logs when rendering fails', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const app = makeApp({
      systemInfo: () => {
        throw new Error('os unavailable');
      },
    });

    const res = await app.request('/');

    expect(res.status).toBe(500);
    expect(await res.text()).toBe('Internal Server Error');
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy.mock.calls[0][0]).toBe('[server] GET / failed:');
  });
});
