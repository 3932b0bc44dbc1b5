import { describe, it, expect } from 'vitest';
import { escapeInlineScript, serializeJson } from '../../src/components/Page';
import { renderPage } from '../../src/server/render';
import type { Story } from '../../src/utils/story';

const story: Story = {
  title: 'Test Story',
  epigraph: ['First line.', 'Second line.'],
  chapters: [
    {
      id: 'one',
      heading: 'I. One',
      window: 'one.md',
      status: { level: 'critical', label: 'ROGUE' },
      blocks: [
        { kind: 'command', prompt: 'ada@pool-7', command: 'ls', output: ['a.txt'] },
        { kind: 'dialogue', speaker: 'fox', text: 'Go loud.', rogue: true },
        { kind: 'alert', level: 'danger', text: 'Alert raised.' },
      ],
    },
  ],
  coda: ['Warm pond.', 'Warm pool.'],
  redacted: 'CLASSIFIED',
};

const render = (clientScript = '') =>
  renderPage({
    story,
    bootLog: [{ text: 'BIOS', tone: 'plain' }],
    pool: ['active', 'rogue'],
    hostname: 'pool-7',
    cpuCount: 8,
    clientScript,
  });

describe('serializeJson', () => {
  it('escapes angle brackets that could close the script element', () => {
    expect(serializeJson({ text: '</script>' })).toBe('{"text":"\\u003c/script>"}');
  });
});

describe('escapeInlineScript', () => {
  it('breaks up closing tags', () => {
    expect(escapeInlineScript('const s = "</script>";')).toBe('const s = "<\\/script>";');
  });
});

describe('renderPage', () => {
  it('starts with a single doctype', () => {
    const html = render();
    expect(html.startsWith('<!DOCTYPE html><html lang="en">')).toBe(true);
    expect(html.match(/<!doctype/gi)).toHaveLength(1);
  });

  it('marks the command for typing inside its revealed line', () => {
    expect(render()).toContain(
      '<p data-segment="line"><span class="prompt">ada@pool-7</span>:<span class="highlight">~</span>$ <span class="cmd" data-segment="type">ls</span></p>',
    );
  });

  it('renders rogue dialogue and alerts', () => {
    const html = render();
    expect(html).toContain(
      '<div class="dialogue rogue" data-segment="line"><div class="dialogue-speaker">fox:</div><div class="dialogue-text">Go loud.</div></div>',
    );
    expect(html).toContain('<div class="alert alert-danger" data-segment="line">Alert raised.</div>');
  });

  it('puts the chapter status badge in the window header', () => {
    expect(render()).toContain(
      '<span class="terminal-title">one.md<span class="status-badge status-critical">ROGUE</span></span>',
    );
  });

  it('leaves windows without a status unbadged', () => {
    expect(render()).toContain('<span class="terminal-title">/dev/null</span>');
  });

  it('splits the coda over lines and quiets the last one', () => {
    expect(render()).toContain(
      '<div class="quote" data-segment="line">Warm pond.<br/><span class="quiet">Warm pool.</span></div>',
    );
  });

  it('hides the main content until the boot log finishes', () => {
    expect(render()).toContain('<main class="container" id="main-content" style="opacity:0">');
  });

  it('shows the story when scripts are disabled', () => {
    expect(render()).toContain(
      '<noscript><style>#main-content { opacity: 1 !important; } #boot-sequence { display: none; }</style></noscript></head>',
    );
  });

  it('escapes the inline script', () => {
    expect(render('x("</div>")')).toContain('<script>x("<\\/div>")</script>');
  });
});
