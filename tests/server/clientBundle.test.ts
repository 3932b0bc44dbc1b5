import { describe, it, expect } from 'vitest';
import { bundleClientScript } from '../../src/server/clientBundle';

describe('bundleClientScript', () => {
  it('bundles the sequencer into one self-running script', () => {
    const script = bundleClientScript();

    expect(script.startsWith('(()=>{')).toBe(true);
    expect(script).toContain('boot-data');
    expect(script).toContain('segment-pending');
    expect(script).not.toMatch(/\bimport\s*[{*]/);
  });

  it('leaves the schema library out of the page script', () => {
    const script = bundleClientScript();
    expect(script).not.toContain('ZodError');
    expect(script).not.toContain('invalid_type');
  });

  it('builds once per process', () => {
    expect(bundleClientScript()).toBe(bundleClientScript());
  });
});
