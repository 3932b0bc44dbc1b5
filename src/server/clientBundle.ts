import { buildSync } from 'esbuild';
import { fileURLToPath } from 'node:url';

const CLIENT_ENTRY = fileURLToPath(new URL('../client/main.ts', import.meta.url));

let cached: string | null = null;

/**
 * Bundles the browser sequencer into one IIFE so the page can inline it.
 * Built once per process.
 */
export const bundleClientScript = (): string => {
  if (cached !== null) return cached;

  const result = buildSync({
    entryPoints: [CLIENT_ENTRY],
    bundle: true,
    format: 'iife',
    platform: 'browser',
    target: 'es2020',
    minify: true,
    legalComments: 'none',
    write: false,
  });
  const [output] = result.outputFiles ?? [];
  if (!output) {
    throw new Error(`esbuild produced no output for ${CLIENT_ENTRY}`);
  }

  cached = output.text;
  return cached;
};
