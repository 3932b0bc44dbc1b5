import { z } from 'zod';
import { toneOf, type BootLine } from './bootLine';
import { interpolate, type TemplateValues } from './template';

export * from './bootLine';

/** Shape of content/boot.json. */
export const bootFileSchema = z.object({
  lines: z.array(z.string()).min(1),
});

export const buildBootLog = (
  template: readonly string[],
  values: TemplateValues,
): BootLine[] =>
  template.map((raw) => {
    const text = interpolate(raw, values);
    return { text, tone: toneOf(text) };
  });
