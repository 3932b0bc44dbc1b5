import { z } from 'zod';
import { interpolate, type TemplateValues } from './template';

const line = z.string().min(1);

export const storyBlockSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('prose'), text: line }),
  z.object({
    kind: z.literal('command'),
    prompt: line,
    command: line,
    output: z.array(z.string()).default([]),
  }),
  z.object({
    kind: z.literal('dialogue'),
    speaker: line,
    text: line,
    rogue: z.boolean().default(false),
  }),
  z.object({ kind: z.literal('alert'), level: z.enum(['warning', 'danger']), text: line }),
  z.object({ kind: z.literal('quote'), lines: z.array(line).min(1) }),
  z.object({
    kind: z.literal('log'),
    lines: z.array(z.object({ time: line, text: line })).min(1),
  }),
  z.object({ kind: z.literal('pool') }),
]);

export const chapterSchema = z.object({
  id: z.string().regex(/^[a-z0-9-]+$/, 'chapter ids are lowercase slugs'),
  heading: line,
  window: line,
  /** Badge shown in the window header, e.g. `{ level: 'critical', label: 'ROGUE' }`. */
  status: z
    .object({ level: z.enum(['running', 'warning', 'critical']), label: line })
    .optional(),
  blocks: z.array(storyBlockSchema).min(1),
});

/** Shape of content/story.json. */
export const storySchema = z.object({
  title: line,
  epigraph: z.array(line).min(1),
  chapters: z.array(chapterSchema).min(1),
  coda: z.array(line).min(1),
  redacted: z.string().optional(),
});

export type StoryBlock = z.infer<typeof storyBlockSchema>;
export type Chapter = z.infer<typeof chapterSchema>;
export type ChapterStatus = NonNullable<Chapter['status']>;
export type Story = z.infer<typeof storySchema>;

const interpolateBlock = (block: StoryBlock, values: TemplateValues): StoryBlock => {
  const fill = (text: string) => interpolate(text, values);
  switch (block.kind) {
    case 'prose':
    case 'alert':
      return { ...block, text: fill(block.text) };
    case 'command':
      return {
        ...block,
        prompt: fill(block.prompt),
        command: fill(block.command),
        output: block.output.map(fill),
      };
    case 'dialogue':
      return { ...block, speaker: fill(block.speaker), text: fill(block.text) };
    case 'quote':
      return { ...block, lines: block.lines.map(fill) };
    case 'log':
      return { ...block, lines: block.lines.map((entry) => ({ ...entry, text: fill(entry.text) })) };
    case 'pool':
      return block;
  }
};

export const interpolateStory = (story: Story, values: TemplateValues): Story => ({
  ...story,
  epigraph: story.epigraph.map((text) => interpolate(text, values)),
  chapters: story.chapters.map((chapter) => ({
    ...chapter,
    heading: interpolate(chapter.heading, values),
    window: interpolate(chapter.window, values),
    status: chapter.status && { ...chapter.status, label: interpolate(chapter.status.label, values) },
    blocks: chapter.blocks.map((block) => interpolateBlock(block, values)),
  })),
  coda: story.coda.map((text) => interpolate(text, values)),
  redacted: story.redacted === undefined ? undefined : interpolate(story.redacted, values),
});

const blockText = (block: StoryBlock): string[] => {
  switch (block.kind) {
    case 'prose':
    case 'alert':
      return [block.text];
    case 'command':
      return [block.prompt, block.command, ...block.output];
    case 'dialogue':
      return [block.speaker, block.text];
    case 'quote':
      return block.lines;
    case 'log':
      return block.lines.flatMap((entry) => [entry.time, entry.text]);
    case 'pool':
      return [];
  }
};

/** Every piece of readable text in the story, in reading order. */
export const storyText = (story: Story): string[] => [
  story.title,
  ...story.epigraph,
  ...story.chapters.flatMap((chapter) => [
    chapter.window,
    ...(chapter.status ? [chapter.status.label] : []),
    chapter.heading,
    ...chapter.blocks.flatMap(blockText),
  ]),
  ...story.coda,
];
